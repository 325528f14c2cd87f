const ASYNC_TAGS = new Set(["[object AsyncFunction]", "[object AsyncGeneratorFunction]"]);

/** Whether `fn` was declared `async` (or as an async generator). */
export function isAsyncFunction(fn: unknown): boolean {
	return typeof fn === "function" && ASYNC_TAGS.has(Object.prototype.toString.call(fn));
}

/**
 * Coerce a sync-or-async callback into async form.
 *
 * The wrapper always returns a promise, so callers can `await` every
 * registered callback the same way; a synchronous throw becomes a rejection.
 */
export function toAsync<A extends unknown[], R>(
	fn: (...args: A) => R | Promise<R>,
): (...args: A) => Promise<R> {
	return async (...args: A): Promise<R> => fn(...args);
}
