// ---------------------------------------------------------------------------
// Response negotiation: handler return values → canonical send events
// ---------------------------------------------------------------------------

import {
	CIMultiDict,
	encodeLatin1,
	encodeUtf8,
	type RawHeader,
	type SendEvent,
} from "@ferry/core";

/**
 * Anything that can produce a finite, ordered, lazy sequence of send events.
 *
 * {@link Response} implements it, and so does any async generator of
 * {@link SendEvent}s a handler chooses to return.
 */
export interface Sendable {
	[Symbol.asyncIterator](): AsyncIterator<SendEvent>;
}

/** Options accepted by every {@link Response} constructor. */
export interface ResponseInit {
	status?: number;
	headers?: Record<string, string> | Iterable<readonly [string, string]>;
	/** `null` leaves the `content-type` header unset. */
	contentType?: string | null;
}

/** Body types a {@link Response} can carry directly. */
export type ResponseContent = string | Uint8Array | null | undefined;

function withCharset(contentType: string): string {
	if (contentType.startsWith("text/") && !contentType.includes("charset")) {
		return `${contentType}; charset=utf-8`;
	}
	return contentType;
}

function headerEntries(headers: ResponseInit["headers"]): Iterable<readonly [string, string]> {
	if (headers === undefined) return [];
	if (isHeaderIterable(headers)) return headers;
	return Object.entries(headers);
}

function isHeaderIterable(
	headers: Record<string, string> | Iterable<readonly [string, string]>,
): headers is Iterable<readonly [string, string]> {
	return typeof Reflect.get(headers, Symbol.iterator) === "function";
}

/**
 * A complete, buffered response.
 *
 * Iterating it yields `http.response.start` with the status and headers
 * (`content-type` and `content-length` filled in when missing), then a
 * single `http.response.body` carrying the whole content.
 */
export class Response implements Sendable {
	status: number;
	readonly headers: CIMultiDict<string>;
	readonly content: Uint8Array;

	constructor(content: ResponseContent = null, init: ResponseInit = {}) {
		this.status = init.status ?? 200;
		this.content = typeof content === "string" ? encodeUtf8(content) : (content ?? new Uint8Array());
		this.headers = new CIMultiDict<string>(headerEntries(init.headers));
		if (init.contentType && !this.headers.has("content-type")) {
			this.headers.set("content-type", withCharset(init.contentType));
		}
	}

	/** Headers as the transport expects them: lower-cased, latin-1 encoded. */
	rawHeaders(): RawHeader[] {
		const headers: RawHeader[] = this.headers
			.entries()
			.map(([name, value]): RawHeader => [encodeLatin1(name.toLowerCase()), encodeLatin1(value)]);
		if (!this.headers.has("content-length")) {
			headers.push([encodeLatin1("content-length"), encodeLatin1(String(this.content.length))]);
		}
		return headers;
	}

	async *[Symbol.asyncIterator](): AsyncGenerator<SendEvent, void, undefined> {
		yield { type: "http.response.start", status: this.status, headers: this.rawHeaders() };
		yield { type: "http.response.body", body: this.content, moreBody: false };
	}
}

export class HTMLResponse extends Response {
	constructor(content: ResponseContent = null, init: ResponseInit = {}) {
		super(content, { contentType: "text/html", ...init });
	}
}

export class PlainTextResponse extends Response {
	constructor(content: ResponseContent = null, init: ResponseInit = {}) {
		super(content, { contentType: "text/plain", ...init });
	}
}

/** Serializes any JSON-compatible value; `undefined` becomes `null`. */
export class JSONResponse extends Response {
	constructor(value: unknown, init: ResponseInit = {}) {
		super(JSON.stringify(value) ?? "null", { contentType: "application/json", ...init });
	}
}

/** Redirect to `location`, 307 unless told otherwise. */
export class RedirectResponse extends Response {
	constructor(location: string, init: ResponseInit = {}) {
		super(null, { status: 307, ...init });
		this.headers.set("location", location);
	}
}

/** Whether `value` can produce send events on its own. */
export function isSendable(value: unknown): value is Sendable {
	return (
		typeof value === "object" &&
		value !== null &&
		typeof Reflect.get(value, Symbol.asyncIterator) === "function"
	);
}

/**
 * Normalize a handler's return value into something that can be sent.
 *
 * - `null` / `undefined`: nothing to send, returns `null`
 * - a {@link Sendable}: returned unchanged
 * - a string: `text/plain` response, status 200
 * - bytes: `application/octet-stream` response, status 200
 * - anything else: `application/json` response, status 200
 */
export function parseResponse(value: unknown): Sendable | null {
	if (value === null || value === undefined) return null;
	if (isSendable(value)) return value;
	if (typeof value === "string") return new PlainTextResponse(value);
	if (value instanceof Uint8Array) {
		return new Response(value, { contentType: "application/octet-stream" });
	}
	return new JSONResponse(value);
}

/** Fallback page rendered when nothing else handles a connection. */
export function notFoundResponse(): HTMLResponse {
	return new HTMLResponse("Not Found", { status: 404 });
}
