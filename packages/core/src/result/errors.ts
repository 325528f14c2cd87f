/** Base error class for all Ferry errors */
export class FerryError extends Error {
	readonly code: string;
	override readonly cause?: Error;

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.cause = cause;
	}
}

/** What an explicit decode was trying to produce. */
export type DecodePurpose = "text" | "json" | "form";

const DECODE_CODES: Record<DecodePurpose, string> = {
	text: "INVALID_ENCODING",
	json: "INVALID_JSON",
	form: "INVALID_FORM_DATA",
};

/**
 * Request body could not be decoded.
 *
 * Raised only by explicit decoders (`text()`, `json()`, `form()`), never while
 * the body is being buffered. Response stages turn it into a 400 response.
 */
export class DecodeError extends FerryError {
	readonly purpose: DecodePurpose;
	readonly status = 400;

	constructor(message: string, purpose: DecodePurpose, cause?: Error) {
		super(message, DECODE_CODES[purpose], cause);
		this.purpose = purpose;
	}
}

/** No route matched the dispatched path and method */
export class RouteNotFoundError extends FerryError {
	readonly path: string;
	readonly method: string;

	constructor(path: string, method: string, code = "ROUTE_NOT_FOUND") {
		super(`No route for ${method} ${path}`, code);
		this.path = path;
		this.method = method;
	}
}

/** The path matched a route but none of its routes accept the method */
export class MethodNotAllowedError extends RouteNotFoundError {
	readonly allowed: readonly string[];

	constructor(path: string, method: string, allowed: readonly string[]) {
		super(path, method, "METHOD_NOT_ALLOWED");
		this.allowed = allowed;
	}
}

/** Invalid assembly-time configuration (route registration, settings) */
export class ConfigurationError extends FerryError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIGURATION_ERROR", cause);
	}
}

/** An API was used without what it needs, e.g. streaming without a receive operation */
export class UsageError extends FerryError {
	constructor(message: string, cause?: Error) {
		super(message, "USAGE_ERROR", cause);
	}
}

/** The transport broke the startup/shutdown protocol */
export class LifecycleError extends FerryError {
	constructor(message: string, cause?: Error) {
		super(message, "LIFECYCLE_ERROR", cause);
	}
}

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
