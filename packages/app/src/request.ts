// ---------------------------------------------------------------------------
// Request facade: lazy, cached views over a connection scope and its body
// ---------------------------------------------------------------------------

import {
	CIMultiDict,
	concatBytes,
	DecodeError,
	DEFAULT_CHARSET,
	decodeBytes,
	decodeLatin1,
	MultiDict,
	type OptionsHeader,
	parseCookieHeader,
	parseOptionsHeader,
	type Receive,
	type RequestScope,
	type Send,
	toError,
	UsageError,
} from "@ferry/core";
import { type FormFields, parseMultipart, parseUrlEncoded } from "./form";

/** Named segments extracted by the router for one connection. */
export type PathParams = Readonly<Record<string, string>>;

/** Views derived from the scope, each computed on first access. */
interface ViewCache {
	headers?: CIMultiDict<string>;
	url?: URL;
	query?: MultiDict<string>;
	cookies?: Record<string, string>;
	contentType?: OptionsHeader;
}

/** Body decodes, each run at most once per request. */
interface DecodeCache {
	text?: Promise<string>;
	json?: Promise<unknown>;
	form?: Promise<FormFields>;
}

const JSON_TYPES = new Set(["application/json"]);
const FORM_TYPES = new Set(["application/x-www-form-urlencoded", "multipart/form-data"]);

function escapePath(path: string): string {
	return path.replace(/%/g, "%25").replace(/\?/g, "%3F").replace(/#/g, "%23");
}

/** Split `host[:port]`, keeping IPv6 brackets on the host. */
function splitHostPort(value: string): [host: string, port: number | null] {
	let host = value;
	let rest = "";
	if (value.startsWith("[")) {
		const end = value.indexOf("]");
		if (end !== -1) {
			host = value.slice(0, end + 1);
			rest = value.slice(end + 1);
		}
	} else {
		const colon = value.lastIndexOf(":");
		if (colon !== -1) {
			host = value.slice(0, colon);
			rest = value.slice(colon);
		}
	}
	const port = rest.startsWith(":") && /^\d+$/.test(rest.slice(1)) ? Number(rest.slice(1)) : null;
	return [host, port];
}

function formatAuthority(host: string, port: number | null): string {
	const bracketed = host.includes(":") && !host.startsWith("[") ? `[${host}]` : host;
	return port === null ? bracketed : `${bracketed}:${port}`;
}

/**
 * Rebuild the request URL. A `host` header that does not form a valid URL
 * is ignored in favour of the server address.
 */
function buildUrl(scope: RequestScope, hostHeader: string | undefined): URL {
	const [serverHost, serverPort] = scope.server ?? [null, null];
	const scheme = scope.scheme || (scope.type === "websocket" ? "ws" : "http");
	const path = scope.rawPath ? decodeLatin1(scope.rawPath) : escapePath(scope.path);
	const query = decodeLatin1(scope.queryString);
	const target = `${scope.rootPath}${path}${query ? `?${query}` : ""}`;

	if (hostHeader) {
		const [headerHost, headerPort] = splitHostPort(hostHeader);
		const candidate = `${scheme}://${formatAuthority(headerHost, headerPort ?? serverPort)}${target}`;
		if (URL.canParse(candidate)) return new URL(candidate);
	}
	return new URL(`${scheme}://${formatAuthority(serverHost ?? "localhost", serverPort)}${target}`);
}

/**
 * Read-only facade over one connection.
 *
 * The scope is never modified: every derived view (headers, URL, cookies,
 * content type) is computed on first access and cached on the instance,
 * the body is drained from `receive` once and buffered, and each body
 * decode (`text`, `json`, `form`) runs at most once. Nothing is shared
 * between instances, so abandoning a request mid-stream leaves no state
 * behind.
 *
 * @example
 * ```ts
 * const request = new Request(scope, receive);
 * request.headers.get("Content-Type");
 * const payload = await request.json();
 * ```
 */
export class Request {
	readonly scope: RequestScope;
	readonly receive: Receive | undefined;
	readonly send: Send | undefined;

	private params: PathParams = {};
	private readonly views: ViewCache = {};
	private readonly decoded: DecodeCache = {};
	/** Chunks pulled from `receive` so far, shared by `stream()` and `body()`. */
	private readonly received: Uint8Array[] = [];
	private drained = false;
	private buffered: Promise<Uint8Array> | undefined;

	constructor(scope: RequestScope, receive?: Receive, send?: Send) {
		this.scope = scope;
		this.receive = receive;
		this.send = send;
	}

	get type(): RequestScope["type"] {
		return this.scope.type;
	}

	/** Request method; message-stream connections report their `GET` handshake. */
	get method(): string {
		return this.scope.type === "http" ? this.scope.method : "GET";
	}

	get path(): string {
		return this.scope.path;
	}

	/** Parameters extracted by the router; empty until a route matched. */
	get pathParams(): PathParams {
		return this.params;
	}

	/** Set by the router stage once per dispatch. */
	bindPathParams(params: PathParams): void {
		this.params = params;
	}

	/** Headers decoded as latin-1; lookups ignore case, duplicates stay in order. */
	get headers(): CIMultiDict<string> {
		this.views.headers ??= new CIMultiDict<string>(
			this.scope.headers.map(([name, value]): [string, string] => [
				decodeLatin1(name),
				decodeLatin1(value),
			]),
		);
		return this.views.headers;
	}

	/**
	 * Fully-qualified request URL.
	 *
	 * The `host` header wins over the transport's server address; its own
	 * port is used when it has one, the server port otherwise. The raw path
	 * bytes are preferred over the decoded path when the transport has them.
	 */
	get url(): URL {
		this.views.url ??= buildUrl(this.scope, this.headers.get("host"));
		return this.views.url;
	}

	get query(): MultiDict<string> {
		this.views.query ??= new MultiDict<string>(this.url.searchParams);
		return this.views.query;
	}

	get cookies(): Record<string, string> {
		this.views.cookies ??= parseCookieHeader(this.headers.get("cookie"));
		return this.views.cookies;
	}

	private get parsedContentType(): OptionsHeader {
		this.views.contentType ??= parseOptionsHeader(this.headers.get("content-type"));
		return this.views.contentType;
	}

	/** Media type from `content-type`, without parameters. */
	get contentType(): string {
		return this.parsedContentType[0];
	}

	/** Declared charset, `utf-8` when the header has none. */
	get charset(): string {
		return this.parsedContentType[1].charset || DEFAULT_CHARSET;
	}

	/**
	 * Yield body chunks as they arrive.
	 *
	 * Chunks already read by an earlier, abandoned stream are replayed first,
	 * then reading continues from `receive`. When the body is already
	 * buffered it is yielded as one chunk.
	 */
	async *stream(): AsyncGenerator<Uint8Array, void, undefined> {
		if (this.buffered) {
			yield await this.buffered;
			return;
		}
		const receive = this.requireReceive();
		yield* this.received.slice();
		for (let chunk = await this.nextChunk(receive); chunk; chunk = await this.nextChunk(receive)) {
			yield chunk;
		}
		this.buffered ??= Promise.resolve(concatBytes(this.received));
	}

	/** The whole body, read once and buffered; picks up where a partial stream stopped. */
	body(): Promise<Uint8Array> {
		if (!this.buffered) {
			const receive = this.receive;
			if (!receive) return Promise.reject(this.missingReceive());
			this.buffered = this.readBody(receive);
		}
		return this.buffered;
	}

	/** Body decoded with {@link charset}; a decode failure rejects with `Invalid Encoding`. */
	text(): Promise<string> {
		this.decoded.text ??= this.decodeText();
		return this.decoded.text;
	}

	/** Body parsed as JSON; a syntax error rejects with `Invalid JSON`. */
	json(): Promise<unknown> {
		this.decoded.json ??= this.decodeJson();
		return this.decoded.json;
	}

	/**
	 * Body parsed as a form: multipart when the content type says so,
	 * URL-encoded otherwise. Any failure rejects with `Invalid Form Data`.
	 */
	form(): Promise<FormFields> {
		this.decoded.form ??= this.decodeForm();
		return this.decoded.form;
	}

	/** Body decoded according to its content type: JSON, form, or text. */
	data(): Promise<unknown> {
		const type = this.contentType.toLowerCase();
		if (JSON_TYPES.has(type) || type.endsWith("+json")) return this.json();
		if (FORM_TYPES.has(type)) return this.form();
		return this.text();
	}

	private requireReceive(): Receive {
		if (!this.receive) throw this.missingReceive();
		return this.receive;
	}

	private missingReceive(): UsageError {
		return new UsageError("Request has no receive operation to read the body from");
	}

	/** Next non-empty body chunk, or `null` once the body is complete. */
	private async nextChunk(receive: Receive): Promise<Uint8Array | null> {
		while (!this.drained) {
			const event = await receive();
			if (event.type !== "http.request") {
				this.drained = true;
				break;
			}
			if (!event.moreBody) this.drained = true;
			if (event.body && event.body.length > 0) {
				this.received.push(event.body);
				return event.body;
			}
		}
		return null;
	}

	private async readBody(receive: Receive): Promise<Uint8Array> {
		let chunk = await this.nextChunk(receive);
		while (chunk) chunk = await this.nextChunk(receive);
		return concatBytes(this.received);
	}

	private async decodeText(): Promise<string> {
		const body = await this.body();
		try {
			return decodeBytes(body, this.charset);
		} catch (err) {
			throw new DecodeError("Invalid Encoding", "text", toError(err));
		}
	}

	private async decodeJson(): Promise<unknown> {
		const text = await this.text();
		try {
			return JSON.parse(text);
		} catch (err) {
			throw new DecodeError("Invalid JSON", "json", toError(err));
		}
	}

	private async decodeForm(): Promise<FormFields> {
		const body = await this.body();
		const [contentType, options] = this.parsedContentType;
		try {
			if (contentType.toLowerCase() === "multipart/form-data") {
				return parseMultipart(body, options.boundary ?? "", this.charset);
			}
			return parseUrlEncoded(body, this.charset);
		} catch (err) {
			throw new DecodeError("Invalid Form Data", "form", toError(err));
		}
	}
}
