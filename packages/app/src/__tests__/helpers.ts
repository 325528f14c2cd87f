import {
	decodeLatin1,
	encodeLatin1,
	encodeUtf8,
	type HttpScope,
	type LifespanScope,
	type RawHeader,
	type Receive,
	type ReceiveEvent,
	type Send,
	type SendEvent,
	type WebSocketScope,
} from "@ferry/core";
import type { Sendable } from "../response";

export interface ScopeOptions {
	method?: string;
	path?: string;
	query?: string;
	rootPath?: string;
	scheme?: string;
	headers?: Array<[string, string]>;
	server?: [string, number | null] | null;
}

function rawHeaders(headers: Array<[string, string]>): RawHeader[] {
	return headers.map(([name, value]): RawHeader => [encodeLatin1(name), encodeLatin1(value)]);
}

export function httpScope(options: ScopeOptions = {}): HttpScope {
	return {
		type: "http",
		method: options.method ?? "GET",
		httpVersion: "1.1",
		scheme: options.scheme ?? "http",
		path: options.path ?? "/",
		queryString: encodeLatin1(options.query ?? ""),
		rootPath: options.rootPath ?? "",
		headers: rawHeaders(options.headers ?? []),
		client: ["127.0.0.1", 50000],
		server: options.server === undefined ? ["testserver", 80] : options.server,
	};
}

export function websocketScope(options: ScopeOptions = {}): WebSocketScope {
	return {
		type: "websocket",
		httpVersion: "1.1",
		scheme: options.scheme ?? "ws",
		path: options.path ?? "/",
		queryString: encodeLatin1(options.query ?? ""),
		rootPath: options.rootPath ?? "",
		headers: rawHeaders(options.headers ?? []),
		client: ["127.0.0.1", 50000],
		server: options.server === undefined ? ["testserver", 80] : options.server,
		subprotocols: [],
	};
}

export const lifespanScope: LifespanScope = { type: "lifespan" };

/** Receive operation replaying `events`, then reporting a disconnect. */
export function queuedReceive(events: ReceiveEvent[]): Receive & { calls: () => number } {
	const queue = [...events];
	let calls = 0;
	const receive = async (): Promise<ReceiveEvent> => {
		calls++;
		return queue.shift() ?? { type: "http.disconnect" };
	};
	return Object.assign(receive, { calls: () => calls });
}

/** Receive operation delivering `chunks` as one body, one event per chunk. */
export function bodyReceive(...chunks: string[]): Receive & { calls: () => number } {
	if (chunks.length === 0) return queuedReceive([{ type: "http.request", moreBody: false }]);
	return queuedReceive(
		chunks.map((chunk, i): ReceiveEvent => ({
			type: "http.request",
			body: encodeUtf8(chunk),
			moreBody: i < chunks.length - 1,
		})),
	);
}

/** Send operation recording every event. */
export function recordingSend(): Send & { events: SendEvent[] } {
	const events: SendEvent[] = [];
	const send = async (event: SendEvent): Promise<void> => {
		events.push(event);
	};
	return Object.assign(send, { events });
}

export interface CollectedResponse {
	status: number;
	headers: Array<[string, string]>;
	body: string;
}

/** Fold a recorded response into status, decoded headers and body text. */
export function summarize(events: readonly SendEvent[]): CollectedResponse {
	const response: CollectedResponse = { status: 0, headers: [], body: "" };
	const decoder = new TextDecoder();
	for (const event of events) {
		if (event.type === "http.response.start") {
			response.status = event.status;
			response.headers = event.headers.map(([name, value]): [string, string] => [
				decodeLatin1(name),
				decodeLatin1(value),
			]);
		} else if (event.type === "http.response.body") {
			response.body += decoder.decode(event.body);
		}
	}
	return response;
}

export async function collect(sendable: Sendable): Promise<CollectedResponse> {
	const events: SendEvent[] = [];
	for await (const event of sendable) events.push(event);
	return summarize(events);
}
