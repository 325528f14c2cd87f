// ---------------------------------------------------------------------------
// Transport protocol: connection scopes and the events exchanged per connection
// ---------------------------------------------------------------------------

/** Connection kinds a transport can deliver. */
export type ScopeType = "http" | "websocket" | "lifespan";

/** One raw header: name and value as bytes. */
export type RawHeader = readonly [name: Uint8Array, value: Uint8Array];

/** Ordered raw header list, duplicates allowed. */
export type RawHeaders = readonly RawHeader[];

/** Host and port pair reported by the transport. */
export type Address = readonly [host: string, port: number | null];

/** Fields shared by request/response and message-stream connections. */
interface RequestScopeBase {
	readonly httpVersion: string;
	readonly scheme: string;
	/** Decoded request path, without the root path. */
	readonly path: string;
	/** Path bytes exactly as sent by the client, when the transport has them. */
	readonly rawPath?: Uint8Array;
	readonly queryString: Uint8Array;
	/** Mount point of the application. */
	readonly rootPath: string;
	readonly headers: RawHeaders;
	readonly client: Address | null;
	readonly server: Address | null;
	/** Protocol-specific fields the transport chooses to expose. */
	readonly extensions?: Readonly<Record<string, unknown>>;
}

/** Request/response connection. */
export interface HttpScope extends RequestScopeBase {
	readonly type: "http";
	readonly method: string;
}

/** Message-stream connection. */
export interface WebSocketScope extends RequestScopeBase {
	readonly type: "websocket";
	readonly subprotocols: readonly string[];
}

/** Process lifecycle channel. */
export interface LifespanScope {
	readonly type: "lifespan";
	readonly extensions?: Readonly<Record<string, unknown>>;
}

/** Immutable metadata for one connection, created by the transport. */
export type ConnectionScope = HttpScope | WebSocketScope | LifespanScope;

/** Scopes that carry request metadata. */
export type RequestScope = HttpScope | WebSocketScope;

/** Whether the scope carries request metadata (path, headers, query). */
export function isRequestScope(scope: ConnectionScope): scope is RequestScope {
	return scope.type === "http" || scope.type === "websocket";
}

// ---------------------------------------------------------------------------
// Receive events (transport → application)
// ---------------------------------------------------------------------------

/** A chunk of the request body. `moreBody` is false (or absent) on the last chunk. */
export interface HttpRequestEvent {
	readonly type: "http.request";
	readonly body?: Uint8Array;
	readonly moreBody?: boolean;
}

export interface HttpDisconnectEvent {
	readonly type: "http.disconnect";
}

export interface WebSocketConnectEvent {
	readonly type: "websocket.connect";
}

export interface WebSocketReceiveEvent {
	readonly type: "websocket.receive";
	readonly bytes?: Uint8Array;
	readonly text?: string;
}

export interface WebSocketDisconnectEvent {
	readonly type: "websocket.disconnect";
	readonly code: number;
}

export interface LifespanStartupEvent {
	readonly type: "lifespan.startup";
}

export interface LifespanShutdownEvent {
	readonly type: "lifespan.shutdown";
}

export type ReceiveEvent =
	| HttpRequestEvent
	| HttpDisconnectEvent
	| WebSocketConnectEvent
	| WebSocketReceiveEvent
	| WebSocketDisconnectEvent
	| LifespanStartupEvent
	| LifespanShutdownEvent;

// ---------------------------------------------------------------------------
// Send events (application → transport)
// ---------------------------------------------------------------------------

export interface HttpResponseStartEvent {
	readonly type: "http.response.start";
	readonly status: number;
	readonly headers: RawHeaders;
}

export interface HttpResponseBodyEvent {
	readonly type: "http.response.body";
	readonly body: Uint8Array;
	readonly moreBody: boolean;
}

export interface WebSocketAcceptEvent {
	readonly type: "websocket.accept";
	readonly subprotocol?: string;
	readonly headers?: RawHeaders;
}

export interface WebSocketSendEvent {
	readonly type: "websocket.send";
	readonly bytes?: Uint8Array;
	readonly text?: string;
}

export interface WebSocketCloseEvent {
	readonly type: "websocket.close";
	readonly code: number;
	readonly reason?: string;
}

export interface LifespanStartupCompleteEvent {
	readonly type: "lifespan.startup.complete";
}

export interface LifespanShutdownCompleteEvent {
	readonly type: "lifespan.shutdown.complete";
}

export type SendEvent =
	| HttpResponseStartEvent
	| HttpResponseBodyEvent
	| WebSocketAcceptEvent
	| WebSocketSendEvent
	| WebSocketCloseEvent
	| LifespanStartupCompleteEvent
	| LifespanShutdownCompleteEvent;

/** Suspending pull of the next event for a connection. */
export type Receive = () => Promise<ReceiveEvent>;

/** Hand one event back to the transport. */
export type Send = (event: SendEvent) => Promise<void>;
