import type { ConnectionScope, Receive, Send } from "@ferry/core";
import type { Request } from "../request";

/**
 * Everything a handler gets for one connection.
 *
 * `scope`, `receive` and `send` come from the transport unchanged;
 * `request` is the facade bound by the request stage.
 */
export interface Connection {
	readonly scope: ConnectionScope;
	readonly receive: Receive;
	readonly send: Send;
	readonly request?: Request;
}

/** Anything that can handle a connection. */
export interface Handler {
	handle(conn: Connection): Promise<unknown>;
}

/** Plain-function form of a {@link Handler}. */
export type HandlerFn = (conn: Connection) => Promise<unknown>;

/** Either form; stages accept both. */
export type HandlerLike = Handler | HandlerFn;

/** Wrap a plain function so every chain member exposes `handle`. */
export function toHandler(handler: HandlerLike): Handler {
	return typeof handler === "function" ? { handle: handler } : handler;
}
