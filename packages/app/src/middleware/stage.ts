// ---------------------------------------------------------------------------
// Stage: one link of the middleware chain
// ---------------------------------------------------------------------------

import type { ScopeType } from "@ferry/core";
import { notFoundResponse } from "../response";
import { type Connection, type Handler, type HandlerLike, toHandler } from "./types";

/** Terminal handler used when a stage is built without an inner one. */
export const notFoundHandler: Handler = {
	handle: async () => notFoundResponse(),
};

/** Connection types carrying request metadata. */
export const REQUEST_SCOPES: ReadonlySet<ScopeType> = new Set<ScopeType>(["http", "websocket"]);

/**
 * Base class for middleware stages.
 *
 * A stage wraps exactly one inner handler. Connections whose type is in
 * {@link scopes} go through {@link process}; every other connection is
 * forwarded to the inner handler untouched. Use {@link unwrap} or
 * {@link find} to reach handlers further down the chain.
 */
export abstract class Stage implements Handler {
	/** Connection types this stage processes. */
	abstract readonly scopes: ReadonlySet<ScopeType>;

	protected readonly inner: Handler;

	constructor(inner?: HandlerLike) {
		this.inner = inner ? toHandler(inner) : notFoundHandler;
	}

	handle(conn: Connection): Promise<unknown> {
		if (this.scopes.has(conn.scope.type)) return this.process(conn);
		return this.inner.handle(conn);
	}

	/** The handler this stage wraps. */
	unwrap(): Handler {
		return this.inner;
	}

	/** The first stage of type `kind`, starting from this one and walking inwards. */
	find<T extends Stage>(kind: abstract new (...args: never[]) => T): T | undefined {
		let current: Handler = this;
		while (current instanceof Stage) {
			if (current instanceof kind) return current;
			current = current.unwrap();
		}
		return undefined;
	}

	/** Stage logic; must call `this.inner.handle` to continue the chain or return a substitute. */
	protected abstract process(conn: Connection): Promise<unknown>;
}

/** Builds a stage around the next handler in the chain. */
export type StageFactory = (inner: Handler) => Stage;

/**
 * Wrap `handler` in the given stages.
 *
 * The first factory becomes the outermost stage: it sees each connection
 * first, and `handler` sees it last.
 */
export function combine(handler: HandlerLike, ...factories: StageFactory[]): Handler {
	let current = toHandler(handler);
	for (const factory of [...factories].reverse()) {
		current = factory(current);
	}
	return current;
}
