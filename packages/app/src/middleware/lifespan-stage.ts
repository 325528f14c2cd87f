// ---------------------------------------------------------------------------
// Lifespan: process startup/shutdown state machine
// ---------------------------------------------------------------------------

import {
	defaultLogger,
	LifecycleError,
	type Logger,
	type Receive,
	type ScopeType,
	type Send,
	toAsync,
} from "@ferry/core";
import { Stage } from "./stage";
import type { Connection, HandlerLike } from "./types";

/** A startup or shutdown callback; sync callbacks are coerced to async on registration. */
export type LifespanCallback = () => unknown;

/** Async form every registered callback is stored in. */
export type AsyncLifespanCallback = () => Promise<unknown>;

/** Where the lifecycle of one lifespan connection stands. */
export type LifespanState = "idle" | "started" | "stopped";

/** Configuration for {@link LifespanStage}. */
export interface LifespanStageConfig {
	onStartup?: LifespanCallback | readonly LifespanCallback[];
	onShutdown?: LifespanCallback | readonly LifespanCallback[];
	logger?: Logger;
}

function toList(
	callbacks: LifespanCallback | readonly LifespanCallback[] | undefined,
): readonly LifespanCallback[] {
	if (callbacks === undefined) return [];
	return typeof callbacks === "function" ? [callbacks] : callbacks;
}

/**
 * State machine for one lifespan connection: `idle → started → stopped`.
 *
 * Owns its receive loop. A startup signal runs every startup callback in
 * order, one at a time, then acknowledges; a shutdown signal does the same
 * with the shutdown callbacks and ends the loop. A throwing callback aborts
 * the phase: later callbacks do not run, no acknowledgement is sent, and
 * the error propagates to the caller.
 */
export class LifespanCycle {
	private current: LifespanState = "idle";

	constructor(
		private readonly startup: readonly AsyncLifespanCallback[],
		private readonly shutdown: readonly AsyncLifespanCallback[],
		private readonly logger: Logger = defaultLogger,
	) {}

	get state(): LifespanState {
		return this.current;
	}

	async run(receive: Receive, send: Send): Promise<void> {
		while (this.current !== "stopped") {
			const event = await receive();
			switch (event.type) {
				case "lifespan.startup":
					if (this.current !== "idle") {
						throw new LifecycleError(`Received lifespan.startup while ${this.current}`);
					}
					await runAll(this.startup);
					await send({ type: "lifespan.startup.complete" });
					this.current = "started";
					this.logger.debug("startup complete", { callbacks: this.startup.length });
					break;
				case "lifespan.shutdown":
					await runAll(this.shutdown);
					await send({ type: "lifespan.shutdown.complete" });
					this.current = "stopped";
					this.logger.debug("shutdown complete", { callbacks: this.shutdown.length });
					break;
				default:
					this.logger.warn("ignoring unexpected lifespan event", { type: event.type });
			}
		}
	}
}

async function runAll(callbacks: readonly AsyncLifespanCallback[]): Promise<void> {
	for (const callback of callbacks) {
		await callback();
	}
}

/**
 * Handles lifespan connections with a {@link LifespanCycle}; every other
 * connection type passes straight through.
 */
export class LifespanStage extends Stage {
	readonly scopes: ReadonlySet<ScopeType> = new Set<ScopeType>(["lifespan"]);
	private readonly startupCallbacks: AsyncLifespanCallback[] = [];
	private readonly shutdownCallbacks: AsyncLifespanCallback[] = [];
	private readonly logger: Logger;

	constructor(inner?: HandlerLike, config: LifespanStageConfig = {}) {
		super(inner);
		this.logger = config.logger ?? defaultLogger;
		for (const callback of toList(config.onStartup)) this.onStartup(callback);
		for (const callback of toList(config.onShutdown)) this.onShutdown(callback);
	}

	/** Register a startup callback; runs after those registered before it. */
	onStartup(callback: LifespanCallback): void {
		this.startupCallbacks.push(toAsync(callback));
	}

	/** Register a shutdown callback; runs after those registered before it. */
	onShutdown(callback: LifespanCallback): void {
		this.shutdownCallbacks.push(toAsync(callback));
	}

	protected async process(conn: Connection): Promise<void> {
		const cycle = new LifespanCycle(
			[...this.startupCallbacks],
			[...this.shutdownCallbacks],
			this.logger,
		);
		await cycle.run(conn.receive, conn.send);
	}
}
