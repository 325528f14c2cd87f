// ---------------------------------------------------------------------------
// App: canonical stage ordering for request/response applications
// ---------------------------------------------------------------------------

import type { ConnectionScope, Receive, Send } from "@ferry/core";
import { ConfigurationError, Logger } from "@ferry/core";
import { type AppConfig, loadConfig } from "./config";
import {
	type Connection,
	combine,
	type Handler,
	type LifespanCallback,
	LifespanStage,
	RequestStage,
	requestFor,
	ResponseStage,
	RouterStage,
	type StageFactory,
} from "./middleware";
import { notFoundResponse } from "./response";
import type { Route, RouteHandler, RouteMethods } from "./router";

/** Options for {@link createApp}. Explicit values override the environment. */
export interface AppOptions extends Partial<AppConfig> {
	/** Runs when no route matches; renders the 404 page when omitted. */
	fallback?: RouteHandler;
	/** User stages, outermost first; they sit between the two response stages. */
	stages?: readonly StageFactory[];
	onStartup?: LifespanCallback | readonly LifespanCallback[];
	onShutdown?: LifespanCallback | readonly LifespanCallback[];
	logger?: Logger;
	/** Environment to read configuration from (default `process.env`). */
	env?: Record<string, string | undefined>;
}

function fallbackHandler(fallback: RouteHandler | undefined): Handler {
	return {
		handle: async (conn: Connection) => {
			const request = requestFor(conn);
			if (!fallback || !request) return notFoundResponse();
			return fallback(request);
		},
	};
}

/**
 * A request/response application.
 *
 * Stages, outermost first: lifespan → request facade → response (send) →
 * user stages → response (prepare only) → router → fallback. Lifespan
 * connections therefore never reach the router, the facade exists before
 * any user stage runs, and whatever user stages return is normalized
 * before it is sent.
 *
 * @example
 * ```ts
 * const app = createApp({ onStartup: () => pool.connect() });
 * app.route("/users/{id}", async (request) => ({ id: request.pathParams.id }), "GET");
 * await app.call(scope, receive, send);
 * ```
 */
export class App implements Handler {
	readonly config: AppConfig;
	readonly logger: Logger;
	readonly lifespan: LifespanStage;
	readonly router: RouterStage;
	private readonly chain: Handler;

	constructor(options: AppOptions = {}) {
		const loaded = loadConfig(options.env);
		this.config = {
			logLevel: options.logLevel ?? loaded.logLevel,
			trimLastSlash: options.trimLastSlash ?? loaded.trimLastSlash,
		};
		this.logger = options.logger ?? new Logger(this.config.logLevel, { component: "ferry" });
		const logger = this.logger;

		this.chain = combine(
			fallbackHandler(options.fallback),
			(inner) =>
				new LifespanStage(inner, {
					onStartup: options.onStartup,
					onShutdown: options.onShutdown,
					logger: logger.child({ stage: "lifespan" }),
				}),
			(inner) => new RequestStage(inner),
			(inner) => new ResponseStage(inner, { logger: logger.child({ stage: "response" }) }),
			...(options.stages ?? []),
			(inner) =>
				new ResponseStage(inner, {
					prepareOnly: true,
					logger: logger.child({ stage: "response" }),
				}),
			(inner) =>
				new RouterStage(inner, {
					trimLastSlash: this.config.trimLastSlash,
					logger: logger.child({ stage: "router" }),
				}),
		);

		const lifespan = this.chain instanceof LifespanStage ? this.chain : undefined;
		const router = lifespan?.find(RouterStage);
		if (!lifespan || !router) {
			throw new ConfigurationError("A user stage replaced the lifespan or router stage");
		}
		this.lifespan = lifespan;
		this.router = router;
	}

	handle(conn: Connection): Promise<unknown> {
		return this.chain.handle(conn);
	}

	/** Transport entry point: one call per connection. */
	async call(scope: ConnectionScope, receive: Receive, send: Send): Promise<void> {
		await this.handle({ scope, receive, send });
	}

	route(pattern: string, handler: RouteHandler, methods?: RouteMethods): Route {
		return this.router.route(pattern, handler, methods);
	}

	onStartup(callback: LifespanCallback): void {
		this.lifespan.onStartup(callback);
	}

	onShutdown(callback: LifespanCallback): void {
		this.lifespan.onShutdown(callback);
	}
}

/** Build an {@link App} with the canonical stage ordering. */
export function createApp(options: AppOptions = {}): App {
	return new App(options);
}
