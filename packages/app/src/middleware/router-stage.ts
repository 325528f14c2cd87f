import { defaultLogger, type Logger, type ScopeType } from "@ferry/core";
import type { Route, RouteHandler, RouteMethods } from "../router";
import { Router } from "../router";
import { requestFor } from "./request-stage";
import { REQUEST_SCOPES, Stage } from "./stage";
import type { Connection, HandlerLike } from "./types";

/** Configuration for {@link RouterStage}. */
export interface RouterStageConfig {
	/** Routes to register up front, keyed by pattern; they accept any method. */
	routes?: Record<string, RouteHandler>;
	/** Ignore a trailing slash on dispatched paths (default false). */
	trimLastSlash?: boolean;
	logger?: Logger;
}

/**
 * Dispatches request connections to the matching route handler.
 *
 * A routing miss is not an error: the inner handler runs instead, with
 * empty path parameters.
 */
export class RouterStage extends Stage {
	readonly scopes: ReadonlySet<ScopeType> = REQUEST_SCOPES;
	readonly router: Router;
	private readonly logger: Logger;

	constructor(inner?: HandlerLike, config: RouterStageConfig = {}) {
		super(inner);
		this.router = new Router({ trimLastSlash: config.trimLastSlash });
		this.logger = config.logger ?? defaultLogger;
		for (const [pattern, handler] of Object.entries(config.routes ?? {})) {
			this.router.register(pattern, undefined, handler);
		}
	}

	/** Register a route on this stage's router. */
	route(pattern: string, handler: RouteHandler, methods?: RouteMethods): Route {
		return this.router.register(pattern, methods, handler);
	}

	protected async process(conn: Connection): Promise<unknown> {
		const request = requestFor(conn);
		if (!request) return this.inner.handle(conn);

		const path = request.scope.rootPath + request.path;
		const match = this.router.dispatch(path, request.method);
		if (match.ok) {
			request.bindPathParams(match.value.params);
			return match.value.handler(request);
		}

		this.logger.debug("no route matched, using fallback", {
			path,
			method: request.method,
			code: match.error.code,
		});
		request.bindPathParams({});
		return this.inner.handle({ ...conn, request });
	}
}
