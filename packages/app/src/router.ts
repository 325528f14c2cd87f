// ---------------------------------------------------------------------------
// Router: path pattern matching and route dispatch
// ---------------------------------------------------------------------------

import {
	ConfigurationError,
	Err,
	isAsyncFunction,
	MethodNotAllowedError,
	Ok,
	type Result,
	RouteNotFoundError,
} from "@ferry/core";
import type { PathParams, Request } from "./request";

/** An async route handler; its return value is normalized into a response. */
export type RouteHandler = (request: Request) => Promise<unknown>;

/** Methods a route accepts: one, several, or any when omitted. */
export type RouteMethods = string | readonly string[] | undefined;

/** A registered route. */
export interface Route {
	readonly pattern: string;
	/** Upper-cased methods, `null` when the route accepts any method. */
	readonly methods: ReadonlySet<string> | null;
	readonly handler: RouteHandler;
}

/** Result of a successful dispatch. */
export interface RouteMatch {
	readonly route: Route;
	readonly pattern: string;
	readonly handler: RouteHandler;
	readonly params: PathParams;
}

/** Options for {@link Router}. */
export interface RouterOptions {
	/** Ignore a trailing slash on dispatched paths (default false). */
	trimLastSlash?: boolean;
}

interface CompiledRoute {
	readonly route: Route;
	readonly regex: RegExp;
}

/** Regex source for each segment type usable as `{name:type}`. */
const SEGMENT_TYPES: ReadonlyMap<string, string> = new Map([
	["str", "[^/]+"],
	["int", "\\d+"],
	["path", ".*"],
]);

const PARAM_NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

function escapeRegex(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Compile `/users/{id}/files/{rest:path}` into an anchored regex with one
 * named group per segment.
 */
function compilePattern(pattern: string): RegExp {
	const names = new Set<string>();
	let source = "";
	let cursor = 0;
	while (cursor < pattern.length) {
		const open = pattern.indexOf("{", cursor);
		const stray = pattern.indexOf("}", cursor);
		if (open === -1) {
			if (stray !== -1) throw new ConfigurationError(`Unbalanced "}" in route pattern "${pattern}"`);
			source += escapeRegex(pattern.slice(cursor));
			break;
		}
		if (stray !== -1 && stray < open) {
			throw new ConfigurationError(`Unbalanced "}" in route pattern "${pattern}"`);
		}
		const close = pattern.indexOf("}", open);
		if (close === -1) throw new ConfigurationError(`Unbalanced "{" in route pattern "${pattern}"`);

		const [name = "", type = "str"] = pattern.slice(open + 1, close).split(":", 2);
		if (!PARAM_NAME_RE.test(name)) {
			throw new ConfigurationError(`Invalid parameter name "${name}" in route pattern "${pattern}"`);
		}
		if (names.has(name)) {
			throw new ConfigurationError(`Duplicate parameter name "${name}" in route pattern "${pattern}"`);
		}
		names.add(name);
		const segment = SEGMENT_TYPES.get(type);
		if (segment === undefined) {
			throw new ConfigurationError(`Unknown segment type "${type}" in route pattern "${pattern}"`);
		}
		source += `${escapeRegex(pattern.slice(cursor, open))}(?<${name}>${segment})`;
		cursor = close + 1;
	}
	return new RegExp(`^${source}$`);
}

function normalizeMethods(methods: RouteMethods): ReadonlySet<string> | null {
	if (methods === undefined) return null;
	const list = typeof methods === "string" ? [methods] : methods;
	if (list.length === 0) return null;
	return new Set(list.map((method) => method.toUpperCase()));
}

/**
 * Route table mapping (path pattern, methods) to async handlers.
 *
 * Static patterns are matched first by exact lookup, then dynamic patterns
 * in registration order. Methods are plain strings, so custom methods such
 * as `PROPFIND` route like any other.
 *
 * @example
 * ```ts
 * const router = new Router();
 * router.route("/users/{id:int}", async (request) => ({ id: request.pathParams.id }), "GET");
 * const match = router.dispatch("/users/42", "GET");
 * // match.ok && match.value.params => { id: "42" }
 * ```
 */
export class Router {
	private readonly trimLastSlash: boolean;
	private readonly staticRoutes = new Map<string, Route[]>();
	private readonly dynamicRoutes: CompiledRoute[] = [];
	private readonly ordered: Route[] = [];

	constructor(options: RouterOptions = {}) {
		this.trimLastSlash = options.trimLastSlash ?? false;
	}

	/** Every registered route, in registration order. */
	get routes(): readonly Route[] {
		return this.ordered;
	}

	/**
	 * Add a route.
	 *
	 * @throws ConfigurationError when `handler` is not an async function or
	 * the pattern is malformed. Registration is rejected up front so a bad
	 * route never reaches request time.
	 */
	register(pattern: string, methods: RouteMethods, handler: RouteHandler): Route {
		if (!isAsyncFunction(handler)) {
			throw new ConfigurationError(`Route handler for "${pattern}" has to be an async function`);
		}
		const route: Route = { pattern, methods: normalizeMethods(methods), handler };

		if (pattern.includes("{") || pattern.includes("}")) {
			this.dynamicRoutes.push({ route, regex: compilePattern(pattern) });
		} else {
			const routes = this.staticRoutes.get(pattern) ?? [];
			routes.push(route);
			this.staticRoutes.set(pattern, routes);
		}
		this.ordered.push(route);
		return route;
	}

	/** Shorthand for {@link register} with the handler before the methods. */
	route(pattern: string, handler: RouteHandler, methods?: RouteMethods): Route {
		return this.register(pattern, methods, handler);
	}

	/**
	 * Find the handler for `path` and `method`.
	 *
	 * Returns `MethodNotAllowedError` when some route matches the path but
	 * none accepts the method, `RouteNotFoundError` when nothing matches.
	 */
	dispatch(path: string, method: string): Result<RouteMatch, RouteNotFoundError> {
		const target = this.trimLastSlash && path.length > 1 && path.endsWith("/") ? path.slice(0, -1) : path;
		const wanted = method.toUpperCase();
		const allowed = new Set<string>();

		for (const route of this.staticRoutes.get(target) ?? []) {
			if (accepts(route, wanted)) {
				return Ok({ route, pattern: route.pattern, handler: route.handler, params: {} });
			}
			collectMethods(route, allowed);
		}

		for (const { route, regex } of this.dynamicRoutes) {
			const match = regex.exec(target);
			if (!match) continue;
			if (accepts(route, wanted)) {
				return Ok({
					route,
					pattern: route.pattern,
					handler: route.handler,
					params: { ...match.groups },
				});
			}
			collectMethods(route, allowed);
		}

		if (allowed.size > 0) return Err(new MethodNotAllowedError(target, wanted, [...allowed]));
		return Err(new RouteNotFoundError(target, wanted));
	}
}

function accepts(route: Route, method: string): boolean {
	return route.methods === null || route.methods.has(method);
}

function collectMethods(route: Route, into: Set<string>): void {
	for (const method of route.methods ?? []) into.add(method);
}
