import { ConfigurationError, Logger, type ScopeType } from "@ferry/core";
import { describe, expect, it } from "vitest";
import { createApp } from "../app";
import {
	type Connection,
	combine,
	notFoundHandler,
	RequestStage,
	ResponseStage,
	RouterStage,
	REQUEST_SCOPES,
	Stage,
} from "../middleware";
import { RedirectResponse, Response } from "../response";
import {
	bodyReceive,
	httpScope,
	lifespanScope,
	queuedReceive,
	websocketScope,
	recordingSend,
	summarize,
} from "./helpers";

const quiet = () => new Logger("error", {}, () => {});

/** Adds a header to every normalized response on its way out. */
class PoweredByStage extends Stage {
	readonly scopes: ReadonlySet<ScopeType> = REQUEST_SCOPES;

	protected async process(conn: Connection): Promise<unknown> {
		const result = await this.inner.handle(conn);
		if (result instanceof Response) result.headers.set("x-powered-by", "ferry");
		return result;
	}
}

describe("hand-assembled chain", () => {
	it("routes a request through the request, response and router stages", async () => {
		const handler = combine(
			notFoundHandler,
			(inner) => new RequestStage(inner),
			(inner) => new ResponseStage(inner, { logger: quiet() }),
			(inner) => new RouterStage(inner, { logger: quiet() }),
		);
		if (!(handler instanceof Stage)) throw new Error("expected a stage");
		handler.find(RouterStage)?.route("/test", async () => ({}), "PATCH");

		const send = recordingSend();
		await handler.handle({
			scope: httpScope({ method: "PATCH", path: "/test" }),
			receive: bodyReceive(),
			send,
		});

		expect(summarize(send.events)).toEqual({
			status: 200,
			headers: [
				["content-type", "application/json"],
				["content-length", "2"],
			],
			body: "{}",
		});
	});
});

describe("createApp", () => {
	it("sends the value a route returns", async () => {
		const app = createApp({ env: {}, logger: quiet() });
		app.route("/users/{id:int}", async (request) => ({ id: request.pathParams.id }), "GET");

		const send = recordingSend();
		await app.call(httpScope({ path: "/users/7" }), bodyReceive(), send);

		expect(summarize(send.events)).toEqual({
			status: 200,
			headers: [
				["content-type", "application/json"],
				["content-length", "10"],
			],
			body: '{"id":"7"}',
		});
	});

	it("renders the not-found page when nothing matches", async () => {
		const app = createApp({ env: {}, logger: quiet() });
		const send = recordingSend();
		await app.call(httpScope({ path: "/missing" }), bodyReceive(), send);

		const response = summarize(send.events);
		expect(response.status).toBe(404);
		expect(response.body).toBe("Not Found");
	});

	it("runs the fallback for unmatched requests", async () => {
		const app = createApp({
			env: {},
			logger: quiet(),
			fallback: async (request) => `missing ${request.path}`,
		});
		app.route("/only", async () => "only", "POST");

		const send = recordingSend();
		await app.call(httpScope({ path: "/only" }), bodyReceive(), send);

		expect(summarize(send.events)).toMatchObject({ status: 200, body: "missing /only" });
	});

	it("answers a body that cannot be decoded with 400", async () => {
		const lines: string[] = [];
		const app = createApp({ env: {}, logger: new Logger("info", {}, (line) => lines.push(line)) });
		app.route("/echo", async (request) => request.json(), "POST");

		const send = recordingSend();
		await app.call(httpScope({ method: "POST", path: "/echo" }), bodyReceive("{"), send);

		expect(summarize(send.events)).toEqual({
			status: 400,
			headers: [
				["content-type", "text/plain; charset=utf-8"],
				["content-length", "12"],
			],
			body: "Invalid JSON",
		});
		expect(lines).toHaveLength(1);
		expect(JSON.parse(lines[0]!)).toMatchObject({
			level: "info",
			msg: "request body rejected",
			stage: "response",
			code: "INVALID_JSON",
			purpose: "json",
		});
	});

	it("sends a response thrown by a handler", async () => {
		const app = createApp({ env: {}, logger: quiet() });
		app.route("/private", async () => {
			throw new RedirectResponse("/login");
		});

		const send = recordingSend();
		await app.call(httpScope({ path: "/private" }), bodyReceive(), send);

		expect(summarize(send.events)).toMatchObject({
			status: 307,
			headers: [
				["location", "/login"],
				["content-length", "0"],
			],
		});
	});

	it("sends nothing when a handler returns null", async () => {
		const app = createApp({ env: {}, logger: quiet() });
		app.route("/quiet", async () => null);

		const send = recordingSend();
		await app.call(httpScope({ path: "/quiet" }), bodyReceive(), send);
		expect(send.events).toEqual([]);
	});

	it("propagates other handler errors", async () => {
		const app = createApp({ env: {}, logger: quiet() });
		app.route("/boom", async () => {
			throw new Error("boom");
		});

		await expect(
			app.call(httpScope({ path: "/boom" }), bodyReceive(), recordingSend()),
		).rejects.toThrow("boom");
	});

	it("gives user stages the normalized response", async () => {
		const app = createApp({
			env: {},
			logger: quiet(),
			stages: [(inner) => new PoweredByStage(inner)],
		});
		app.route("/", async () => "home");

		const send = recordingSend();
		await app.call(httpScope(), bodyReceive(), send);

		expect(summarize(send.events)).toEqual({
			status: 200,
			headers: [
				["content-type", "text/plain; charset=utf-8"],
				["x-powered-by", "ferry"],
				["content-length", "4"],
			],
			body: "home",
		});
	});

	it("sends no response events on an unmatched message-stream connection", async () => {
		const app = createApp({ env: {}, logger: quiet() });
		app.route("/live", async () => "only over http");

		const send = recordingSend();
		await app.call(
			websocketScope({ path: "/nope" }),
			queuedReceive([{ type: "websocket.connect" }]),
			send,
		);
		expect(send.events).toEqual([]);
	});

	it("leaves replies on message-stream routes to the handler", async () => {
		const app = createApp({ env: {}, logger: quiet() });
		app.route("/live", async (request) => {
			await request.send?.({ type: "websocket.accept" });
			return { ignored: true };
		});

		const send = recordingSend();
		await app.call(websocketScope({ path: "/live" }), queuedReceive([]), send);
		expect(send.events).toEqual([{ type: "websocket.accept" }]);
	});

	it("runs lifespan callbacks without touching the router", async () => {
		const order: string[] = [];
		const app = createApp({
			env: {},
			logger: quiet(),
			onStartup: () => order.push("startup"),
			fallback: async () => {
				order.push("fallback");
				return null;
			},
		});
		app.onShutdown(() => order.push("shutdown"));

		const send = recordingSend();
		await app.call(
			lifespanScope,
			queuedReceive([{ type: "lifespan.startup" }, { type: "lifespan.shutdown" }]),
			send,
		);

		expect(order).toEqual(["startup", "shutdown"]);
		expect(send.events.map((event) => event.type)).toEqual([
			"lifespan.startup.complete",
			"lifespan.shutdown.complete",
		]);
	});

	it("reads settings from the environment", async () => {
		const app = createApp({ env: { FERRY_TRIM_LAST_SLASH: "true" }, logger: quiet() });
		app.route("/items", async () => "items");

		const send = recordingSend();
		await app.call(httpScope({ path: "/items/" }), bodyReceive(), send);
		expect(summarize(send.events).body).toBe("items");
	});

	it("lets explicit options win over the environment", () => {
		const app = createApp({ env: { FERRY_LOG_LEVEL: "debug" }, logLevel: "error" });
		expect(app.config).toEqual({ logLevel: "error", trimLastSlash: false });
		expect(app.logger.level).toBe("error");
	});

	it("refuses a user stage that drops the rest of the chain", () => {
		expect(() => createApp({ env: {}, stages: [() => new RequestStage()] })).toThrow(
			ConfigurationError,
		);
	});
});
