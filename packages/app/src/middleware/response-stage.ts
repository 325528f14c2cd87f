import { DecodeError, defaultLogger, type Logger, type ScopeType } from "@ferry/core";
import { PlainTextResponse, parseResponse, Response, type Sendable } from "../response";
import { Stage } from "./stage";
import type { Connection, HandlerLike } from "./types";

/** Configuration for {@link ResponseStage}. */
export interface ResponseStageConfig {
	/** Return the normalized response instead of sending it (default false). */
	prepareOnly?: boolean;
	logger?: Logger;
}

/**
 * Normalizes whatever the inner handler returns into a sendable response.
 *
 * A thrown {@link Response} is used as the result, and a {@link DecodeError}
 * becomes a 400 plain-text response; other errors propagate. In the default
 * mode every event of the normalized response is sent to the transport; with
 * `prepareOnly` the response is returned for outer stages to post-process.
 * Only request/response connections are handled: message-stream handlers
 * talk to their transport through `send` themselves.
 */
export class ResponseStage extends Stage {
	readonly scopes: ReadonlySet<ScopeType> = new Set<ScopeType>(["http"]);
	readonly prepareOnly: boolean;
	private readonly logger: Logger;

	constructor(inner?: HandlerLike, config: ResponseStageConfig = {}) {
		super(inner);
		this.prepareOnly = config.prepareOnly ?? false;
		this.logger = config.logger ?? defaultLogger;
	}

	protected async process(conn: Connection): Promise<Sendable | null> {
		let result: unknown;
		try {
			result = await this.inner.handle(conn);
		} catch (err) {
			result = this.recover(err);
		}

		const response = parseResponse(result);
		if (response === null || this.prepareOnly) return response;

		for await (const event of response) {
			await conn.send(event);
		}
		return null;
	}

	private recover(err: unknown): Response {
		if (err instanceof Response) return err;
		if (err instanceof DecodeError) {
			this.logger.info("request body rejected", { code: err.code, purpose: err.purpose });
			return new PlainTextResponse(err.message, { status: err.status });
		}
		throw err;
	}
}
