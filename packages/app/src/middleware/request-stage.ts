import { isRequestScope, type ScopeType } from "@ferry/core";
import { Request } from "../request";
import { REQUEST_SCOPES, Stage } from "./stage";
import type { Connection } from "./types";

/** Bind the existing request facade, or a new one over the connection. */
export function requestFor(conn: Connection): Request | undefined {
	if (conn.request) return conn.request;
	if (!isRequestScope(conn.scope)) return undefined;
	return new Request(conn.scope, conn.receive, conn.send);
}

/** Binds a {@link Request} facade to request connections before the inner handler runs. */
export class RequestStage extends Stage {
	readonly scopes: ReadonlySet<ScopeType> = REQUEST_SCOPES;

	protected async process(conn: Connection): Promise<unknown> {
		const request = requestFor(conn);
		if (!request) return this.inner.handle(conn);
		return this.inner.handle({ ...conn, request });
	}
}
