export {
	type AsyncLifespanCallback,
	type LifespanCallback,
	LifespanCycle,
	LifespanStage,
	type LifespanStageConfig,
	type LifespanState,
} from "./lifespan-stage";
export { RequestStage, requestFor } from "./request-stage";
export { ResponseStage, type ResponseStageConfig } from "./response-stage";
export { RouterStage, type RouterStageConfig } from "./router-stage";
export { combine, notFoundHandler, REQUEST_SCOPES, Stage, type StageFactory } from "./stage";
export { type Connection, type Handler, type HandlerFn, type HandlerLike, toHandler } from "./types";
