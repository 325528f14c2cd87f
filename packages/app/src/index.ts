export { App, type AppOptions, createApp } from "./app";
export { type AppConfig, DEFAULT_APP_CONFIG, loadConfig } from "./config";
export {
	type FormFields,
	type FormValue,
	parseMultipart,
	parseUrlEncoded,
	type UploadFile,
} from "./form";
export * from "./middleware";
export { type PathParams, Request } from "./request";
export {
	HTMLResponse,
	isSendable,
	JSONResponse,
	notFoundResponse,
	PlainTextResponse,
	parseResponse,
	RedirectResponse,
	Response,
	type ResponseContent,
	type ResponseInit,
	type Sendable,
} from "./response";
export {
	type Route,
	type RouteHandler,
	type RouteMatch,
	type RouteMethods,
	Router,
	type RouterOptions,
} from "./router";
