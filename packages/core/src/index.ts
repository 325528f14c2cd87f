export { isAsyncFunction, toAsync } from "./async";
export {
	concatBytes,
	decodeBytes,
	decodeLatin1,
	encodeLatin1,
	encodeUtf8,
	unquoteToBytes,
} from "./bytes";
export * from "./headers";
export {
	defaultLogger,
	isLogLevel,
	type LogEntry,
	LOG_LEVELS,
	Logger,
	type LogLevel,
} from "./logger";
export * from "./protocol";
export * from "./result";
