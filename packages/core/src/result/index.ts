export {
	ConfigurationError,
	DecodeError,
	type DecodePurpose,
	FerryError,
	LifecycleError,
	MethodNotAllowedError,
	RouteNotFoundError,
	toError,
	UsageError,
} from "./errors";
export { Err, Ok, type Result, unwrapOrThrow } from "./result";
