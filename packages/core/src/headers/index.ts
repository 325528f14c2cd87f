export { parseCookieHeader, unquoteCookieValue } from "./cookies";
export { CIMultiDict, MultiDict } from "./multidict";
export { DEFAULT_CHARSET, type OptionsHeader, parseOptionsHeader } from "./options";
export { nullRecord } from "./record";
