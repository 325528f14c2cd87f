import { decodeBytes, unquoteToBytes } from "../bytes";
import { nullRecord } from "./record";

/** Charset assumed when a header does not declare one. */
export const DEFAULT_CHARSET = "utf-8";

/** Primary value plus its `;`-separated parameters. */
export type OptionsHeader = [value: string, options: Record<string, string>];

/**
 * One parameter of a structured header (RFC 2231):
 * `key=value`, `key*N=value` (continuation) or `key*=charset'lang'value`
 * (extended notation). Values may be quoted strings.
 */
const OPTION_PIECE_RE =
	/^\s*,?\s*(?<key>"[^"\\]*(?:\\.[^"\\]*)*"|[^\s;,=*]+)(?:\*(?<count>\d+))?\s*(?:(?:\*\s*=\s*(?:(?<encoding>[^\s]+?)'(?<language>[^\s]*?)')?|=\s*)(?<value>"[^"\\]*(?:\\.[^"\\]*)*"|[^;,]+)?)?\s*;?/;

/** Strip surrounding quotes and blanks, then unescape `\\` and `\"`. */
function unquoteOption(value: string): string {
	return value.replace(/^[" ]+|[" ]+$/g, "").replace(/\\\\/g, "\\").replace(/\\"/g, '"');
}

/**
 * Parse a structured header such as `content-type` or `content-disposition`.
 *
 * Continuation fragments are joined in numeric order; extended values are
 * percent-decoded and then decoded with their declared charset. Option keys
 * are lower-cased. Parsing is best effort: the first fragment that does not
 * fit the grammar (or names a charset that cannot be decoded) ends it and
 * whatever was parsed so far is returned.
 *
 * @example
 * ```ts
 * parseOptionsHeader("text/plain; charset=utf-8");
 * // => ["text/plain", { charset: "utf-8" }]
 * ```
 */
export function parseOptionsHeader(header: string | null | undefined): OptionsHeader {
	const options = nullRecord<string>();
	if (!header) return ["", options];

	const separator = header.indexOf(";");
	if (separator === -1) return [header.trim(), options];

	const value = header.slice(0, separator).trim();
	const continuations = new Map<string, Array<[index: number, fragment: string]>>();
	let rest = header.slice(separator + 1);

	while (rest) {
		const match = OPTION_PIECE_RE.exec(rest);
		const groups = match?.groups;
		if (!match || !groups || match[0].length === 0) break;
		rest = rest.slice(match[0].length);

		const key = groups.key?.toLowerCase();
		if (!key) break;

		let raw = groups.value;
		if (raw === undefined) {
			options[key] = "";
			continue;
		}

		if (groups.encoding !== undefined) {
			const decoded = decodeExtended(raw, groups.encoding);
			if (decoded === null) break;
			raw = decoded;
		}

		const fragment = unquoteOption(raw);
		if (groups.count !== undefined) {
			const parts = continuations.get(key) ?? [];
			parts.push([Number(groups.count), fragment]);
			continuations.set(key, parts);
			continue;
		}
		options[key] = fragment;
	}

	for (const [key, parts] of continuations) {
		parts.sort((a, b) => a[0] - b[0]);
		options[key] = parts.map(([, fragment]) => fragment).join("");
	}

	return [value, options];
}

function decodeExtended(value: string, encoding: string): string | null {
	try {
		return decodeBytes(unquoteToBytes(value), encoding);
	} catch {
		return null;
	}
}
