import { nullRecord } from "./record";

const OCTAL_OR_ESCAPE_RE = /\\(?:([0-3][0-7][0-7])|(.))/g;

/**
 * Undo cookie value quoting: a value wrapped in double quotes loses the
 * quotes, `\ooo` octal escapes become their character and any other
 * backslash escape becomes the escaped character. Unquoted values are
 * returned unchanged.
 */
export function unquoteCookieValue(value: string): string {
	if (value.length < 2 || !value.startsWith('"') || !value.endsWith('"')) return value;
	return value
		.slice(1, -1)
		.replace(OCTAL_OR_ESCAPE_RE, (_, octal: string | undefined, char: string | undefined) =>
			octal !== undefined ? String.fromCharCode(Number.parseInt(octal, 8)) : (char ?? ""),
		);
}

/**
 * Parse a `cookie` request header into a name → value mapping.
 *
 * Fragments are split on `;` and then once on the first `=`; names and
 * values are trimmed. Fragments without a name are skipped, and a later
 * cookie with the same name overwrites an earlier one. The mapping has no
 * prototype, so every name is stored as an ordinary key.
 */
export function parseCookieHeader(header: string | null | undefined): Record<string, string> {
	const cookies = nullRecord<string>();
	if (!header) return cookies;

	for (const chunk of header.split(";")) {
		const eq = chunk.indexOf("=");
		const name = (eq === -1 ? chunk : chunk.slice(0, eq)).trim();
		if (!name) continue;
		const value = eq === -1 ? "" : chunk.slice(eq + 1).trim();
		cookies[name] = unquoteCookieValue(value);
	}
	return cookies;
}
