/**
 * Byte helpers for the wire format.
 *
 * Header names and values, query strings and raw paths travel as bytes and
 * are interpreted as latin-1 so that every byte maps to exactly one code unit.
 */

/** Decode bytes as latin-1 (ISO-8859-1). */
export function decodeLatin1(bytes: Uint8Array): string {
	let out = "";
	for (let i = 0; i < bytes.length; i += 0x2000) {
		out += String.fromCharCode(...bytes.subarray(i, i + 0x2000));
	}
	return out;
}

/** Encode a string as latin-1; code units above 0xff are truncated to their low byte. */
export function encodeLatin1(value: string): Uint8Array {
	const bytes = new Uint8Array(value.length);
	for (let i = 0; i < value.length; i++) {
		bytes[i] = value.charCodeAt(i) & 0xff;
	}
	return bytes;
}

const utf8Encoder = new TextEncoder();

/** Encode a string as UTF-8. */
export function encodeUtf8(value: string): Uint8Array {
	return utf8Encoder.encode(value);
}

/** Concatenate chunks in order into a single buffer. */
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
	if (chunks.length === 1 && chunks[0]) return chunks[0];
	let total = 0;
	for (const chunk of chunks) total += chunk.length;
	const out = new Uint8Array(total);
	let offset = 0;
	for (const chunk of chunks) {
		out.set(chunk, offset);
		offset += chunk.length;
	}
	return out;
}

const HEX_PAIR_RE = /^[0-9a-fA-F]{2}$/;

/**
 * Percent-decode a string to bytes.
 *
 * `%XX` escapes become the byte they name; every other run of characters
 * goes through `encode` (UTF-8 by default, {@link encodeLatin1} when the
 * string already holds one byte per code unit). Malformed escapes are kept
 * literally.
 */
export function unquoteToBytes(
	value: string,
	encode: (text: string) => Uint8Array = encodeUtf8,
): Uint8Array {
	const chunks: Uint8Array[] = [];
	let literal = "";
	let i = 0;
	while (i < value.length) {
		const pair = value.slice(i + 1, i + 3);
		if (value[i] === "%" && HEX_PAIR_RE.test(pair)) {
			if (literal) {
				chunks.push(encode(literal));
				literal = "";
			}
			chunks.push(Uint8Array.of(Number.parseInt(pair, 16)));
			i += 3;
			continue;
		}
		literal += value[i];
		i++;
	}
	if (literal) chunks.push(encode(literal));
	return concatBytes(chunks);
}

// WHATWG decoders map these labels to windows-1252, which never fails and
// remaps 0x80-0x9f, so they are decoded here instead.
const LATIN1_LABELS = new Set(["latin1", "latin-1", "iso-8859-1", "iso8859-1", "l1"]);
const ASCII_LABELS = new Set(["ascii", "us-ascii"]);

/**
 * Strictly decode bytes in `charset`.
 *
 * @throws TypeError for bytes the charset cannot represent.
 * @throws RangeError for an unknown charset label.
 */
export function decodeBytes(bytes: Uint8Array, charset: string): string {
	const label = charset.trim().toLowerCase();
	if (LATIN1_LABELS.has(label)) return decodeLatin1(bytes);
	if (ASCII_LABELS.has(label)) {
		const offset = bytes.findIndex((byte) => byte > 0x7f);
		if (offset !== -1) throw new TypeError(`Byte at offset ${offset} is not ASCII`);
		return decodeLatin1(bytes);
	}
	return new TextDecoder(label, { fatal: true }).decode(bytes);
}
