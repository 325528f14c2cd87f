import {
	CIMultiDict,
	DEFAULT_CHARSET,
	decodeBytes,
	decodeLatin1,
	encodeLatin1,
	MultiDict,
	parseOptionsHeader,
	unquoteToBytes,
} from "@ferry/core";

/** A file field from a multipart form. */
export interface UploadFile {
	/** Form field the file was sent under. */
	readonly name: string;
	readonly filename: string;
	readonly contentType: string;
	readonly content: Uint8Array;
}

/** Value of one form field. */
export type FormValue = string | UploadFile;

/** Decoded form data; a field may repeat. */
export type FormFields = MultiDict<FormValue>;

function decodeComponent(raw: string, charset: string): string {
	return decodeBytes(unquoteToBytes(raw.replace(/\+/g, " "), encodeLatin1), charset);
}

/**
 * Parse an `application/x-www-form-urlencoded` body, keeping blank values.
 *
 * Pairs are split on `&` and then once on `=`; `+` means a space, and
 * percent escapes are decoded as bytes in `charset`.
 */
export function parseUrlEncoded(body: Uint8Array, charset: string = DEFAULT_CHARSET): FormFields {
	const form: FormFields = new MultiDict<FormValue>();
	for (const pair of decodeLatin1(body).split("&")) {
		if (!pair) continue;
		const eq = pair.indexOf("=");
		const name = eq === -1 ? pair : pair.slice(0, eq);
		const value = eq === -1 ? "" : pair.slice(eq + 1);
		form.append(decodeComponent(name, charset), decodeComponent(value, charset));
	}
	return form;
}

function parsePartHeaders(block: string): CIMultiDict<string> {
	const headers = new CIMultiDict<string>();
	for (const line of block.split("\r\n")) {
		const colon = line.indexOf(":");
		if (colon === -1) continue;
		headers.append(line.slice(0, colon).trim(), line.slice(colon + 1).trim());
	}
	return headers;
}

/**
 * Parse a `multipart/form-data` body.
 *
 * A minimal parser: one level of parts, CRLF line breaks, no
 * `Content-Transfer-Encoding`. Parts without a `name` are skipped; parts with
 * a `filename` become {@link UploadFile}s, the rest are decoded with
 * `charset`. Throws on a missing boundary or a part without a header block.
 */
export function parseMultipart(body: Uint8Array, boundary: string, charset: string): FormFields {
	if (!boundary) throw new Error("Multipart boundary is missing");

	// latin-1 keeps a 1:1 mapping between bytes and code units
	const sections = decodeLatin1(body).split(`--${boundary}`);
	if (sections.length < 2) throw new Error("Multipart boundary not found in body");

	const form: FormFields = new MultiDict<FormValue>();

	for (const section of sections.slice(1)) {
		if (section.startsWith("--")) break;
		const part = section.startsWith("\r\n") ? section.slice(2) : section;

		let headerBlock = "";
		let payload: string;
		if (part.startsWith("\r\n")) {
			payload = part.slice(2);
		} else {
			const end = part.indexOf("\r\n\r\n");
			if (end === -1) throw new Error("Multipart part has no header terminator");
			headerBlock = part.slice(0, end);
			payload = part.slice(end + 4);
		}
		if (payload.endsWith("\r\n")) payload = payload.slice(0, -2);

		const headers = parsePartHeaders(decodeBytes(encodeLatin1(headerBlock), charset));
		const [, disposition] = parseOptionsHeader(headers.get("content-disposition"));
		const name = disposition.name;
		if (name === undefined) continue;

		const content = encodeLatin1(payload);
		if (disposition.filename !== undefined) {
			form.append(name, {
				name,
				filename: disposition.filename,
				contentType: headers.get("content-type") ?? "application/octet-stream",
				content,
			});
		} else {
			form.append(name, decodeBytes(content, charset));
		}
	}

	return form;
}
