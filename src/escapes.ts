/**
 * Fixture text escapes.
 *
 * Expression bodies arrive with the enclosing quote character escaped
 * (`\'` inside a single-quoted step). The expression syntax already accepts
 * every other escape the fixture format writes, so only that one sequence is
 * rewritten.
 */

import { InvalidPayloadError } from "./errors.ts";

/** The two delimiters a fixture step can quote an expression with. */
export type Quote = "'" | '"';

/**
 * Replace each `\` + `quote` with a bare `quote`.
 *
 * `\\` is consumed as one unit and copied unchanged, so a backslash that is
 * itself escaped never pairs with the following quote. That keeps the
 * rewrite idempotent.
 */
export function expandEscapes(text: string, quote: Quote): string {
	let out = "";
	let i = 0;
	while (i < text.length) {
		const ch = text.charAt(i);
		const next = text.charAt(i + 1);
		if (ch === "\\" && next === quote) {
			out += quote;
			i += 2;
		} else if (ch === "\\" && next === "\\") {
			out += "\\\\";
			i += 2;
		} else {
			out += ch;
			i += 1;
		}
	}
	return out;
}

const SIMPLE_BYTE_ESCAPES: Readonly<Record<string, number>> = {
	a: 0x07,
	b: 0x08,
	f: 0x0c,
	n: 0x0a,
	r: 0x0d,
	t: 0x09,
	v: 0x0b,
	"\\": 0x5c,
	"'": 0x27,
	'"': 0x22,
	"?": 0x3f,
};

const OCTAL = /^[0-7]{1,3}/;
const HEX = /^[0-9a-fA-F]{1,2}/;

/**
 * Decode a textproto bytes literal body into raw bytes.
 *
 * Escapes: the single-character set above, `\ooo` octal and `\xHH` hex.
 * Unescaped characters are UTF-8 encoded.
 */
export function decodeBytesLiteral(text: string): Uint8Array {
	const encoder = new TextEncoder();
	const out: number[] = [];
	let i = 0;
	while (i < text.length) {
		const ch = text[i];
		if (ch !== "\\") {
			const cp = text.codePointAt(i) ?? 0;
			const char = String.fromCodePoint(cp);
			out.push(...encoder.encode(char));
			i += char.length;
			continue;
		}

		const rest = text.slice(i + 1);
		const esc = rest[0];
		if (esc === undefined) {
			throw new InvalidPayloadError("bytes_value", "trailing backslash");
		}
		const simple = SIMPLE_BYTE_ESCAPES[esc];
		if (simple !== undefined) {
			out.push(simple);
			i += 2;
			continue;
		}
		const octal = OCTAL.exec(rest);
		if (octal !== null) {
			const byte = Number.parseInt(octal[0], 8);
			if (byte > 0xff) {
				throw new InvalidPayloadError("bytes_value", `octal escape \\${octal[0]} exceeds 0377`);
			}
			out.push(byte);
			i += 1 + octal[0].length;
			continue;
		}
		if (esc === "x" || esc === "X") {
			const hex = HEX.exec(rest.slice(1));
			if (hex === null) {
				throw new InvalidPayloadError("bytes_value", "\\x escape without hex digits");
			}
			out.push(Number.parseInt(hex[0], 16));
			i += 2 + hex[0].length;
			continue;
		}
		throw new InvalidPayloadError("bytes_value", `unknown escape \\${esc}`);
	}
	return Uint8Array.from(out);
}
