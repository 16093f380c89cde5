/**
 * Raw fixture payload readers.
 *
 * Payloads arrive as whatever the fixture loader produced: YAML numbers,
 * strings, booleans, or already-typed bigints and byte arrays. Each reader
 * accepts the shapes that can losslessly carry its kind and raises
 * `InvalidPayloadError` otherwise.
 */

import { InvalidPayloadError } from "./errors.ts";
import { decodeBytesLiteral } from "./escapes.ts";

export type Payload = string | number | bigint | boolean | Uint8Array | null;

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function readInteger(kind: string, payload: Payload): bigint {
	if (typeof payload === "bigint") return payload;
	if (typeof payload === "number") {
		if (!Number.isSafeInteger(payload)) {
			throw new InvalidPayloadError(kind, `${payload} is not a safe integer; quote large values`);
		}
		return BigInt(payload);
	}
	if (typeof payload === "string" && INTEGER.test(payload.trim())) {
		return BigInt(payload.trim());
	}
	throw new InvalidPayloadError(kind, `expected an integer, got ${describe(payload)}`);
}

/** `"inf"` and `"-inf"` are the only non-decimal strings accepted. */
export function readDouble(kind: string, payload: Payload): number {
	if (payload === "inf") return Number.POSITIVE_INFINITY;
	if (payload === "-inf") return Number.NEGATIVE_INFINITY;
	if (typeof payload === "number") return payload;
	if (typeof payload === "string" && DECIMAL.test(payload.trim())) {
		return Number(payload.trim());
	}
	throw new InvalidPayloadError(kind, `expected a decimal number, got ${describe(payload)}`);
}

export function readString(kind: string, payload: Payload): string {
	if (typeof payload === "string") return payload;
	throw new InvalidPayloadError(kind, `expected a string, got ${describe(payload)}`);
}

export function readBool(kind: string, payload: Payload): boolean {
	if (typeof payload === "boolean") return payload;
	if (payload === "true") return true;
	if (payload === "false") return false;
	throw new InvalidPayloadError(kind, `expected a boolean, got ${describe(payload)}`);
}

export function readBytes(kind: string, payload: Payload): Uint8Array {
	if (payload instanceof Uint8Array) return payload;
	if (typeof payload === "string") return decodeBytesLiteral(payload);
	throw new InvalidPayloadError(kind, `expected a bytes literal, got ${describe(payload)}`);
}

function describe(payload: Payload): string {
	if (payload === null) return "null";
	if (payload instanceof Uint8Array) return `${payload.length} raw bytes`;
	if (typeof payload === "string") return JSON.stringify(payload);
	return `${typeof payload} ${String(payload)}`;
}
