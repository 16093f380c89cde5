/**
 * Runtime values handed to and returned from an expression evaluator.
 *
 * Every variant is a small immutable class so dispatch is an `instanceof`
 * chain, the same way the matcher tree is walked. `CelValue` is the closed
 * union; adding a variant means adding a branch to `celEquals`, `typeOf` and
 * `celToString`.
 */

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;
const NANOS_PER_SECOND = 1_000_000_000n;

// =====================================================================
// Types as values
// =====================================================================

/** A runtime type, e.g. the result of `type(1)`. Compared by name. */
export class CelType {
	readonly kind = "type";

	constructor(readonly name: string) {}
}

export const BOOL_TYPE = new CelType("bool");
export const BYTES_TYPE = new CelType("bytes");
export const DOUBLE_TYPE = new CelType("double");
export const DURATION_TYPE = new CelType("google.protobuf.Duration");
export const INT_TYPE = new CelType("int");
export const LIST_TYPE = new CelType("list");
export const MAP_TYPE = new CelType("map");
export const NULL_TYPE = new CelType("null_type");
export const STRING_TYPE = new CelType("string");
export const TIMESTAMP_TYPE = new CelType("google.protobuf.Timestamp");
export const UINT_TYPE = new CelType("uint");
export const TYPE_TYPE = new CelType("type");

// =====================================================================
// Scalars
// =====================================================================

/** Signed 64-bit integer. */
export class CelInt {
	readonly kind = "int";

	constructor(readonly value: bigint) {
		if (value < INT64_MIN || value > INT64_MAX) {
			throw new RangeError(`int value ${value} is outside the signed 64-bit range`);
		}
	}
}

/** Unsigned 64-bit integer. */
export class CelUint {
	readonly kind = "uint";

	constructor(readonly value: bigint) {
		if (value < 0n || value > UINT64_MAX) {
			throw new RangeError(`uint value ${value} is outside the unsigned 64-bit range`);
		}
	}
}

export class CelDouble {
	readonly kind = "double";

	constructor(readonly value: number) {}
}

export class CelString {
	readonly kind = "string";

	constructor(readonly value: string) {}
}

export class CelBytes {
	readonly kind = "bytes";

	constructor(readonly value: Uint8Array) {}
}

export class CelBool {
	readonly kind = "bool";

	constructor(readonly value: boolean) {}
}

export class CelNull {
	readonly kind = "null";
}

export const NULL_VALUE = new CelNull();

// =====================================================================
// Aggregates
// =====================================================================

export class CelList {
	readonly kind = "list";
	readonly items: readonly CelValue[];

	constructor(items: Iterable<CelValue>) {
		this.items = Object.freeze([...items]);
	}

	get size(): number {
		return this.items.length;
	}
}

/** Map key variants allowed by the language. */
export type CelMapKey = CelInt | CelUint | CelBool | CelString;

/**
 * Map with value-keyed lookup.
 *
 * Keys are canonicalized so two distinct `CelInt(1n)` instances collide.
 * A repeated key overwrites the earlier value but keeps its position.
 */
export class CelMap {
	readonly kind = "map";
	private readonly slots = new Map<string, readonly [CelMapKey, CelValue]>();

	constructor(entries: Iterable<readonly [CelValue, CelValue]> = []) {
		for (const [key, value] of entries) {
			if (!isMapKey(key)) {
				throw new TypeError(`unsupported map key type: ${typeOf(key).name}`);
			}
			const slot = canonicalKey(key);
			const existing = this.slots.get(slot);
			this.slots.set(slot, [existing?.[0] ?? key, value]);
		}
		Object.freeze(this);
	}

	get size(): number {
		return this.slots.size;
	}

	/** Look up a value; returns `undefined` for a missing or non-key value. */
	get(key: CelValue): CelValue | undefined {
		if (!isMapKey(key)) return undefined;
		return this.slots.get(canonicalKey(key))?.[1];
	}

	has(key: CelValue): boolean {
		return this.get(key) !== undefined;
	}

	entries(): IterableIterator<readonly [CelMapKey, CelValue]> {
		return this.slots.values();
	}
}

export function isMapKey(value: CelValue): value is CelMapKey {
	return (
		value instanceof CelInt ||
		value instanceof CelUint ||
		value instanceof CelBool ||
		value instanceof CelString
	);
}

function canonicalKey(key: CelMapKey): string {
	if (key instanceof CelInt) return `int:${key.value}`;
	if (key instanceof CelUint) return `uint:${key.value}`;
	if (key instanceof CelBool) return `bool:${key.value}`;
	return `string:${key.value}`;
}

// =====================================================================
// Well-known and opaque values
// =====================================================================

/** A signed span of time, held as a total nanosecond count. */
export class CelDuration {
	readonly kind = "duration";
	readonly totalNanos: bigint;

	constructor(seconds: bigint, nanos: bigint = 0n) {
		this.totalNanos = seconds * NANOS_PER_SECOND + nanos;
	}

	/** Whole seconds, truncated toward zero. */
	get seconds(): bigint {
		return this.totalNanos / NANOS_PER_SECOND;
	}

	/** Sub-second remainder, same sign as `seconds`. */
	get nanos(): bigint {
		return this.totalNanos % NANOS_PER_SECOND;
	}

	static fromNanos(totalNanos: bigint): CelDuration {
		return new CelDuration(0n, totalNanos);
	}
}

/**
 * A pre-built stand-in for a message instance.
 *
 * Fields are resolved lazily through `lookup`, so a stand-in can answer for
 * any field name the expression happens to select.
 */
export class CelOpaque {
	readonly kind = "opaque";

	constructor(
		readonly typeName: string,
		private readonly lookup: (field: string) => CelValue | undefined,
	) {}

	field(name: string): CelValue | undefined {
		return this.lookup(name);
	}
}

export type CelValue =
	| CelInt
	| CelUint
	| CelDouble
	| CelString
	| CelBytes
	| CelBool
	| CelNull
	| CelList
	| CelMap
	| CelDuration
	| CelType
	| CelOpaque;

// =====================================================================
// Operations
// =====================================================================

/**
 * Structural equality. Variants must match: `CelInt(1n)` is not equal to
 * `CelUint(1n)` or `CelDouble(1)`.
 */
export function celEquals(a: CelValue, b: CelValue): boolean {
	if (a instanceof CelInt) return b instanceof CelInt && a.value === b.value;
	if (a instanceof CelUint) return b instanceof CelUint && a.value === b.value;
	if (a instanceof CelDouble) return b instanceof CelDouble && a.value === b.value;
	if (a instanceof CelString) return b instanceof CelString && a.value === b.value;
	if (a instanceof CelBool) return b instanceof CelBool && a.value === b.value;
	if (a instanceof CelNull) return b instanceof CelNull;
	if (a instanceof CelBytes) return b instanceof CelBytes && bytesEqual(a.value, b.value);
	if (a instanceof CelDuration) return b instanceof CelDuration && a.totalNanos === b.totalNanos;
	if (a instanceof CelType) return b instanceof CelType && a.name === b.name;
	if (a instanceof CelList) {
		if (!(b instanceof CelList) || a.size !== b.size) return false;
		return a.items.every((item, i) => {
			const other = b.items[i];
			return other !== undefined && celEquals(item, other);
		});
	}
	if (a instanceof CelMap) {
		if (!(b instanceof CelMap) || a.size !== b.size) return false;
		for (const [key, value] of a.entries()) {
			const other = b.get(key);
			if (other === undefined || !celEquals(value, other)) return false;
		}
		return true;
	}
	return a === b;
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
	if (a.length !== b.length) return false;
	return a.every((byte, i) => byte === b[i]);
}

/** Runtime type of a value. */
export function typeOf(value: CelValue): CelType {
	if (value instanceof CelInt) return INT_TYPE;
	if (value instanceof CelUint) return UINT_TYPE;
	if (value instanceof CelDouble) return DOUBLE_TYPE;
	if (value instanceof CelString) return STRING_TYPE;
	if (value instanceof CelBytes) return BYTES_TYPE;
	if (value instanceof CelBool) return BOOL_TYPE;
	if (value instanceof CelNull) return NULL_TYPE;
	if (value instanceof CelList) return LIST_TYPE;
	if (value instanceof CelMap) return MAP_TYPE;
	if (value instanceof CelDuration) return DURATION_TYPE;
	if (value instanceof CelType) return TYPE_TYPE;
	return new CelType(value.typeName);
}

/** Render a value in expression syntax, for assertion messages and logs. */
export function celToString(value: CelValue): string {
	if (value instanceof CelInt) return String(value.value);
	if (value instanceof CelUint) return `${value.value}u`;
	if (value instanceof CelDouble) return formatDouble(value.value);
	if (value instanceof CelString) return JSON.stringify(value.value);
	if (value instanceof CelBytes) return `b"${[...value.value].map(hexByte).join("")}"`;
	if (value instanceof CelBool) return String(value.value);
	if (value instanceof CelNull) return "null";
	if (value instanceof CelList) return `[${value.items.map(celToString).join(", ")}]`;
	if (value instanceof CelMap) {
		const pairs = [...value.entries()].map(([k, v]) => `${celToString(k)}: ${celToString(v)}`);
		return `{${pairs.join(", ")}}`;
	}
	if (value instanceof CelDuration) return `duration("${formatNanos(value.totalNanos)}")`;
	if (value instanceof CelType) return value.name;
	return `<${value.typeName}>`;
}

function formatDouble(n: number): string {
	if (Number.isNaN(n)) return "NaN";
	if (n === Number.POSITIVE_INFINITY) return "+inf";
	if (n === Number.NEGATIVE_INFINITY) return "-inf";
	return Number.isInteger(n) ? n.toFixed(1) : String(n);
}

function hexByte(byte: number): string {
	return `\\x${byte.toString(16).padStart(2, "0")}`;
}

function formatNanos(total: bigint): string {
	const sign = total < 0n ? "-" : "";
	const abs = total < 0n ? -total : total;
	const seconds = abs / NANOS_PER_SECOND;
	const nanos = abs % NANOS_PER_SECOND;
	if (nanos === 0n) return `${sign}${seconds}s`;
	const fraction = nanos.toString().padStart(9, "0").replace(/0+$/, "");
	return `${sign}${seconds}.${fraction}s`;
}
