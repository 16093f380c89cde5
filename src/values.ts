/**
 * Fixture value model and its translation into runtime values.
 *
 * A fixture literal is one of four node shapes. Scalars are a `Value`
 * (kind tag plus raw payload); the aggregates nest further nodes:
 *
 * | Fixture node  | Runtime value                 |
 * |---------------|-------------------------------|
 * | Value         | CelInt, CelString, CelType... |
 * | ListValue     | CelList                       |
 * | MapValue      | CelMap                        |
 * | ObjectValue   | registry factory result       |
 */

import {
	InvalidMapKeyError,
	InvalidPayloadError,
	UnknownTypeNameError,
	UnknownValueKindError,
} from "./errors.ts";
import {
	type Payload,
	readBool,
	readBytes,
	readDouble,
	readInteger,
	readString,
} from "./payload.ts";
import { DEFAULT_REGISTRY, type Registry } from "./registry.ts";
import {
	BOOL_TYPE,
	BYTES_TYPE,
	CelBool,
	CelBytes,
	CelDouble,
	CelInt,
	CelList,
	CelMap,
	CelString,
	type CelType,
	CelUint,
	type CelValue,
	DOUBLE_TYPE,
	DURATION_TYPE,
	INT_TYPE,
	LIST_TYPE,
	MAP_TYPE,
	NULL_TYPE,
	NULL_VALUE,
	STRING_TYPE,
	TIMESTAMP_TYPE,
	TYPE_TYPE,
	UINT_TYPE,
	isMapKey,
	typeOf,
} from "./runtime.ts";

// =====================================================================
// Node types
// =====================================================================

export const VALUE_KINDS = [
	"int64_value",
	"uint64_value",
	"double_value",
	"string_value",
	"bytes_value",
	"bool_value",
	"null_value",
	"enum_value",
	"type_value",
] as const;

export type ValueKind = (typeof VALUE_KINDS)[number];

/**
 * A scalar literal. `kind` is kept as written in the fixture; it is checked
 * against `VALUE_KINDS` when translated.
 */
export class Value {
	readonly node = "value";

	constructor(
		readonly kind: string,
		readonly payload: Payload = null,
	) {}
}

export class ListValue {
	readonly node = "list";

	constructor(readonly items: readonly FixtureNode[]) {}
}

export interface MapEntry {
	readonly key: FixtureNode;
	readonly value: FixtureNode;
}

/** One `entries` block of a map literal. */
export class MapEntries {
	constructor(readonly entries: readonly MapEntry[]) {}
}

/** A map literal, possibly spread over several entry groups. */
export class MapValue {
	readonly node = "map";

	constructor(readonly groups: readonly MapEntries[]) {}
}

/** A named sub-field of an object literal, wrapping a special value. */
export class ObjectField {
	constructor(
		readonly name: string,
		readonly value: Value,
	) {}
}

/** A namespaced object literal, e.g. a `google.protobuf.Duration`. */
export class ObjectValue {
	readonly node = "object";

	constructor(
		readonly namespace: string,
		readonly fields: readonly ObjectField[],
	) {}
}

export type FixtureNode = Value | ListValue | MapValue | ObjectValue;

// =====================================================================
// Type names
// =====================================================================

/** Fixture type names → runtime types. */
const TYPE_NAMES: ReadonlyMap<string, CelType> = new Map([
	["bool", BOOL_TYPE],
	["bytes", BYTES_TYPE],
	["double", DOUBLE_TYPE],
	["duration", DURATION_TYPE],
	["int", INT_TYPE],
	["list", LIST_TYPE],
	["map", MAP_TYPE],
	["null_type", NULL_TYPE],
	["string", STRING_TYPE],
	["timestamp", TIMESTAMP_TYPE],
	["uint", UINT_TYPE],
	["type", TYPE_TYPE],
	["google.protobuf.Duration", DURATION_TYPE],
	["google.protobuf.Timestamp", TIMESTAMP_TYPE],
]);

/** Resolve a type name. Throws UnknownTypeNameError for names not in the table. */
export function resolveTypeName(name: string): CelType {
	const type = TYPE_NAMES.get(name);
	if (type === undefined) {
		throw new UnknownTypeNameError(name);
	}
	return type;
}

/** Names `resolveTypeName` accepts (sorted). */
export function knownTypeNames(): string[] {
	return [...TYPE_NAMES.keys()].sort();
}

// =====================================================================
// Translation
// =====================================================================

/** Translate a fixture node into a runtime value, recursing into aggregates. */
export function translate(node: FixtureNode, registry: Registry = DEFAULT_REGISTRY): CelValue {
	switch (node.node) {
		case "value":
			return translateScalar(node);
		case "list":
			return new CelList(node.items.map((item) => translate(item, registry)));
		case "map":
			return new CelMap(translateEntries(node, registry));
		case "object":
			return registry.translateObject(node);
	}
}

function* translateEntries(
	map: MapValue,
	registry: Registry,
): Generator<readonly [CelValue, CelValue]> {
	for (const group of map.groups) {
		for (const entry of group.entries) {
			const key = translate(entry.key, registry);
			if (!isMapKey(key)) {
				throw new InvalidMapKeyError(typeOf(key).name);
			}
			yield [key, translate(entry.value, registry)];
		}
	}
}

function isValueKind(kind: string): kind is ValueKind {
	return VALUE_KINDS.some((known) => known === kind);
}

function translateScalar(value: Value): CelValue {
	const { kind, payload } = value;
	if (!isValueKind(kind)) {
		throw new UnknownValueKindError(kind, VALUE_KINDS);
	}
	try {
		switch (kind) {
			case "int64_value":
			case "enum_value":
				return new CelInt(readInteger(kind, payload));
			case "uint64_value":
				return new CelUint(readInteger(kind, payload));
			case "double_value":
				return new CelDouble(readDouble(kind, payload));
			case "string_value":
				return new CelString(readString(kind, payload));
			case "bytes_value":
				return new CelBytes(readBytes(kind, payload));
			case "bool_value":
				return new CelBool(readBool(kind, payload));
			case "null_value":
				return NULL_VALUE;
			case "type_value":
				return resolveTypeName(readString(kind, payload));
		}
	} catch (e) {
		if (e instanceof RangeError) {
			throw new InvalidPayloadError(kind, e.message);
		}
		throw e;
	}
}
