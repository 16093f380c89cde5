/**
 * Fixture and alias-table parsing.
 *
 * Turns plain data (a YAML or JSON document) into the typed fixture model.
 * Every function takes `unknown` and either returns a well-formed value or
 * throws ConfigParseError naming the offending shape.
 *
 * | Document shape                              | Parsed into      |
 * |---------------------------------------------|------------------|
 * | `{ int64_value: 1 }`                        | Value            |
 * | `{ list_value: [node, ...] }`               | ListValue        |
 * | `{ map_value: [{ key, value }, ...] }`      | MapValue         |
 * | `{ map_value: [{ entries: [...] }, ...] }`  | MapValue, groups |
 * | `{ object_value: { type_url, fields } }`    | ObjectValue      |
 * | `{ name, kind, type }`                      | TypeBinding      |
 * | `{ aliases, rules }`                        | ErrorClassifier  |
 */

import { load } from "js-yaml";

import {
	DEFAULT_CLASSIFIER,
	type ErrorCategory,
	type ErrorClassifier,
	isErrorCategory,
} from "./classifier.ts";
import type { Payload } from "./payload.ts";
import type { Expectation } from "./scenario.ts";
import {
	ExactText,
	PrefixText,
	RegexText,
	type TextMatcher,
	TextMatcherError,
} from "./text-matchers.ts";
import { TypeBinding, type TypeKind } from "./type-env.ts";
import {
	type FixtureNode,
	ListValue,
	type MapEntry,
	MapEntries,
	MapValue,
	ObjectField,
	ObjectValue,
	Value,
} from "./values.ts";

// =====================================================================
// Limits
// =====================================================================

export const MAX_PATTERN_LENGTH = 8192;
export const MAX_REGEX_PATTERN_LENGTH = 4096;

// =====================================================================
// Error types
// =====================================================================

/** Error parsing a document into fixture or classifier types. */
export class ConfigParseError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigParseError";
	}
}

/** A classifier pattern exceeds the length limit. */
export class PatternTooLongError extends ConfigParseError {
	readonly length: number;
	readonly max: number;

	constructor(length: number, max: number) {
		super(`pattern length ${length} exceeds maximum ${max}`);
		this.name = "PatternTooLongError";
		this.length = length;
		this.max = max;
	}
}

// =====================================================================
// Fixture nodes
// =====================================================================

const TYPE_KINDS: readonly TypeKind[] = ["primitive", "message_type", "map_type"];
const MATCH_VARIANTS = ["exact", "prefix", "regex"] as const;

/** A `{ key, value }` variable binding. */
export interface Binding {
	readonly key: string;
	readonly value: FixtureNode;
}

/** Parse a value node: an object with exactly one kind key. */
export function parseFixtureNode(data: unknown): FixtureNode {
	const obj = expectObject(data, "value");
	const keys = Object.keys(obj);
	const [kind] = keys;
	if (kind === undefined || keys.length !== 1) {
		throw new ConfigParseError(
			`value must have exactly one kind key, got keys: [${keys.sort().join(", ")}]`,
		);
	}
	const body = obj[kind];

	if (kind === "list_value") {
		if (!Array.isArray(body)) {
			throw new ConfigParseError(`list_value must be an array, got ${describe(body)}`);
		}
		return new ListValue(body.map((item) => parseFixtureNode(item)));
	}
	if (kind === "map_value") {
		return parseMapValue(body);
	}
	if (kind === "object_value") {
		return parseObjectValue(body);
	}
	return new Value(kind, parsePayload(kind, body));
}

function parsePayload(kind: string, data: unknown): Payload {
	if (
		data === null ||
		typeof data === "string" ||
		typeof data === "number" ||
		typeof data === "boolean"
	) {
		return data;
	}
	throw new ConfigParseError(`${kind} payload must be a scalar, got ${describe(data)}`);
}

function parseMapValue(data: unknown): MapValue {
	if (!Array.isArray(data)) {
		throw new ConfigParseError(`map_value must be an array, got ${describe(data)}`);
	}
	const grouped = data.some((item) => isObject(item) && "entries" in item);
	if (!grouped) {
		return new MapValue([new MapEntries(data.map((e) => parseMapEntry(e)))]);
	}
	const groups = data.map((group) => {
		const obj = expectObject(group, "map_value group");
		if (!Array.isArray(obj.entries)) {
			throw new ConfigParseError(
				`map_value group 'entries' must be an array, got ${describe(obj.entries)}`,
			);
		}
		return new MapEntries(obj.entries.map((e) => parseMapEntry(e)));
	});
	return new MapValue(groups);
}

function parseMapEntry(data: unknown): MapEntry {
	const obj = expectObject(data, "map entry");
	if (!("key" in obj)) {
		throw new ConfigParseError("map entry missing required field 'key'");
	}
	if (!("value" in obj)) {
		throw new ConfigParseError("map entry missing required field 'value'");
	}
	return { key: parseFixtureNode(obj.key), value: parseFixtureNode(obj.value) };
}

function parseObjectValue(data: unknown): ObjectValue {
	const obj = expectObject(data, "object_value");
	const typeUrl = obj.type_url;
	if (typeof typeUrl !== "string") {
		throw new ConfigParseError(`object_value type_url must be a string, got ${describe(typeUrl)}`);
	}
	const rawFields = obj.fields ?? [];
	if (!Array.isArray(rawFields)) {
		throw new ConfigParseError(`object_value fields must be an array, got ${describe(rawFields)}`);
	}
	const fields = rawFields.map((f) => {
		const field = expectObject(f, "object field");
		const name = field.name;
		if (typeof name !== "string") {
			throw new ConfigParseError(`object field name must be a string, got ${describe(name)}`);
		}
		const value = parseFixtureNode(field.value);
		if (!(value instanceof Value)) {
			throw new ConfigParseError(`object field '${name}' must wrap a scalar value`);
		}
		return new ObjectField(name, value);
	});
	return new ObjectValue(typeUrl, fields);
}

// =====================================================================
// Bindings and type environment
// =====================================================================

/** Parse `[{ key, value }, ...]` variable bindings. */
export function parseBindings(data: unknown): Binding[] {
	if (!Array.isArray(data)) {
		throw new ConfigParseError(`bindings must be an array, got ${describe(data)}`);
	}
	return data.map((item) => {
		const obj = expectObject(item, "binding");
		const key = obj.key;
		if (typeof key !== "string") {
			throw new ConfigParseError(`binding key must be a string, got ${describe(key)}`);
		}
		if (!("value" in obj)) {
			throw new ConfigParseError(`binding '${key}' missing required field 'value'`);
		}
		return { key, value: parseFixtureNode(obj.value) };
	});
}

/** Parse `{ name, kind?, type }`. `kind` defaults to "primitive". */
export function parseTypeBinding(data: unknown): TypeBinding {
	const obj = expectObject(data, "type binding");
	const name = obj.name;
	if (typeof name !== "string") {
		throw new ConfigParseError(`type binding name must be a string, got ${describe(name)}`);
	}
	const kind = obj.kind ?? "primitive";
	if (!isTypeKind(kind)) {
		throw new ConfigParseError(
			`unknown type binding kind: ${describe(kind)} (expected one of ${TYPE_KINDS.join(", ")})`,
		);
	}
	const type = obj.type;
	if (typeof type === "string") {
		return new TypeBinding(name, kind, type);
	}
	if (Array.isArray(type) && type.every((t): t is string => typeof t === "string")) {
		return new TypeBinding(name, kind, type);
	}
	throw new ConfigParseError(
		`type binding '${name}' type must be a string or string array, got ${describe(type)}`,
	);
}

function isTypeKind(value: unknown): value is TypeKind {
	return TYPE_KINDS.some((kind) => kind === value);
}

// =====================================================================
// Expectations
// =====================================================================

/**
 * Read the expectation of a case document.
 *
 * Exactly one of `value` or `eval_error` must be present. `value: null`
 * expects a null result; `eval_error: null` expects no error at all.
 */
export function parseExpectation(data: unknown): Expectation {
	const obj = expectObject(data, "case");
	const hasValue = "value" in obj;
	const hasError = "eval_error" in obj;
	if (hasValue && hasError) {
		throw new ConfigParseError("exactly one of 'value' or 'eval_error' must be set, got both");
	}
	if (hasValue) {
		return obj.value === null ? { kind: "null" } : { kind: "value", node: parseFixtureNode(obj.value) };
	}
	if (hasError) {
		const text = obj.eval_error;
		if (text === null) return { kind: "no_error" };
		if (typeof text !== "string") {
			throw new ConfigParseError(`eval_error must be a string or null, got ${describe(text)}`);
		}
		return { kind: "error", text };
	}
	throw new ConfigParseError("one of 'value' or 'eval_error' is required");
}

// =====================================================================
// Alias tables
// =====================================================================

/**
 * Extend a classifier with an alias table document:
 *
 *   aliases:
 *     "integer overflow": integer_overflow
 *   rules:
 *     - prefix: "found no matching overload"
 *       category: no_such_overload
 */
export function parseClassifierConfig(
	data: unknown,
	base: ErrorClassifier = DEFAULT_CLASSIFIER,
): ErrorClassifier {
	const obj = expectObject(data, "alias table");
	const builder = base.toBuilder();

	const aliases = obj.aliases ?? {};
	const aliasObj = expectObject(aliases, "aliases");
	for (const [text, category] of Object.entries(aliasObj)) {
		checkPatternLength("exact", text);
		builder.alias(text, parseCategory(category));
	}

	const rules = obj.rules ?? [];
	if (!Array.isArray(rules)) {
		throw new ConfigParseError(`rules must be an array, got ${describe(rules)}`);
	}
	for (const rule of rules) {
		const ruleObj = expectObject(rule, "rule");
		builder.rule(parseTextMatcher(ruleObj), parseCategory(ruleObj.category));
	}

	return builder.build();
}

/** Parse a YAML alias table and layer it over `base`. */
export function loadAliasTable(
	yamlText: string,
	base: ErrorClassifier = DEFAULT_CLASSIFIER,
): ErrorClassifier {
	return parseClassifierConfig(load(yamlText), base);
}

function parseCategory(data: unknown): ErrorCategory {
	if (typeof data === "string" && isErrorCategory(data)) return data;
	throw new ConfigParseError(`unknown error category: ${describe(data)}`);
}

function parseTextMatcher(obj: Record<string, unknown>): TextMatcher {
	const present = MATCH_VARIANTS.filter((variant) => variant in obj);
	const [variant] = present;
	if (variant === undefined || present.length !== 1) {
		throw new ConfigParseError(
			`rule must contain exactly one of [${MATCH_VARIANTS.join(", ")}], got keys: [${Object.keys(obj).sort().join(", ")}]`,
		);
	}
	const value = obj[variant];
	if (typeof value !== "string") {
		throw new ConfigParseError(`rule ${variant} value must be a string, got ${describe(value)}`);
	}
	checkPatternLength(variant, value);

	const ignoreCase = obj.ignore_case === true;
	switch (variant) {
		case "exact":
			return new ExactText(value, ignoreCase);
		case "prefix":
			return new PrefixText(value, ignoreCase);
		case "regex":
			try {
				return new RegexText(value, ignoreCase);
			} catch (e) {
				if (e instanceof TextMatcherError) throw new ConfigParseError(e.message);
				throw e;
			}
	}
}

function checkPatternLength(variant: string, value: string): void {
	if (variant === "regex") {
		if (value.length > MAX_REGEX_PATTERN_LENGTH) {
			throw new PatternTooLongError(value.length, MAX_REGEX_PATTERN_LENGTH);
		}
	} else if (value.length > MAX_PATTERN_LENGTH) {
		throw new PatternTooLongError(value.length, MAX_PATTERN_LENGTH);
	}
}

// =====================================================================
// Helpers
// =====================================================================

function isObject(data: unknown): data is Record<string, unknown> {
	return typeof data === "object" && data !== null && !Array.isArray(data);
}

function expectObject(data: unknown, what: string): Record<string, unknown> {
	if (!isObject(data)) {
		throw new ConfigParseError(`${what} must be an object, got ${describe(data)}`);
	}
	return data;
}

function describe(data: unknown): string {
	if (data === null) return "null";
	if (Array.isArray(data)) return "array";
	if (typeof data === "string") return JSON.stringify(data);
	return typeof data;
}
