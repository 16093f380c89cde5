/**
 * Tests for fixture and alias-table parsing (src/config.ts).
 *
 * Validates parse*() edge cases and structural correctness.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { describe, expect, test } from "vitest";
import { DEFAULT_CLASSIFIER, UNCLASSIFIED } from "../src/classifier.ts";
import {
	ConfigParseError,
	MAX_PATTERN_LENGTH,
	MAX_REGEX_PATTERN_LENGTH,
	PatternTooLongError,
	loadAliasTable,
	parseBindings,
	parseClassifierConfig,
	parseExpectation,
	parseFixtureNode,
	parseTypeBinding,
} from "../src/config.ts";
import { TypeBinding } from "../src/type-env.ts";
import { ListValue, MapValue, ObjectValue, Value } from "../src/values.ts";

const ALIAS_TABLE = fileURLToPath(new URL("../data/aliases.yaml", import.meta.url));

describe("parseFixtureNode", () => {
	test("scalar", () => {
		const node = parseFixtureNode({ int64_value: 3 });
		expect(node).toBeInstanceOf(Value);
		if (node instanceof Value) {
			expect(node.kind).toBe("int64_value");
			expect(node.payload).toBe(3);
		}
	});

	test("unknown kinds parse and fail later, at translation", () => {
		const node = parseFixtureNode({ float_value: 1 });
		expect(node).toBeInstanceOf(Value);
	});

	test("list", () => {
		const node = parseFixtureNode({ list_value: [{ bool_value: true }, { null_value: null }] });
		expect(node).toBeInstanceOf(ListValue);
		if (node instanceof ListValue) {
			expect(node.items).toHaveLength(2);
		}
	});

	test("flat map entries form one group", () => {
		const node = parseFixtureNode({
			map_value: [
				{ key: { string_value: "a" }, value: { int64_value: 1 } },
				{ key: { string_value: "b" }, value: { int64_value: 2 } },
			],
		});
		expect(node).toBeInstanceOf(MapValue);
		if (node instanceof MapValue) {
			expect(node.groups).toHaveLength(1);
			expect(node.groups[0]?.entries).toHaveLength(2);
		}
	});

	test("grouped map entries keep their groups", () => {
		const node = parseFixtureNode({
			map_value: [
				{ entries: [{ key: { string_value: "a" }, value: { int64_value: 1 } }] },
				{ entries: [] },
			],
		});
		expect(node).toBeInstanceOf(MapValue);
		if (node instanceof MapValue) {
			expect(node.groups.map((g) => g.entries.length)).toEqual([1, 0]);
		}
	});

	test("object", () => {
		const node = parseFixtureNode({
			object_value: {
				type_url: "type.googleapis.com/google.protobuf.Duration",
				fields: [
					{ name: "seconds", value: { int64_value: 1 } },
					{ name: "nanos", value: { int64_value: 0 } },
				],
			},
		});
		expect(node).toBeInstanceOf(ObjectValue);
		if (node instanceof ObjectValue) {
			expect(node.namespace).toBe("type.googleapis.com/google.protobuf.Duration");
			expect(node.fields.map((f) => f.name)).toEqual(["seconds", "nanos"]);
		}
	});

	test("exactly one kind key", () => {
		expect(() => parseFixtureNode({ int64_value: 1, string_value: "a" })).toThrow(
			"value must have exactly one kind key, got keys: [int64_value, string_value]",
		);
		expect(() => parseFixtureNode({})).toThrow(ConfigParseError);
	});

	test("non-object input", () => {
		expect(() => parseFixtureNode([1])).toThrow("value must be an object, got array");
		expect(() => parseFixtureNode("x")).toThrow('value must be an object, got "x"');
	});

	test("structural errors", () => {
		expect(() => parseFixtureNode({ list_value: {} })).toThrow(
			"list_value must be an array, got object",
		);
		expect(() => parseFixtureNode({ map_value: [{ key: { int64_value: 1 } }] })).toThrow(
			"map entry missing required field 'value'",
		);
		expect(() => parseFixtureNode({ int64_value: [1] })).toThrow(
			"int64_value payload must be a scalar, got array",
		);
	});

	test("object fields must wrap scalars", () => {
		expect(() =>
			parseFixtureNode({
				object_value: { type_url: "t", fields: [{ name: "f", value: { list_value: [] } }] },
			}),
		).toThrow("object field 'f' must wrap a scalar value");
		expect(() => parseFixtureNode({ object_value: { fields: [] } })).toThrow(
			"object_value type_url must be a string, got undefined",
		);
	});
});

describe("parseBindings", () => {
	test("keys and values", () => {
		const bindings = parseBindings([{ key: "x", value: { int64_value: 1 } }]);
		expect(bindings).toHaveLength(1);
		expect(bindings[0]?.key).toBe("x");
		expect(bindings[0]?.value).toBeInstanceOf(Value);
	});

	test("missing value", () => {
		expect(() => parseBindings([{ key: "x" }])).toThrow("binding 'x' missing required field 'value'");
		expect(() => parseBindings({})).toThrow("bindings must be an array, got object");
	});
});

describe("parseTypeBinding", () => {
	test("kind defaults to primitive", () => {
		const binding = parseTypeBinding({ name: "x", type: "int" });
		expect(binding).toBeInstanceOf(TypeBinding);
		expect(binding.kind).toBe("primitive");
		expect(binding.annotation()).toEqual(["x", "int"]);
	});

	test("map types take an identifier list", () => {
		const binding = parseTypeBinding({ name: "m", kind: "map_type", type: ["string", "int"] });
		expect(binding.annotation()).toEqual(["m", "Map[string, int]"]);
	});

	test("unknown kind", () => {
		expect(() => parseTypeBinding({ name: "x", kind: "enum_type", type: "int" })).toThrow(
			'unknown type binding kind: "enum_type" (expected one of primitive, message_type, map_type)',
		);
	});

	test("type must be a string or string array", () => {
		expect(() => parseTypeBinding({ name: "x", type: [1] })).toThrow(
			"type binding 'x' type must be a string or string array, got array",
		);
	});
});

describe("parseExpectation", () => {
	test("value", () => {
		const expectation = parseExpectation({ value: { int64_value: 1 } });
		expect(expectation.kind).toBe("value");
	});

	test("explicit null value", () => {
		expect(parseExpectation({ value: null })).toEqual({ kind: "null" });
	});

	test("error text", () => {
		expect(parseExpectation({ eval_error: "division by zero" })).toEqual({
			kind: "error",
			text: "division by zero",
		});
	});

	test("null error means no error", () => {
		expect(parseExpectation({ eval_error: null })).toEqual({ kind: "no_error" });
	});

	test("exactly one of value or eval_error", () => {
		expect(() => parseExpectation({ value: null, eval_error: null })).toThrow(
			"exactly one of 'value' or 'eval_error' must be set, got both",
		);
		expect(() => parseExpectation({ expr: "1" })).toThrow(
			"one of 'value' or 'eval_error' is required",
		);
	});
});

describe("parseClassifierConfig", () => {
	test("aliases and rules extend the base", () => {
		const classifier = parseClassifierConfig({
			aliases: { "integer overflow": "integer_overflow" },
			rules: [{ prefix: "No Such Key", ignore_case: true, category: "unknown_variable" }],
		});
		expect(classifier.classify("integer overflow")).toBe("integer_overflow");
		expect(classifier.classify("no such key: a")).toBe("unknown_variable");
		expect(classifier.classify("division by zero")).toBe("divide_by_zero");
	});

	test("ignore_case applies to regex rules", () => {
		const rule = { regex: "^Division", ignore_case: true, category: "divide_by_zero" };
		const classifier = parseClassifierConfig({ rules: [rule] });
		expect(classifier.classify("division by zero!")).toBe("divide_by_zero");

		const caseSensitive = parseClassifierConfig({
			rules: [{ regex: "^Division", category: "divide_by_zero" }],
		});
		expect(caseSensitive.classify("division by zero!")).toBe(UNCLASSIFIED);
	});

	test("empty document keeps the base tables", () => {
		const classifier = parseClassifierConfig({});
		expect(classifier.aliasCount).toBe(DEFAULT_CLASSIFIER.aliasCount);
		expect(classifier.rules).toHaveLength(DEFAULT_CLASSIFIER.rules.length);
	});

	test("unknown category", () => {
		expect(() => parseClassifierConfig({ aliases: { x: "stack_overflow" } })).toThrow(
			'unknown error category: "stack_overflow"',
		);
		expect(() => parseClassifierConfig({ aliases: { x: "unclassified" } })).toThrow(ConfigParseError);
	});

	test("rule needs exactly one matcher", () => {
		expect(() =>
			parseClassifierConfig({ rules: [{ exact: "a", prefix: "b", category: "divide_by_zero" }] }),
		).toThrow("rule must contain exactly one of [exact, prefix, regex], got keys: [category, exact, prefix]");
	});

	test("invalid regex becomes a parse error", () => {
		expect(() =>
			parseClassifierConfig({ rules: [{ regex: "(a", category: "divide_by_zero" }] }),
		).toThrow(ConfigParseError);
	});

	test("pattern length limits", () => {
		const longExact = "a".repeat(MAX_PATTERN_LENGTH + 1);
		expect(() => parseClassifierConfig({ aliases: { [longExact]: "divide_by_zero" } })).toThrow(
			PatternTooLongError,
		);
		const longRegex = "a".repeat(MAX_REGEX_PATTERN_LENGTH + 1);
		expect(() =>
			parseClassifierConfig({ rules: [{ regex: longRegex, category: "divide_by_zero" }] }),
		).toThrow(`pattern length ${MAX_REGEX_PATTERN_LENGTH + 1} exceeds maximum ${MAX_REGEX_PATTERN_LENGTH}`);
		const okPrefix = "a".repeat(MAX_REGEX_PATTERN_LENGTH + 1);
		expect(() =>
			parseClassifierConfig({ rules: [{ prefix: okPrefix, category: "divide_by_zero" }] }),
		).not.toThrow();
	});
});

describe("loadAliasTable", () => {
	test("bundled alias table", () => {
		const classifier = loadAliasTable(readFileSync(ALIAS_TABLE, "utf-8"));
		expect(classifier.classify("integer overflow")).toBe("integer_overflow");
		expect(classifier.classify("modulo by zero")).toBe("modulus_by_zero");
		expect(classifier.classify("int64 multiplication overflow")).toBe("integer_overflow");
		expect(classifier.classify("Found no matching overload for '_+_'")).toBe("no_such_overload");
		expect(classifier.classify("unknown variable")).toBe("unknown_variable");
		expect(classifier.classify("float overflow")).toBe(UNCLASSIFIED);
	});

	test("inline YAML", () => {
		const classifier = loadAliasTable("aliases:\n  boom: divide_by_zero\n");
		expect(classifier.classify("boom")).toBe("divide_by_zero");
	});

	test("non-mapping documents are rejected", () => {
		expect(() => loadAliasTable("- a\n- b\n")).toThrow("alias table must be an object, got array");
	});
});
