/**
 * Translation benchmarks.
 *
 * Measures fixture node → runtime value cost for scalars, nested
 * aggregates, and registry-backed objects.
 *
 * Run: npx tsx bench/translate.bench.ts
 */

import { bench, run, summary } from "mitata";

import {
	DURATION_NAMESPACE,
	ListValue,
	MapEntries,
	MapValue,
	ObjectField,
	ObjectValue,
	Value,
	celEquals,
	parseFixtureNode,
	translate,
} from "../src/index.ts";
import type { FixtureNode } from "../src/index.ts";

// ── Fixtures ─────────────────────────────────────────────────────────────────

function intList(n: number): ListValue {
	return new ListValue(Array.from({ length: n }, (_, i) => new Value("int64_value", i)));
}

function stringMap(n: number): MapValue {
	const entries = Array.from({ length: n }, (_, i) => ({
		key: new Value("string_value", `key_${i}`),
		value: new Value("int64_value", i),
	}));
	return new MapValue([new MapEntries(entries)]);
}

function nested(depth: number): FixtureNode {
	let node: FixtureNode = new Value("bool_value", true);
	for (let i = 0; i < depth; i++) {
		node = new ListValue([node]);
	}
	return node;
}

const duration = new ObjectValue(DURATION_NAMESPACE, [
	new ObjectField("seconds", new Value("int64_value", 90)),
	new ObjectField("nanos", new Value("int64_value", 5)),
]);

// ── Scalars ──────────────────────────────────────────────────────────────────

summary(() => {
	bench("translate_int", () => translate(new Value("int64_value", 42)));
	bench("translate_uint_string", () => translate(new Value("uint64_value", "18446744073709551615")));
	bench("translate_bytes_escaped", () => translate(new Value("bytes_value", "\\x00\\377abc")));
	bench("translate_type", () => translate(new Value("type_value", "google.protobuf.Duration")));
	bench("translate_duration", () => translate(duration));
});

// ── Aggregates at scale ──────────────────────────────────────────────────────

summary(() => {
	for (const n of [10, 100, 1000]) {
		const list = intList(n);
		bench(`translate_list_${n}`, () => translate(list));
	}
});

summary(() => {
	for (const n of [10, 100, 1000]) {
		const map = stringMap(n);
		bench(`translate_map_${n}`, () => translate(map));
	}
});

summary(() => {
	for (const depth of [8, 32]) {
		const node = nested(depth);
		bench(`translate_nested_${depth}`, () => translate(node));
	}
});

// ── Parse + translate + compare ──────────────────────────────────────────────

const LIST_DOC = { list_value: Array.from({ length: 50 }, (_, i) => ({ int64_value: i })) };
const expected = translate(parseFixtureNode(LIST_DOC));

bench("parse_translate_compare_list_50", () =>
	celEquals(translate(parseFixtureNode(LIST_DOC)), expected),
);

await run();
