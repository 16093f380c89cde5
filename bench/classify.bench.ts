/**
 * Classification benchmarks.
 *
 * Measures the alias lookup hit path against the rule scan, and how the
 * scan grows with rule count.
 *
 * Run: npx tsx bench/classify.bench.ts
 */

import { bench, run, summary } from "mitata";

import {
	ClassifierBuilder,
	DEFAULT_CLASSIFIER,
	ExactText,
	PrefixText,
	RegexText,
	loadAliasTable,
} from "../src/index.ts";
import type { ErrorClassifier } from "../src/index.ts";

// ── Default tables ───────────────────────────────────────────────────────────

summary(() => {
	bench("classify_category_name", () => DEFAULT_CLASSIFIER.classify("divide_by_zero"));
	bench("classify_alias_hit", () => DEFAULT_CLASSIFIER.classify("no matching overload"));
	bench("classify_prefix_rule", () =>
		DEFAULT_CLASSIFIER.classify("undeclared reference to 'x' (in container '')"),
	);
	bench("classify_miss", () => DEFAULT_CLASSIFIER.classify("something else entirely"));
});

// ── Rule scan at scale ───────────────────────────────────────────────────────

function withRules(n: number, kind: "exact" | "prefix" | "regex"): ErrorClassifier {
	const builder = new ClassifierBuilder();
	for (let i = 0; i < n; i++) {
		const matcher =
			kind === "exact"
				? new ExactText(`failure ${i}`)
				: kind === "prefix"
					? new PrefixText(`failure ${i}:`)
					: new RegexText(`^failure ${i}: \\w+$`);
		builder.rule(matcher, "no_such_overload");
	}
	return builder.build();
}

for (const kind of ["exact", "prefix", "regex"] as const) {
	summary(() => {
		for (const n of [10, 100]) {
			const classifier = withRules(n, kind);
			bench(`classify_${kind}_${n}_rules_miss`, () => classifier.classify("no rule matches this"));
		}
	});
}

// ── Alias table loading ──────────────────────────────────────────────────────

const TABLE = `aliases:
  "integer overflow": integer_overflow
  "found no matching overload": no_such_overload
rules:
  - regex: "^u?int(64)? (addition|subtraction|multiplication) overflow"
    category: integer_overflow
`;

bench("load_alias_table", () => loadAliasTable(TABLE));

await run();
