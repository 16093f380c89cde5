/**
 * Error message classification.
 *
 * Evaluator implementations word the same failure differently ("division by
 * zero" vs "divide by zero"), so expected and actual errors are compared by
 * category rather than by text. Classification runs, in order:
 *
 *   1. no message                          → "no_error"
 *   2. the message is a category name      → that category
 *   3. exact alias lookup                  → the alias's category
 *   4. structural rules, first match wins  → the rule's category
 *   5. otherwise                           → "unclassified"
 */

import { PrefixText, type TextMatcher } from "./text-matchers.ts";

export const ERROR_CATEGORIES = [
	"divide_by_zero",
	"modulus_by_zero",
	"no_such_overload",
	"integer_overflow",
	"undeclared_reference",
	"unknown_variable",
] as const;

export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

export const UNCLASSIFIED = "unclassified";
export const NO_ERROR = "no_error";

/** Result of classification: a category, or one of the two implicit outcomes. */
export type Classification = ErrorCategory | typeof UNCLASSIFIED | typeof NO_ERROR;

/**
 * How an expected error is compared with the captured one.
 *
 * - `any`: an error must have occurred; a category mismatch is only logged.
 * - `exact`: the categories must be equal.
 */
export type MatchPolicy = "any" | "exact";

export function isErrorCategory(value: string): value is ErrorCategory {
	return ERROR_CATEGORIES.some((category) => category === value);
}

/** Pairs a message matcher with the category it assigns. */
export class ClassifierRule {
	constructor(
		readonly matcher: TextMatcher,
		readonly category: ErrorCategory,
	) {}
}

// =====================================================================
// Builder
// =====================================================================

/**
 * Builder for an ErrorClassifier.
 *
 * Aliases are exact phrasings; rules are checked in registration order after
 * the alias lookup misses. Re-registering an alias overwrites it.
 */
export class ClassifierBuilder {
	private readonly aliasTable = new Map<string, ErrorCategory>();
	private readonly ruleList: ClassifierRule[] = [];

	/** Map one exact phrasing to a category. */
	alias(text: string, category: ErrorCategory): this {
		this.aliasTable.set(text, category);
		return this;
	}

	/** Append a structural rule. */
	rule(matcher: TextMatcher, category: ErrorCategory): this {
		this.ruleList.push(new ClassifierRule(matcher, category));
		return this;
	}

	/** Freeze the tables. */
	build(): ErrorClassifier {
		return new ErrorClassifier(new Map(this.aliasTable), [...this.ruleList]);
	}
}

// =====================================================================
// Classifier
// =====================================================================

export class ErrorClassifier {
	private readonly aliasTable: ReadonlyMap<string, ErrorCategory>;
	private readonly ruleList: readonly ClassifierRule[];

	constructor(aliases: Map<string, ErrorCategory>, rules: ClassifierRule[]) {
		this.aliasTable = aliases;
		this.ruleList = Object.freeze(rules);
		Object.freeze(this);
	}

	classify(message: string | null): Classification {
		if (message === null) return NO_ERROR;
		if (isErrorCategory(message)) return message;

		const aliased = this.aliasTable.get(message);
		if (aliased !== undefined) return aliased;

		for (const rule of this.ruleList) {
			if (rule.matcher.matches(message)) return rule.category;
		}
		return UNCLASSIFIED;
	}

	/** Number of exact aliases. */
	get aliasCount(): number {
		return this.aliasTable.size;
	}

	get rules(): readonly ClassifierRule[] {
		return this.ruleList;
	}

	/** Return all alias phrasings (sorted). */
	aliases(): string[] {
		return [...this.aliasTable.keys()].sort();
	}

	/** A builder pre-loaded with this classifier's tables, for extension. */
	toBuilder(): ClassifierBuilder {
		const builder = new ClassifierBuilder();
		for (const [text, category] of this.aliasTable) {
			builder.alias(text, category);
		}
		for (const rule of this.ruleList) {
			builder.rule(rule.matcher, rule.category);
		}
		return builder;
	}
}

// =====================================================================
// Default tables
// =====================================================================

/** Known cross-implementation phrasings. Extend through ClassifierBuilder or a YAML alias table. */
export function defaultClassifierBuilder(): ClassifierBuilder {
	return new ClassifierBuilder()
		.alias("division by zero", "divide_by_zero")
		.alias("divide by zero", "divide_by_zero")
		.alias("modulus by zero", "modulus_by_zero")
		.alias("no such overload", "no_such_overload")
		.alias("no matching overload", "no_such_overload")
		.alias("return error for overflow", "integer_overflow")
		.alias("unknown variable", "unknown_variable")
		.rule(new PrefixText("undeclared reference"), "undeclared_reference");
}

export const DEFAULT_CLASSIFIER: ErrorClassifier = defaultClassifierBuilder().build();
