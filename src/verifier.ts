/**
 * Outcome verification.
 *
 * Compares what a scenario captured with what its fixture expects. Value
 * expectations are translated and compared structurally; error expectations
 * are compared by category under the active match policy.
 */

import {
	type Classification,
	DEFAULT_CLASSIFIER,
	type ErrorClassifier,
	type MatchPolicy,
} from "./classifier.ts";
import { type Logger, silentLogger } from "./logger.ts";
import { DEFAULT_REGISTRY, type Registry } from "./registry.ts";
import { NULL_VALUE, celEquals, celToString } from "./runtime.ts";
import type { Expectation, Outcome, Scenario } from "./scenario.ts";
import { type FixtureNode, translate } from "./values.ts";

/** An assertion failure, carrying both sides for diagnosis. */
export class VerificationError extends Error {
	readonly expected: string;
	readonly actual: string;

	constructor(message: string, expected: string, actual: string) {
		super(`${message}: expected ${expected}, got ${actual}`);
		this.name = "VerificationError";
		this.expected = expected;
		this.actual = actual;
	}
}

export interface VerifyOptions {
	readonly policy?: MatchPolicy;
	readonly classifier?: ErrorClassifier;
	readonly registry?: Registry;
	readonly logger?: Logger;
}

/**
 * The scenario must have produced a value equal to `expected`.
 * `null` expects the null value.
 */
export function verifyValue(
	scenario: Scenario,
	expected: FixtureNode | null,
	options: VerifyOptions = {},
): void {
	const want = expected === null ? NULL_VALUE : translate(expected, options.registry ?? DEFAULT_REGISTRY);
	const outcome = scenario.outcome;
	if (outcome === null) {
		throw new VerificationError("no outcome recorded", celToString(want), "nothing");
	}
	if (outcome.kind === "error") {
		throw new VerificationError(
			"evaluation failed",
			celToString(want),
			`error ${JSON.stringify(outcome.message)} (${outcome.category})`,
		);
	}
	if (!celEquals(outcome.value, want)) {
		throw new VerificationError("result mismatch", celToString(want), celToString(outcome.value));
	}
}

/**
 * The scenario must have captured an error. Under `exact`, its category must
 * also equal the category of `text`; under `any`, a mismatch is logged.
 */
export function verifyError(scenario: Scenario, text: string, options: VerifyOptions = {}): void {
	const classifier = options.classifier ?? DEFAULT_CLASSIFIER;
	const policy = options.policy ?? "any";
	const logger = options.logger ?? silentLogger;

	const expectedCategory = classifier.classify(text);
	const actualCategory = classifier.classify(scenario.errorMessage);

	if (expectedCategory !== actualCategory) {
		if (policy === "exact") {
			throw new VerificationError(
				"error category mismatch",
				expectedCategory,
				describeActual(scenario.outcome, actualCategory),
			);
		}
		logger.warn(
			`error category mismatch: expected ${expectedCategory} (${JSON.stringify(text)}), got ${describeActual(scenario.outcome, actualCategory)}`,
		);
	}
	if (scenario.errorMessage === null) {
		throw new VerificationError(
			"expected an error",
			`${expectedCategory} (${JSON.stringify(text)})`,
			describeActual(scenario.outcome, actualCategory),
		);
	}
}

/** The scenario must not have captured an error. */
export function verifyNoError(scenario: Scenario): void {
	const outcome = scenario.outcome;
	if (outcome?.kind === "error") {
		throw new VerificationError(
			"unexpected error",
			"no error",
			`error ${JSON.stringify(outcome.message)} (${outcome.category})`,
		);
	}
}

/** Dispatch on the expectation variant. */
export function verifyOutcome(
	scenario: Scenario,
	expectation: Expectation,
	options: VerifyOptions = {},
): void {
	switch (expectation.kind) {
		case "value":
			return verifyValue(scenario, expectation.node, options);
		case "null":
			return verifyValue(scenario, null, options);
		case "error":
			return verifyError(scenario, expectation.text, options);
		case "no_error":
			return verifyNoError(scenario);
	}
}

function describeActual(outcome: Outcome | null, category: Classification): string {
	if (outcome === null) return "nothing";
	if (outcome.kind === "value") return `value ${celToString(outcome.value)}`;
	return `error ${JSON.stringify(outcome.message)} (${category})`;
}
