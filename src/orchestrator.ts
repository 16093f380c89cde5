/**
 * One evaluation attempt per scenario.
 *
 * Builds the annotation map from the scenario's type environment, compiles
 * and runs the expression, and records a value or a classified error. Only
 * `EvaluationError` counts as an outcome; anything else propagates.
 */

import { DEFAULT_CLASSIFIER, type ErrorClassifier } from "./classifier.ts";
import type { Binding } from "./config.ts";
import { type Quote, expandEscapes } from "./escapes.ts";
import { EvaluationError, type Evaluator } from "./evaluator.ts";
import { type Logger, silentLogger } from "./logger.ts";
import { DEFAULT_REGISTRY, type Registry } from "./registry.ts";
import { celToString } from "./runtime.ts";
import { type Outcome, type Scenario, ScenarioStateError } from "./scenario.ts";
import { type OpaqueBinding, buildAnnotations, describeAnnotation } from "./type-env.ts";
import { translate } from "./values.ts";

/** Supplies opaque message types for a non-empty container. */
export type StandInProvider = (container: string) => readonly OpaqueBinding[];

export interface EvaluateOptions {
	readonly classifier?: ErrorClassifier;
	readonly standIns?: StandInProvider;
	readonly logger?: Logger;
}

/** Translate fixture bindings into the scenario's activation. Later keys overwrite earlier ones. */
export function applyBindings(
	scenario: Scenario,
	bindings: readonly Binding[],
	registry: Registry = DEFAULT_REGISTRY,
): void {
	for (const { key, value } of bindings) {
		scenario.bindings.set(key, translate(value, registry));
	}
}

/**
 * Evaluate expression text as written in a fixture step quoted with `quote`:
 * unescape the quote, store the expression, then evaluate.
 */
export function evaluateExpression(
	scenario: Scenario,
	text: string,
	quote: Quote,
	evaluator: Evaluator,
	options: EvaluateOptions = {},
): Outcome {
	requireUnevaluated(scenario);
	scenario.expression = expandEscapes(text, quote);
	return evaluateScenario(scenario, evaluator, options);
}

export function evaluateScenario(
	scenario: Scenario,
	evaluator: Evaluator,
	options: EvaluateOptions = {},
): Outcome {
	const classifier = options.classifier ?? DEFAULT_CLASSIFIER;
	const logger = options.logger ?? silentLogger;

	const expression = scenario.expression;
	if (expression === null) {
		throw new ScenarioStateError("no expression to evaluate");
	}
	requireUnevaluated(scenario);

	if (scenario.container !== "" && options.standIns !== undefined) {
		scenario.typeEnv.push(...options.standIns(scenario.container));
	}
	const annotations = buildAnnotations(scenario.typeEnv);

	logger.debug(
		`annotations: {${[...annotations].map(([k, v]) => `${k}: ${describeAnnotation(v)}`).join(", ")}}`,
	);
	logger.debug(
		`activation: {${[...scenario.bindings].map(([k, v]) => `${k}: ${celToString(v)}`).join(", ")}}`,
	);

	try {
		const program = evaluator.compile({
			expression,
			annotations,
			container: scenario.container,
			disableCheck: scenario.disableCheck,
		});
		const result = program.evaluate(scenario.bindings);
		return scenario.recordValue(result);
	} catch (e) {
		if (!(e instanceof EvaluationError)) throw e;
		const category = classifier.classify(e.message);
		logger.debug(`evaluation error ${JSON.stringify(e.message)} classified as ${category}`);
		return scenario.recordError(e.message, category);
	}
}

function requireUnevaluated(scenario: Scenario): void {
	const recorded = scenario.outcome;
	if (recorded !== null) {
		throw new ScenarioStateError(
			`outcome already recorded (${recorded.kind}); a scenario evaluates once`,
		);
	}
}
