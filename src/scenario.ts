/**
 * Per-scenario state.
 *
 * One `Scenario` is allocated for each fixture case and dropped when the case
 * ends. The given-steps fill in the inputs, the orchestrator records exactly
 * one outcome, and the verifier reads it back.
 */

import type { Classification } from "./classifier.ts";
import type { CelValue } from "./runtime.ts";
import type { TypeEnvEntry } from "./type-env.ts";
import type { FixtureNode } from "./values.ts";

/** What one evaluation attempt produced: a value XOR a classified error. */
export type Outcome =
	| { readonly kind: "value"; readonly value: CelValue }
	| { readonly kind: "error"; readonly message: string; readonly category: Classification };

/**
 * What a fixture case expects. A case that expects `null` says so; a missing
 * expectation is a fixture error, never an implicit null.
 */
export type Expectation =
	| { readonly kind: "value"; readonly node: FixtureNode }
	| { readonly kind: "null" }
	| { readonly kind: "error"; readonly text: string }
	| { readonly kind: "no_error" };

/** The scenario was driven out of order: no expression, or a second outcome. */
export class ScenarioStateError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ScenarioStateError";
	}
}

export class Scenario {
	expression: string | null = null;
	container = "";
	disableCheck = false;
	readonly bindings = new Map<string, CelValue>();
	readonly typeEnv: TypeEnvEntry[] = [];
	private recorded: Outcome | null = null;

	get outcome(): Outcome | null {
		return this.recorded;
	}

	/** The captured error message, or null when none was captured. */
	get errorMessage(): string | null {
		return this.recorded?.kind === "error" ? this.recorded.message : null;
	}

	recordValue(value: CelValue): Outcome {
		return this.record({ kind: "value", value });
	}

	recordError(message: string, category: Classification): Outcome {
		return this.record({ kind: "error", message, category });
	}

	private record(outcome: Outcome): Outcome {
		if (this.recorded !== null) {
			throw new ScenarioStateError(
				`outcome already recorded (${this.recorded.kind}); a scenario evaluates once`,
			);
		}
		this.recorded = outcome;
		return outcome;
	}
}
