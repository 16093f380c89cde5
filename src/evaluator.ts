/**
 * Boundary to the expression evaluator under test.
 *
 * The engine never looks inside an evaluator: it compiles an expression,
 * runs the program against an activation, and reads back either a value or
 * an `EvaluationError`. Anything else an evaluator throws is treated as a
 * crash, not an outcome.
 */

import type { CelValue } from "./runtime.ts";
import type { Annotation } from "./type-env.ts";

/** Variable name → runtime value for one evaluation. */
export type Activation = ReadonlyMap<string, CelValue>;

export interface CompileRequest {
	readonly expression: string;
	readonly annotations: ReadonlyMap<string, Annotation>;
	/** Namespace used to resolve unqualified type and function names. */
	readonly container: string;
	/** Skip static checking; errors it would catch surface at evaluation instead. */
	readonly disableCheck: boolean;
}

export interface Program {
	evaluate(activation: Activation): CelValue;
}

export interface Evaluator {
	compile(request: CompileRequest): Program;
}

/**
 * The evaluator's own error channel. Message text is implementation-specific
 * and only ever compared through the error classifier.
 */
export class EvaluationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "EvaluationError";
	}
}
