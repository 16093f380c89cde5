import { describe, expect, test } from "vitest";
import { CelInt } from "../src/runtime.ts";
import { Scenario, ScenarioStateError } from "../src/scenario.ts";

describe("Scenario", () => {
	test("starts empty", () => {
		const scenario = new Scenario();
		expect(scenario.expression).toBeNull();
		expect(scenario.container).toBe("");
		expect(scenario.disableCheck).toBe(false);
		expect(scenario.bindings.size).toBe(0);
		expect(scenario.typeEnv).toHaveLength(0);
		expect(scenario.outcome).toBeNull();
		expect(scenario.errorMessage).toBeNull();
	});

	test("records a value", () => {
		const scenario = new Scenario();
		const outcome = scenario.recordValue(new CelInt(1n));
		expect(outcome).toEqual({ kind: "value", value: new CelInt(1n) });
		expect(scenario.outcome).toBe(outcome);
		expect(scenario.errorMessage).toBeNull();
	});

	test("records an error", () => {
		const scenario = new Scenario();
		scenario.recordError("division by zero", "divide_by_zero");
		expect(scenario.errorMessage).toBe("division by zero");
		expect(scenario.outcome).toEqual({
			kind: "error",
			message: "division by zero",
			category: "divide_by_zero",
		});
	});

	test("a second outcome is rejected", () => {
		const scenario = new Scenario();
		scenario.recordValue(new CelInt(1n));
		expect(() => scenario.recordError("late", "unclassified")).toThrow(ScenarioStateError);
		expect(() => scenario.recordValue(new CelInt(2n))).toThrow(
			"outcome already recorded (value); a scenario evaluates once",
		);
		expect(scenario.outcome).toEqual({ kind: "value", value: new CelInt(1n) });
	});
});
