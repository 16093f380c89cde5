/**
 * Tests for error-text matchers (src/text-matchers.ts).
 */

import { describe, expect, test } from "vitest";
import { ExactText, PrefixText, RegexText, TextMatcherError } from "../src/text-matchers.ts";

describe("ExactText", () => {
	test("matches the whole message", () => {
		const m = new ExactText("division by zero");
		expect(m.matches("division by zero")).toBe(true);
		expect(m.matches("division by zero!")).toBe(false);
		expect(m.matches("Division by zero")).toBe(false);
	});

	test("ignore case", () => {
		expect(new ExactText("Division By Zero", true).matches("DIVISION BY ZERO")).toBe(true);
	});

	test("describe", () => {
		expect(new ExactText("a").describe()).toBe('exact "a"');
	});
});

describe("PrefixText", () => {
	test("matches the start of the message", () => {
		const m = new PrefixText("undeclared reference");
		expect(m.matches("undeclared reference to 'x' (in container '')")).toBe(true);
		expect(m.matches("an undeclared reference")).toBe(false);
	});

	test("ignore case", () => {
		expect(new PrefixText("Found No", true).matches("found no matching overload")).toBe(true);
	});

	test("describe", () => {
		expect(new PrefixText("p").describe()).toBe('prefix "p"');
	});
});

describe("RegexText", () => {
	test("searches anywhere in the message", () => {
		const m = new RegexText("overflow$");
		expect(m.matches("int64 addition overflow")).toBe(true);
		expect(m.matches("overflowing")).toBe(false);
	});

	test("anchored pattern", () => {
		const m = new RegexText("^u?int(64)? (addition|negation) overflow");
		expect(m.matches("uint64 negation overflow")).toBe(true);
		expect(m.matches("double addition overflow")).toBe(false);
	});

	test("ignoreCase", () => {
		expect(new RegexText("^Int64 overflow", true).matches("int64 OVERFLOW")).toBe(true);
		expect(new RegexText("^Int64 overflow").matches("int64 overflow")).toBe(false);
	});

	test("rejects patterns RE2 cannot compile", () => {
		expect(() => new RegexText("(a")).toThrow(TextMatcherError);
		expect(() => new RegexText("(?=a)")).toThrow('invalid regex pattern "(?=a)"');
	});

	test("describe", () => {
		expect(new RegexText("^x").describe()).toBe('regex "^x"');
	});
});
