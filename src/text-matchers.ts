import { RE2JS } from "re2js";

/** Match against an error message. */
export interface TextMatcher {
	matches(text: string): boolean;
	/** Short form for diagnostics, e.g. `prefix "undeclared reference"`. */
	describe(): string;
}

/** Error raised when a matcher cannot be constructed. */
export class TextMatcherError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "TextMatcherError";
	}
}

/** Exact string equality. Pre-lowercases at construction when ignoreCase. */
export class ExactText implements TextMatcher {
	private readonly cmpValue: string;

	constructor(
		readonly value: string,
		readonly ignoreCase: boolean = false,
	) {
		this.cmpValue = ignoreCase ? value.toLowerCase() : value;
	}

	matches(text: string): boolean {
		const input = this.ignoreCase ? text.toLowerCase() : text;
		return input === this.cmpValue;
	}

	describe(): string {
		return `exact ${JSON.stringify(this.value)}`;
	}
}

/** String prefix match. Pre-lowercases at construction when ignoreCase. */
export class PrefixText implements TextMatcher {
	private readonly cmpPrefix: string;

	constructor(
		readonly prefix: string,
		readonly ignoreCase: boolean = false,
	) {
		this.cmpPrefix = ignoreCase ? prefix.toLowerCase() : prefix;
	}

	matches(text: string): boolean {
		const input = this.ignoreCase ? text.toLowerCase() : text;
		return input.startsWith(this.cmpPrefix);
	}

	describe(): string {
		return `prefix ${JSON.stringify(this.prefix)}`;
	}
}

/**
 * Regular expression match using RE2 for guaranteed linear-time matching.
 * Searches anywhere in the message; anchor with `^` for a prefix.
 *
 * RE2 does not support backreferences or lookaround. Patterns using them are
 * rejected at construction. With ignoreCase the pattern compiles with RE2's
 * case-insensitive flag.
 */
export class RegexText implements TextMatcher {
	private readonly compiled: RE2JS;

	constructor(
		readonly pattern: string,
		readonly ignoreCase: boolean = false,
	) {
		try {
			this.compiled = RE2JS.compile(pattern, ignoreCase ? RE2JS.CASE_INSENSITIVE : 0);
		} catch (e) {
			throw new TextMatcherError(
				`invalid regex pattern "${pattern}": ${e instanceof Error ? e.message : String(e)}`,
			);
		}
	}

	matches(text: string): boolean {
		return this.compiled.matcher(text).find();
	}

	describe(): string {
		return `regex ${JSON.stringify(this.pattern)}`;
	}
}
