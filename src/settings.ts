/**
 * Run settings.
 *
 * Error-match strictness and log level come from the environment
 * (`CEL_CONFORMANCE_MATCH=exact`) or from runner user data (`match=exact`).
 * Both default to the lenient choice.
 */

import type { MatchPolicy } from "./classifier.ts";
import { ConfigParseError } from "./config.ts";
import { LOG_LEVELS, type LogLevel } from "./logger.ts";

export const MATCH_ENV = "CEL_CONFORMANCE_MATCH";
export const LOG_LEVEL_ENV = "CEL_CONFORMANCE_LOG_LEVEL";

const MATCH_POLICIES: readonly MatchPolicy[] = ["any", "exact"];

export interface Settings {
	readonly matchPolicy: MatchPolicy;
	readonly logLevel: LogLevel;
}

export const DEFAULT_SETTINGS: Settings = { matchPolicy: "any", logLevel: "warn" };

/** Read settings from an environment map such as `process.env`. */
export function loadSettings(env: Readonly<Record<string, string | undefined>>): Settings {
	return {
		matchPolicy: parseMatchPolicy(env[MATCH_ENV], MATCH_ENV),
		logLevel: parseLogLevel(env[LOG_LEVEL_ENV]),
	};
}

/** Read the policy from runner user data (`-D match=exact`). */
export function matchPolicyFrom(userdata: Readonly<Record<string, string | undefined>>): MatchPolicy {
	return parseMatchPolicy(userdata.match, "match");
}

function parseMatchPolicy(raw: string | undefined, source: string): MatchPolicy {
	if (raw === undefined || raw === "") return DEFAULT_SETTINGS.matchPolicy;
	const policy = MATCH_POLICIES.find((p) => p === raw.trim().toLowerCase());
	if (policy === undefined) {
		throw new ConfigParseError(
			`${source} must be one of [${MATCH_POLICIES.join(", ")}], got ${JSON.stringify(raw)}`,
		);
	}
	return policy;
}

function parseLogLevel(raw: string | undefined): LogLevel {
	if (raw === undefined || raw === "") return DEFAULT_SETTINGS.logLevel;
	const level = LOG_LEVELS.find((l) => l === raw.trim().toLowerCase());
	if (level === undefined) {
		throw new ConfigParseError(
			`${LOG_LEVEL_ENV} must be one of [${LOG_LEVELS.join(", ")}], got ${JSON.stringify(raw)}`,
		);
	}
	return level;
}
