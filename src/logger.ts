/**
 * Leveled logger, injected wherever diagnostics are written.
 *
 * Dependency-free; output goes to the console method matching the level.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
	setLevel(level: LogLevel): void;
}

/**
 * Create a logger that drops messages below `minLevel`.
 *
 * ```typescript
 * const logger = createLogger("debug", "[conformance]");
 * logger.warn("category mismatch"); // 2026-01-21T12:00:00.000Z WARN  [conformance] category mismatch
 * ```
 */
export function createLogger(minLevel: LogLevel = "warn", prefix = "[cel-conformance]"): Logger {
	let currentLevel = LOG_LEVELS.indexOf(minLevel);

	const log = (level: LogLevel, message: string, ...args: unknown[]) => {
		if (LOG_LEVELS.indexOf(level) < currentLevel) return;
		const timestamp = new Date().toISOString();
		const levelStr = level.toUpperCase().padEnd(5);
		const fullMessage = `${timestamp} ${levelStr} ${prefix} ${message}`;

		switch (level) {
			case "debug":
				console.debug(fullMessage, ...args);
				break;
			case "info":
				console.info(fullMessage, ...args);
				break;
			case "warn":
				console.warn(fullMessage, ...args);
				break;
			case "error":
				console.error(fullMessage, ...args);
				break;
		}
	};

	return {
		debug: (message, ...args) => log("debug", message, ...args),
		info: (message, ...args) => log("info", message, ...args),
		warn: (message, ...args) => log("warn", message, ...args),
		error: (message, ...args) => log("error", message, ...args),
		setLevel: (level) => {
			currentLevel = LOG_LEVELS.indexOf(level);
		},
	};
}

/** Discards everything. The default wherever a logger is optional. */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
	setLevel: () => {},
};
