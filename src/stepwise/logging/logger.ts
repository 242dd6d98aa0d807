/**
 * Logger Factory
 *
 * Pino-style loggers that record entries on the execution context and
 * mirror them to the console.
 */

import type { LogEntry, LogLevel, StepLogger } from "../types/log";

const levelRank: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const consoleWriters: Record<LogLevel, (...args: unknown[]) => void> = {
	debug: (...args) => console.debug(...args),
	info: (...args) => console.log(...args),
	warn: (...args) => console.warn(...args),
	error: (...args) => console.error(...args),
};

export interface LoggerOptions {
	/** Step name, used as the console prefix */
	stepName: string;
	/** Mirror entries to the console (default: true) */
	consoleOutput?: boolean;
	/** Lowest level mirrored to the console; every entry is still stored (default: "info") */
	consoleLevel?: LogLevel;
}

/**
 * Creates a logger that appends entries to `logStore`.
 *
 * @example
 * ```typescript
 * const logs: LogEntry[] = [];
 * const log = createStepLogger({ stepName: "Ping", consoleOutput: false }, logs);
 * log.info({ status: 200 }, "Request completed");
 * ```
 */
export function createStepLogger(options: LoggerOptions, logStore: LogEntry[]): StepLogger {
	const { stepName, consoleOutput = true, consoleLevel = "info" } = options;

	const write = (level: LogLevel, msgOrObj: string | object, optionalMsg?: string) => {
		const entry: LogEntry =
			typeof msgOrObj === "string"
				? { level, message: msgOrObj, timestamp: Date.now() }
				: {
						level,
						message: optionalMsg ?? "",
						timestamp: Date.now(),
						metadata: { ...msgOrObj },
					};

		logStore.push(entry);

		if (!consoleOutput || levelRank[level] < levelRank[consoleLevel]) {
			return;
		}

		const line = `[${stepName}] ${entry.message}`;
		if (entry.metadata) {
			consoleWriters[level](line, entry.metadata);
		} else {
			consoleWriters[level](line);
		}
	};

	return {
		debug(msgOrObj: string | object, optionalMsg?: string) {
			write("debug", msgOrObj, optionalMsg);
		},
		info(msgOrObj: string | object, optionalMsg?: string) {
			write("info", msgOrObj, optionalMsg);
		},
		warn(msgOrObj: string | object, optionalMsg?: string) {
			write("warn", msgOrObj, optionalMsg);
		},
		error(msgOrObj: string | object, optionalMsg?: string) {
			write("error", msgOrObj, optionalMsg);
		},
	};
}
