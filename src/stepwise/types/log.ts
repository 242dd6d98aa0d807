/**
 * Log Types
 *
 * Shape of the logger handed to steps through the execution context.
 */

/**
 * Logger interface provided to steps (Pino-style call signatures).
 */
export interface StepLogger {
	debug(msg: string): void;
	debug(obj: object, msg?: string): void;
	info(msg: string): void;
	info(obj: object, msg?: string): void;
	warn(msg: string): void;
	warn(obj: object, msg?: string): void;
	error(msg: string): void;
	error(obj: object, msg?: string): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Log entry kept on the execution context.
 */
export interface LogEntry {
	level: LogLevel;
	message: string;
	timestamp: number;
	metadata?: Record<string, unknown>;
}
