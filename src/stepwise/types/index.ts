/**
 * Type Exports
 *
 * Re-export all types from a single entry point.
 */

// Request descriptor
export {
	StepRequest,
	parseHeaders,
	requestInitSchema,
	httpMethods,
	DEFAULT_TIMEOUT_MS,
	MAX_TIMEOUT_MS,
	DEFAULT_USER_AGENT,
} from "./request";
export type { HttpMethod, StepRequestInit, StepRequestData } from "./request";

// Step contract
export type { Step, StepCallbackResult } from "./step";

// Log types
export type { StepLogger, LogEntry, LogLevel } from "./log";

// Configuration
export { engineOptionsSchema, resolveEngineSettings } from "./config";
export type { EngineOptions, EngineSettings } from "./config";

// Error types
export {
	StepError,
	StepNotFoundError,
	DuplicateStepNameError,
	InvalidRequestError,
	TransportError,
	TimeoutError,
	StatusCodeNotFoundError,
	BodyDecodeError,
	isStepError,
} from "./errors";
export type { StepErrorKind, StepFailure } from "./errors";
