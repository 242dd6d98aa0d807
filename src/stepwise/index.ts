/**
 * stepwise - Step-oriented HTTP engine
 *
 * Register named steps, execute one at a time, follow the next-step hint.
 *
 * @example
 * ```typescript
 * import { StepRequest, createEngine, type Step } from "./src/stepwise";
 *
 * const ping: Step = {
 *   name: "Ping",
 *   onRequest: () => StepRequest.get("https://example.com/ping").withStatusCodes([200]),
 *   onSuccess: (ctx) => ctx.setNextStep("Ping"),
 *   onError: (ctx, err) => ctx.log.error(err.message),
 *   onTimeout: (ctx) => ctx.clearNextStep(),
 * };
 *
 * const engine = createEngine([ping]);
 * const ctx = await engine.execute("Ping");
 * ctx.getNextStep(); // "Ping"
 * ```
 */

// Engine
export { StepEngine, createEngine, isAccepted } from "./engine";

// Core
export { ExecutionContext } from "./core/context";
export type { ExecutionContextOptions } from "./core/context";

export { StepRegistry } from "./core/registry";
export type { StepRegistryOptions } from "./core/registry";

export { HttpRequester, classifyTransportFailure } from "./core/http-requester";
export type {
	FetchFn,
	FetchResponse,
	HttpRequesterOptions,
	PendingRequest,
	RequesterSettings,
	TransportInit,
	TransportResponse,
} from "./core/http-requester";

// Logging
export { createStepLogger } from "./logging/logger";
export type { LoggerOptions } from "./logging/logger";

// Types
export type {
	Step,
	StepCallbackResult,
	StepLogger,
	LogEntry,
	LogLevel,
	HttpMethod,
	StepRequestInit,
	StepRequestData,
	EngineOptions,
	EngineSettings,
	StepErrorKind,
	StepFailure,
} from "./types";

export {
	StepRequest,
	parseHeaders,
	requestInitSchema,
	httpMethods,
	DEFAULT_TIMEOUT_MS,
	MAX_TIMEOUT_MS,
	DEFAULT_USER_AGENT,
	engineOptionsSchema,
	resolveEngineSettings,
} from "./types";

// Error classes
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
} from "./types";

// Predefined Steps
export { httpStep, delay } from "./steps";
export type { HttpStepConfig, DelayConfig, DelayResult } from "./steps";
