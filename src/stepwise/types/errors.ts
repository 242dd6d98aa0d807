/**
 * Error Types
 *
 * Every failure the engine raises extends StepError. The `kind` field lets callers
 * branch without instanceof chains, and `context` carries the execution context
 * when the failure happened after the request was built.
 */

import type { ExecutionContext } from "../core/context";

export type StepErrorKind =
	| "step_not_found"
	| "duplicate_step_name"
	| "invalid_request"
	| "transport"
	| "timeout"
	| "status_code_not_found"
	| "body_decode";

/**
 * Base class for engine errors.
 *
 * @example
 * ```typescript
 * try {
 *   await engine.execute("Login");
 * } catch (err) {
 *   if (isStepError(err, "status_code_not_found")) {
 *     const recovery = err.context?.getNextStep();
 *   }
 * }
 * ```
 */
export class StepError extends Error {
	readonly kind: StepErrorKind;
	/** Context of the execution that failed (absent for failures before the request was built) */
	context: ExecutionContext | null = null;

	constructor(kind: StepErrorKind, message: string, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = "StepError";
		this.kind = kind;

		// Maintain proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target);
		}
	}
}

export class StepNotFoundError extends StepError {
	readonly stepName: string;

	constructor(stepName: string) {
		super("step_not_found", `Step "${stepName}" not found`);
		this.name = "StepNotFoundError";
		this.stepName = stepName;
	}
}

export class DuplicateStepNameError extends StepError {
	readonly stepName: string;

	constructor(stepName: string) {
		super("duplicate_step_name", `Step "${stepName}" is already registered`);
		this.name = "DuplicateStepNameError";
		this.stepName = stepName;
	}
}

export class InvalidRequestError extends StepError {
	constructor(detail: string, cause?: unknown) {
		super("invalid_request", `Invalid request: ${detail}`, cause);
		this.name = "InvalidRequestError";
	}
}

/**
 * Sending the request or reading the response failed (DNS, refused connection, TLS...).
 */
export class TransportError extends StepError {
	readonly detail: string;

	constructor(detail: string, cause?: unknown, kind: "transport" | "timeout" = "transport") {
		super(kind, `Transport error: ${detail}`, cause);
		this.name = "TransportError";
		this.detail = detail;
	}
}

/**
 * The request deadline passed. Still a TransportError for callers, but dispatched to
 * the step's onTimeout hook rather than onError.
 */
export class TimeoutError extends TransportError {
	constructor(detail: string, cause?: unknown) {
		super(detail, cause, "timeout");
		this.name = "TimeoutError";
	}
}

/**
 * The response status failed the acceptance rule. `expected` is null when the
 * request relied on the 2xx range.
 */
export class StatusCodeNotFoundError extends StepError {
	readonly actual: number;
	readonly expected: readonly number[] | null;

	constructor(actual: number, expected: readonly number[] | null) {
		const wanted = expected === null ? "2xx" : `[${expected.join(", ")}]`;
		super("status_code_not_found", `Status code ${actual} not in ${wanted}`);
		this.name = "StatusCodeNotFoundError";
		this.actual = actual;
		this.expected = expected === null ? null : [...expected];
	}
}

export class BodyDecodeError extends StepError {
	constructor(detail: string, cause?: unknown) {
		super("body_decode", `Could not decode body: ${detail}`, cause);
		this.name = "BodyDecodeError";
	}
}

/**
 * Failures a step's onError hook can receive.
 */
export type StepFailure = TransportError | StatusCodeNotFoundError;

export function isStepError(value: unknown, kind?: StepErrorKind): value is StepError {
	if (!(value instanceof StepError)) {
		return false;
	}
	return kind === undefined || value.kind === kind;
}
