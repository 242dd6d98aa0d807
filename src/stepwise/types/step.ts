/**
 * Step Types
 *
 * The contract every step implements. Steps are shared by reference between
 * registries and callers, so implementations keep no per-execution state on
 * themselves and do all mutation through the context argument.
 */

import type { ExecutionContext } from "../core/context";
import type { StepFailure } from "./errors";
import type { StepRequest } from "./request";

/**
 * Callbacks may return a promise; the engine awaits it before execute() settles.
 * Use that (e.g. `await delay({ seconds: 1 })`) instead of blocking the event loop.
 */
export type StepCallbackResult = void | Promise<void>;

/**
 * A named unit of behavior producing one request and reacting to its outcome.
 *
 * @example
 * ```typescript
 * const robotsTxt: Step = {
 *   name: "RobotsTxt",
 *   onRequest: () => StepRequest.get("https://example.com/robots.txt").withStatusCodes([200]),
 *   onSuccess: (ctx) => ctx.setNextStep("Sitemap"),
 *   onError: (ctx, err) => ctx.log.warn(err.message),
 *   onTimeout: (ctx) => ctx.setNextStep("RobotsTxt"),
 * };
 * ```
 */
export interface Step {
	/** Registry key */
	readonly name: string;
	/** Builds the request to send. Must not perform I/O. */
	onRequest(): StepRequest;
	/** Response received and accepted by the status rule */
	onSuccess(context: ExecutionContext): StepCallbackResult;
	/** Transport failure or rejected status code */
	onError(context: ExecutionContext, error: StepFailure): StepCallbackResult;
	/** Transport deadline exceeded (never followed by onError for the same execution) */
	onTimeout(context: ExecutionContext): StepCallbackResult;
}
