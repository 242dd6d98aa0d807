/**
 * HTTP Step Factory
 *
 * Builds a Step from a declarative config, for the common case where a step is
 * "fetch this URL, then go there next".
 *
 * @example
 * ```typescript
 * const robotsTxt = httpStep({
 *   name: "RobotsTxt",
 *   url: "https://example.com/robots.txt",
 *   statusCodes: [200],
 *   next: (ctx) => (ctx.bodyText().includes("Sitemap:") ? "Sitemap" : null),
 * });
 *
 * // POST with a JSON body, retrying the same step on timeout
 * const login = httpStep({
 *   name: "Login",
 *   url: "https://example.com/session",
 *   method: "POST",
 *   json: { user: "test-user", password: "test-secret" },
 *   next: "Dashboard",
 *   onTimeout: (ctx) => ctx.setNextStep("Login"),
 * });
 * ```
 */

import type { ExecutionContext } from "../core/context";
import type { HttpMethod, Step, StepCallbackResult, StepFailure } from "../types";
import { StepRequest } from "../types";

/**
 * HTTP step configuration.
 */
export interface HttpStepConfig {
	/** Registry key */
	name: string;
	url: string;
	/** HTTP method (default: GET) */
	method?: HttpMethod;
	headers?: Record<string, string>;
	/** Raw request body */
	body?: string;
	/** Request body serialized as JSON (sets content-type) */
	json?: unknown;
	/** Timeout in milliseconds (default: 30000) */
	timeout?: number;
	/** Accepted status codes (default: any 2xx) */
	statusCodes?: number[];
	proxy?: string;
	/** Ask for compressed responses (default: true) */
	compression?: boolean;
	userAgent?: string;
	/** Step to run after success; a function can inspect the response */
	next?: string | ((context: ExecutionContext) => string | null);
	onError?: (context: ExecutionContext, error: StepFailure) => StepCallbackResult;
	onTimeout?: (context: ExecutionContext) => StepCallbackResult;
}

/**
 * Creates a step that sends the configured request.
 *
 * Without hooks, failures are only logged and leave the next-step hint unset.
 */
export function httpStep(config: HttpStepConfig): Step {
	const { name, next, onError, onTimeout } = config;

	if (config.body !== undefined && config.json !== undefined) {
		throw new Error(`httpStep "${name}" accepts either 'body' or 'json', not both`);
	}

	let request = new StepRequest({
		method: config.method ?? "GET",
		url: config.url,
		headers: config.headers,
		timeout: config.timeout,
		proxy: config.proxy,
		statusCodes: config.statusCodes,
		compression: config.compression,
		userAgent: config.userAgent,
		body: config.body,
	});
	if (config.json !== undefined) {
		request = request.withJsonBody(config.json);
	}

	return {
		name,
		onRequest: () => request.clone(),
		onSuccess(context) {
			const target = typeof next === "function" ? next(context) : next;
			if (target) {
				context.setNextStep(target);
			}
		},
		onError(context, error) {
			if (onError) {
				return onError(context, error);
			}
			context.log.error({ kind: error.kind }, error.message);
		},
		onTimeout(context) {
			if (onTimeout) {
				return onTimeout(context);
			}
			context.log.warn("No timeout handler; leaving next step unset");
		},
	};
}
