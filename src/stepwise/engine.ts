/**
 * Step Engine
 *
 * Executes one named step end to end: builds the context, sends the request,
 * times it, classifies the outcome and calls the matching step hook. The
 * caller reads `context.getNextStep()` to decide what to run next.
 *
 * @example
 * ```typescript
 * const engine = createEngine([robotsTxt, sitemap]);
 *
 * let next: string | null = "RobotsTxt";
 * while (next) {
 *   const ctx = await engine.execute(next);
 *   next = ctx.getNextStep();
 * }
 * ```
 */

import type { Dispatcher } from "undici";
import { ExecutionContext } from "./core/context";
import {
	type FetchFn,
	HttpRequester,
	type TransportResponse,
	classifyTransportFailure,
} from "./core/http-requester";
import { StepRegistry } from "./core/registry";
import type { EngineOptions, EngineSettings, Step } from "./types";
import { StatusCodeNotFoundError, TimeoutError, resolveEngineSettings } from "./types";

export class StepEngine {
	readonly steps: StepRegistry;

	private readonly settings: EngineSettings;
	private readonly fetchFn: FetchFn | undefined;
	private readonly dispatcher: Dispatcher | undefined;

	constructor(options: EngineOptions = {}) {
		this.settings = resolveEngineSettings(options);
		this.steps = new StepRegistry({ strict: this.settings.strict });
		this.fetchFn = options.fetch;
		this.dispatcher = options.dispatcher;
	}

	/**
	 * Execute a registered step.
	 *
	 * Exactly one of onSuccess, onError or onTimeout runs. Failures are thrown
	 * after the hook has run, with `error.context` set so the caller can read a
	 * recovery step chosen by the hook. Nothing is retried.
	 *
	 * @throws StepNotFoundError before any request is built
	 * @throws TimeoutError after onTimeout
	 * @throws TransportError after onError
	 * @throws StatusCodeNotFoundError after onError
	 */
	async execute(stepName: string): Promise<ExecutionContext> {
		const step = this.steps.get(stepName);

		const startedAt = performance.now();
		const context = this.createContext(step, stepName);
		const elapsed = () => Math.round(performance.now() - startedAt);

		const pending = context.takePendingRequest();
		if (pending === null) {
			throw new Error(`Context for step "${stepName}" has no pending request`);
		}

		const { method, url } = context.request;
		context.log.info({ method, url }, `HTTP ${method} request`);
		if (context.request.body !== null && (method === "GET" || method === "HEAD")) {
			context.log.warn({ method }, `Body is not sent with ${method} requests`);
		}

		let response: TransportResponse;
		try {
			response = await pending.send();
		} catch (err) {
			context.setTimeElapsed(elapsed());
			const failure = classifyTransportFailure(err);
			failure.context = context;

			if (failure instanceof TimeoutError) {
				context.log.warn({ timeout: context.request.timeout }, `Timed out: ${failure.detail}`);
				await step.onTimeout(context);
				throw failure;
			}

			context.log.error(`Request failed: ${failure.detail}`);
			await step.onError(context, failure);
			throw failure;
		}

		context.setTimeElapsed(elapsed());
		context.recordResponse(response);

		if (!isAccepted(response.status, context.statusCodes)) {
			const error = new StatusCodeNotFoundError(response.status, context.statusCodes);
			error.context = context;
			context.log.warn(
				{ status: response.status, expected: context.statusCodes ?? "2xx" },
				"Status code rejected",
			);
			await step.onError(context, error);
			throw error;
		}

		context.log.info(
			{ status: response.status, duration: context.getTimeElapsed() },
			"HTTP request completed",
		);
		try {
			await step.onSuccess(context);
		} finally {
			context.releaseResponse();
		}

		return context;
	}

	private createContext(step: Step, stepName: string): ExecutionContext {
		const request = step.onRequest();
		const httpRequester = new HttpRequester({
			fetch: this.fetchFn,
			dispatcher: this.dispatcher,
		}).configure(request);

		return new ExecutionContext({
			request,
			httpRequester,
			currentStep: stepName,
			logToConsole: this.settings.logToConsole,
		});
	}
}

/**
 * Acceptance rule: membership in the explicit list, otherwise the 2xx range.
 */
export function isAccepted(status: number, statusCodes: readonly number[] | null): boolean {
	if (statusCodes !== null) {
		return statusCodes.includes(status);
	}
	return status >= 200 && status < 300;
}

/**
 * Create an engine with steps already registered.
 */
export function createEngine(steps: Iterable<Step> = [], options: EngineOptions = {}): StepEngine {
	const engine = new StepEngine(options);
	engine.steps.insertMany(steps);
	return engine;
}
