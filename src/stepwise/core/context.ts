/**
 * Execution Context
 *
 * Mutable record of one step invocation: the request, the pending transport
 * call, the buffered response, timing, and the next-step hint. One context per
 * execute() call; it is never shared between executions.
 */

import type { z } from "zod";
import { createStepLogger } from "../logging/logger";
import { BodyDecodeError, StepRequest } from "../types";
import type { LogEntry, StepLogger } from "../types";
import { HttpRequester, type PendingRequest, type TransportResponse } from "./http-requester";

export interface ExecutionContextOptions {
	/** Request to build (default: GET http://localhost/) */
	request?: StepRequest;
	/** Requester to build it with (default: a new requester configured from the request) */
	httpRequester?: HttpRequester;
	/** Name of the step being executed */
	currentStep?: string | null;
	/** Mirror log entries to the console (default: true) */
	logToConsole?: boolean;
}

export class ExecutionContext {
	/** The original request descriptor */
	readonly request: StepRequest;
	/** Step this context was created for */
	currentStep: string | null;
	/** Requester holding the transport settings */
	readonly httpRequester: HttpRequester;
	/** Raw response body; released once onSuccess has run */
	response: Uint8Array | null = null;
	/** HTTP status of the response, when one arrived */
	status: number | null = null;
	responseHeaders: Record<string, string> = {};
	/** Step the caller should execute next; set by step callbacks only */
	nextStep: string | null = null;
	/** Accepted status codes copied from the request; null means any 2xx */
	readonly statusCodes: readonly number[] | null;
	/** Milliseconds between the start of execution and the outcome; null until recorded */
	timeElapsed: number | null = null;

	readonly log: StepLogger;
	readonly logs: LogEntry[] = [];

	private pendingRequest: PendingRequest | null;

	constructor(options: ExecutionContextOptions = {}) {
		this.request = options.request ?? StepRequest.get("http://localhost/");
		this.httpRequester = options.httpRequester ?? new HttpRequester().configure(this.request);
		this.currentStep = options.currentStep ?? null;
		this.statusCodes = this.request.statusCodes === null ? null : [...this.request.statusCodes];
		this.pendingRequest = this.httpRequester.build(this.request);
		this.log = createStepLogger(
			{ stepName: this.currentStep ?? "anonymous", consoleOutput: options.logToConsole },
			this.logs,
		);
	}

	/**
	 * Removes and returns the pending request. Returns null once it has been taken.
	 */
	takePendingRequest(): PendingRequest | null {
		const pending = this.pendingRequest;
		this.pendingRequest = null;
		return pending;
	}

	hasPendingRequest(): boolean {
		return this.pendingRequest !== null;
	}

	/**
	 * Stores status, headers and body from a transport response.
	 */
	recordResponse(response: TransportResponse): void {
		this.status = response.status;
		this.responseHeaders = { ...response.headers };
		this.response = response.body;
	}

	setResponse(body: Uint8Array): void {
		this.response = body;
	}

	releaseResponse(): void {
		this.response = null;
	}

	setNextStep(step: string): void {
		this.nextStep = step;
	}

	clearNextStep(): void {
		this.nextStep = null;
	}

	getNextStep(): string | null {
		return this.nextStep;
	}

	getTimeElapsed(): number | null {
		return this.timeElapsed;
	}

	setTimeElapsed(ms: number): void {
		this.timeElapsed = ms;
	}

	/**
	 * Copy of the response body, or null when there is none.
	 */
	bodyBytes(): Uint8Array | null {
		return this.response === null ? null : this.response.slice();
	}

	/**
	 * Body decoded as text. Uses the charset from content-type when the runtime
	 * knows it, UTF-8 otherwise. Empty string when there is no response.
	 */
	bodyText(): string {
		if (this.response === null) {
			return "";
		}
		return createDecoder(this.responseHeaders["content-type"]).decode(this.response);
	}

	/**
	 * Parses the body as JSON, optionally validating it against a zod schema.
	 *
	 * @throws BodyDecodeError when there is no response, the JSON is malformed, or the schema rejects it
	 */
	async bodyJson(): Promise<unknown>;
	async bodyJson<S extends z.ZodTypeAny>(schema: S): Promise<z.output<S>>;
	async bodyJson(schema?: z.ZodTypeAny): Promise<unknown> {
		if (this.response === null) {
			throw new BodyDecodeError("no response");
		}

		let value: unknown;
		try {
			value = JSON.parse(this.bodyText());
		} catch (err) {
			throw new BodyDecodeError(err instanceof Error ? err.message : String(err), err);
		}

		if (!schema) {
			return value;
		}

		const result = await schema.safeParseAsync(value);
		if (!result.success) {
			const detail = result.error.issues
				.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
				.join("; ");
			throw new BodyDecodeError(detail, result.error);
		}
		return result.data;
	}
}

function createDecoder(contentType: string | undefined): TextDecoder {
	const charset = contentType?.match(/charset\s*=\s*"?([^";\s]+)"?/i)?.[1];
	if (charset) {
		try {
			return new TextDecoder(charset);
		} catch (err) {
			if (!(err instanceof RangeError)) {
				throw err;
			}
		}
	}
	return new TextDecoder("utf-8");
}
