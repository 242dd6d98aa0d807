/**
 * Test Helpers
 *
 * In-process transport stand-ins and a recording step, so tests never touch
 * the network.
 */

import {
	type ExecutionContext,
	type FetchFn,
	type FetchResponse,
	type Step,
	type StepFailure,
	StepRequest,
	type TransportInit,
} from "../src/stepwise";

export interface FakeReply {
	status?: number;
	statusText?: string;
	headers?: Record<string, string>;
	body?: string;
}

export interface RecordedCall {
	url: string;
	init: TransportInit;
}

/**
 * A fetch function that answers every call with `reply` (or the result of calling it).
 */
export function fakeFetch(
	reply: FakeReply | ((url: string, init: TransportInit) => FakeReply | Promise<FakeReply>),
): FetchFn & { calls: RecordedCall[] } {
	const calls: RecordedCall[] = [];

	const fn = async (url: string, init: TransportInit): Promise<FetchResponse> => {
		calls.push({ url, init });
		const resolved = typeof reply === "function" ? await reply(url, init) : reply;
		return toResponse(resolved);
	};

	return Object.assign(fn, { calls });
}

/**
 * A fetch function that always rejects with `error`.
 */
export function failingFetch(error: unknown): FetchFn & { calls: RecordedCall[] } {
	const calls: RecordedCall[] = [];

	const fn = async (url: string, init: TransportInit): Promise<FetchResponse> => {
		calls.push({ url, init });
		throw error;
	};

	return Object.assign(fn, { calls });
}

/**
 * Same name and message as the error AbortSignal.timeout() aborts with.
 */
export function abortTimeoutError(): Error {
	const error = new Error("The operation was aborted due to timeout");
	error.name = "TimeoutError";
	return error;
}

/**
 * Awaits a promise that must reject with an instance of `type`, and returns the error.
 */
export async function expectRejection<T extends Error>(
	promise: Promise<unknown>,
	type: new (...args: never[]) => T,
): Promise<T> {
	const outcome = await promise.then(
		() => undefined,
		(err: unknown) => err,
	);
	if (!(outcome instanceof type)) {
		throw new Error(`Expected ${type.name}, got ${String(outcome)}`);
	}
	return outcome;
}

function toResponse(reply: FakeReply): FetchResponse {
	const headers = reply.headers ?? {};
	const bytes = new TextEncoder().encode(reply.body ?? "");

	return {
		status: reply.status ?? 200,
		statusText: reply.statusText ?? "",
		headers: {
			forEach(callback) {
				for (const [key, value] of Object.entries(headers)) {
					callback(value, key);
				}
			},
		},
		arrayBuffer: async () => {
			const buffer = new ArrayBuffer(bytes.byteLength);
			new Uint8Array(buffer).set(bytes);
			return buffer;
		},
	};
}

export interface StepCalls {
	onRequest: number;
	onSuccess: number;
	onError: StepFailure[];
	onTimeout: number;
	/** Body text seen inside onSuccess */
	successBody: string | null;
	/** Elapsed time seen by whichever hook ran */
	elapsedSeen: number | null;
}

export interface RecordingStepOptions {
	request?: () => StepRequest;
	onSuccess?: (context: ExecutionContext) => void | Promise<void>;
	onError?: (context: ExecutionContext, error: StepFailure) => void;
	onTimeout?: (context: ExecutionContext) => void;
}

/**
 * A step that counts every hook call.
 */
export function recordingStep(
	name: string,
	options: RecordingStepOptions = {},
): Step & { calls: StepCalls } {
	const calls: StepCalls = {
		onRequest: 0,
		onSuccess: 0,
		onError: [],
		onTimeout: 0,
		successBody: null,
		elapsedSeen: null,
	};

	return {
		name,
		calls,
		onRequest() {
			calls.onRequest++;
			return options.request?.() ?? StepRequest.get("http://test.local/ping");
		},
		async onSuccess(context) {
			calls.onSuccess++;
			calls.successBody = context.bodyText();
			calls.elapsedSeen = context.getTimeElapsed();
			await options.onSuccess?.(context);
		},
		onError(context, error) {
			calls.onError.push(error);
			calls.elapsedSeen = context.getTimeElapsed();
			options.onError?.(context, error);
		},
		onTimeout(context) {
			calls.onTimeout++;
			calls.elapsedSeen = context.getTimeElapsed();
			options.onTimeout?.(context);
		},
	};
}
