/**
 * HTTP Requester
 *
 * Adapter between a StepRequest and the transport. Owns the transport-level
 * settings (proxy, user agent, compression) and hands back a PendingRequest
 * that can be sent exactly once.
 */

import { type Dispatcher, ProxyAgent, fetch as undiciFetch } from "undici";
import type { StepRequest } from "../types";
import { TimeoutError, TransportError } from "../types";

/**
 * Init passed to the transport.
 */
export interface TransportInit {
	method: string;
	headers: Record<string, string>;
	body?: string;
	signal: AbortSignal;
	dispatcher?: Dispatcher;
}

/**
 * Minimal response surface the requester reads.
 */
export interface FetchResponse {
	status: number;
	statusText: string;
	headers: { forEach(callback: (value: string, key: string) => void): void };
	arrayBuffer(): Promise<ArrayBuffer>;
}

/**
 * Fetch function type for dependency injection.
 */
export type FetchFn = (url: string, init: TransportInit) => Promise<FetchResponse>;

/**
 * Response as seen by the engine.
 */
export interface TransportResponse {
	status: number;
	statusText: string;
	headers: Record<string, string>;
	body: Uint8Array;
}

export interface RequesterSettings {
	proxy: string | null;
	userAgent: string | null;
	compression: boolean;
}

export interface HttpRequesterOptions {
	/** Custom fetch function for testing/mocking (default: undici fetch) */
	fetch?: FetchFn;
	/** Undici dispatcher used when no proxy is configured */
	dispatcher?: Dispatcher;
}

/**
 * A built request waiting to be sent.
 */
export interface PendingRequest {
	readonly request: StepRequest;
	/**
	 * Sends the request and buffers the body.
	 *
	 * @throws TransportError, or TimeoutError when the request deadline passes
	 */
	send(): Promise<TransportResponse>;
}

const defaultFetch: FetchFn = (url, init) => undiciFetch(url, init);

const TIMEOUT_CODES = new Set([
	"UND_ERR_CONNECT_TIMEOUT",
	"UND_ERR_HEADERS_TIMEOUT",
	"UND_ERR_BODY_TIMEOUT",
	"ETIMEDOUT",
]);

export class HttpRequester {
	readonly settings: RequesterSettings = {
		proxy: null,
		userAgent: null,
		compression: true,
	};

	private readonly fetchFn: FetchFn;
	private readonly dispatcher: Dispatcher | undefined;

	constructor(options: HttpRequesterOptions = {}) {
		this.fetchFn = options.fetch ?? defaultFetch;
		this.dispatcher = options.dispatcher;
	}

	/**
	 * Copies proxy, user agent and compression from a request into the settings.
	 */
	configure(request: StepRequest): this {
		this.settings.proxy = request.proxy;
		this.settings.userAgent = request.userAgent;
		this.settings.compression = request.compression;
		return this;
	}

	build(request: StepRequest): PendingRequest {
		const headers = this.buildHeaders(request);
		const proxy = this.settings.proxy;
		const fetchFn = this.fetchFn;
		const sharedDispatcher = this.dispatcher;
		let sent = false;

		return {
			request,
			async send(): Promise<TransportResponse> {
				if (sent) {
					throw new TransportError("request was already sent");
				}
				sent = true;

				const proxyAgent = proxy === null ? undefined : new ProxyAgent(proxy);
				const init: TransportInit = {
					method: request.method,
					headers,
					signal: AbortSignal.timeout(request.timeout),
				};
				const dispatcher = proxyAgent ?? sharedDispatcher;
				if (dispatcher) {
					init.dispatcher = dispatcher;
				}
				if (request.body !== null && request.method !== "GET" && request.method !== "HEAD") {
					init.body = request.body;
				}

				try {
					const response = await fetchFn(request.url, init);
					const body = new Uint8Array(await response.arrayBuffer());

					const responseHeaders: Record<string, string> = {};
					response.headers.forEach((value, key) => {
						responseHeaders[key.toLowerCase()] = value;
					});

					return {
						status: response.status,
						statusText: response.statusText,
						headers: responseHeaders,
						body,
					};
				} catch (err) {
					throw classifyTransportFailure(err);
				} finally {
					await proxyAgent?.close();
				}
			},
		};
	}

	private buildHeaders(request: StepRequest): Record<string, string> {
		const headers: Record<string, string> = { ...request.headers };

		if (this.settings.userAgent !== null && headers["user-agent"] === undefined) {
			headers["user-agent"] = this.settings.userAgent;
		}
		if (!this.settings.compression && headers["accept-encoding"] === undefined) {
			headers["accept-encoding"] = "identity";
		}

		return headers;
	}
}

/**
 * Maps a value thrown by the transport to TimeoutError or TransportError.
 */
export function classifyTransportFailure(err: unknown): TransportError {
	if (err instanceof TransportError) {
		return err;
	}

	const detail = describeFailure(err);
	if (isTimeoutFailure(err)) {
		return new TimeoutError(detail, err);
	}
	return new TransportError(detail, err);
}

function isTimeoutFailure(err: unknown): boolean {
	if (readString(err, "name") === "TimeoutError") {
		return true;
	}

	const code = readString(err, "code") ?? readString(readField(err, "cause"), "code");
	return code !== undefined && TIMEOUT_CODES.has(code);
}

function describeFailure(err: unknown): string {
	if (!(err instanceof Error)) {
		return readString(err, "message") ?? String(err);
	}

	const causeMessage = readString(err.cause, "message");
	return causeMessage && causeMessage !== err.message
		? `${err.message}: ${causeMessage}`
		: err.message;
}

function readField(value: unknown, key: string): unknown {
	if (typeof value !== "object" || value === null || !(key in value)) {
		return undefined;
	}
	return Reflect.get(value, key);
}

function readString(value: unknown, key: string): string | undefined {
	const field = readField(value, key);
	return typeof field === "string" ? field : undefined;
}
