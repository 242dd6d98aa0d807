/**
 * Request Descriptor
 *
 * Immutable description of one HTTP call. Builder methods return new instances,
 * so a descriptor handed to a context can never change underneath it.
 *
 * @example
 * ```typescript
 * const req = StepRequest.get("https://example.com/robots.txt")
 *   .withHeaders(parseHeaders(`
 *     Accept: text/plain
 *   `))
 *   .withTimeout(10_000)
 *   .withStatusCodes([200]);
 * ```
 */

import { z } from "zod";
import { InvalidRequestError } from "./errors";

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_USER_AGENT = "stepwise/0.1.0";

/** Largest delay a Node timer honours (2^31 - 1 ms) */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const httpMethods = ["GET", "POST", "PUT", "PATCH", "DELETE", "HEAD", "OPTIONS"] as const;
export type HttpMethod = (typeof httpMethods)[number];

export const requestInitSchema = z.object({
	method: z.enum(httpMethods).default("GET"),
	url: z.string().url(),
	headers: z.record(z.string()).default({}),
	timeout: z.number().int().positive().max(MAX_TIMEOUT_MS).default(DEFAULT_TIMEOUT_MS),
	proxy: z.string().url().nullable().default(null),
	statusCodes: z.array(z.number().int().min(100).max(599)).nullable().default(null),
	compression: z.boolean().default(true),
	userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
	body: z.string().nullable().default(null),
});

/** Constructor input; everything but `url` is optional. */
export type StepRequestInit = z.input<typeof requestInitSchema>;

/** Fully resolved descriptor fields. */
export type StepRequestData = z.output<typeof requestInitSchema>;

export class StepRequest {
	readonly method: HttpMethod;
	readonly url: string;
	/** Header names are stored lower-cased */
	readonly headers: Readonly<Record<string, string>>;
	/** Transport deadline in milliseconds */
	readonly timeout: number;
	readonly proxy: string | null;
	/** Explicit accepted status codes; null means any 2xx */
	readonly statusCodes: readonly number[] | null;
	readonly compression: boolean;
	readonly userAgent: string;
	readonly body: string | null;

	/**
	 * @throws InvalidRequestError when a field fails validation
	 */
	constructor(init: StepRequestInit) {
		const data = parseRequestInit(init);
		this.method = data.method;
		this.url = data.url;
		this.headers = normalizeHeaders(data.headers);
		this.timeout = data.timeout;
		this.proxy = data.proxy;
		this.statusCodes = data.statusCodes;
		this.compression = data.compression;
		this.userAgent = data.userAgent;
		this.body = data.body;
	}

	static get(url: string): StepRequest {
		return new StepRequest({ method: "GET", url });
	}

	static post(url: string): StepRequest {
		return new StepRequest({ method: "POST", url });
	}

	withHeaders(headers: Record<string, string>): StepRequest {
		return this.patch({ headers: { ...this.headers, ...normalizeHeaders(headers) } });
	}

	withHeader(name: string, value: string): StepRequest {
		return this.withHeaders({ [name]: value });
	}

	withTimeout(timeout: number): StepRequest {
		return this.patch({ timeout });
	}

	withProxy(proxy: string | null): StepRequest {
		return this.patch({ proxy });
	}

	withStatusCodes(statusCodes: readonly number[] | null): StepRequest {
		return this.patch({ statusCodes: statusCodes === null ? null : [...statusCodes] });
	}

	withCompression(compression: boolean): StepRequest {
		return this.patch({ compression });
	}

	withUserAgent(userAgent: string): StepRequest {
		return this.patch({ userAgent });
	}

	withBody(body: string | null): StepRequest {
		return this.patch({ body });
	}

	withJsonBody(value: unknown): StepRequest {
		return this.withHeader("content-type", "application/json").withBody(JSON.stringify(value));
	}

	clone(): StepRequest {
		return this.patch({});
	}

	toJSON(): StepRequestData {
		return {
			method: this.method,
			url: this.url,
			headers: { ...this.headers },
			timeout: this.timeout,
			proxy: this.proxy,
			statusCodes: this.statusCodes === null ? null : [...this.statusCodes],
			compression: this.compression,
			userAgent: this.userAgent,
			body: this.body,
		};
	}

	private patch(changes: Partial<StepRequestData>): StepRequest {
		return new StepRequest({ ...this.toJSON(), ...changes });
	}
}

function parseRequestInit(init: StepRequestInit): StepRequestData {
	const result = requestInitSchema.safeParse(init);
	if (!result.success) {
		const detail = result.error.issues
			.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`)
			.join("; ");
		throw new InvalidRequestError(detail, result.error);
	}
	return result.data;
}

function normalizeHeaders(headers: Record<string, string>): Record<string, string> {
	const normalized: Record<string, string> = {};
	for (const [name, value] of Object.entries(headers)) {
		normalized[name.trim().toLowerCase()] = value;
	}
	return normalized;
}

/**
 * Parses a block of `Name: value` lines into a header record.
 *
 * Names are lower-cased, blank lines skipped. Values keep any inner colons.
 */
export function parseHeaders(block: string): Record<string, string> {
	const headers: Record<string, string> = {};

	for (const rawLine of block.split(/\r?\n/)) {
		const line = rawLine.trim();
		if (line === "") {
			continue;
		}

		const separator = line.indexOf(":");
		if (separator <= 0) {
			throw new InvalidRequestError(`malformed header line "${line}"`);
		}

		const name = line.slice(0, separator).trim().toLowerCase();
		headers[name] = line.slice(separator + 1).trim();
	}

	return headers;
}
