/**
 * Engine Configuration
 *
 * Options accepted by StepEngine, validated with zod at construction.
 */

import type { Dispatcher } from "undici";
import { z } from "zod";
import type { FetchFn } from "../core/http-requester";

export const engineOptionsSchema = z.object({
	/** Mirror step log entries to the console */
	logToConsole: z.boolean().default(true),
	/** Reject duplicate step names instead of overwriting */
	strict: z.boolean().default(false),
});

export type EngineSettings = z.output<typeof engineOptionsSchema>;

export interface EngineOptions extends z.input<typeof engineOptionsSchema> {
	/** Custom fetch function for testing/mocking (default: undici fetch) */
	fetch?: FetchFn;
	/** Undici dispatcher for requests without a proxy (e.g. a MockAgent in tests) */
	dispatcher?: Dispatcher;
}

/**
 * Validates the plain-data part of the options.
 *
 * @throws ZodError when an option has the wrong type
 */
export function resolveEngineSettings(options: EngineOptions = {}): EngineSettings {
	return engineOptionsSchema.parse({
		logToConsole: options.logToConsole,
		strict: options.strict,
	});
}
