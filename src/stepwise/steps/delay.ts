/**
 * Delay
 *
 * Promise-based pause for step callbacks. Awaiting it yields the event loop,
 * so concurrent executions keep running while one step waits.
 *
 * @example
 * ```typescript
 * const polite: Step = {
 *   ...httpStep({ name: "Page", url: "https://example.com/page" }),
 *   async onSuccess(ctx) {
 *     await delay({ seconds: 1 });
 *     ctx.setNextStep("Page");
 *   },
 * };
 * ```
 */

/**
 * Delay configuration.
 */
export interface DelayConfig {
	/** Delay in seconds (takes precedence over milliseconds) */
	seconds?: number;
	/** Delay in milliseconds */
	milliseconds?: number;
}

/**
 * Delay result.
 */
export interface DelayResult {
	/** Actual delay in milliseconds */
	delayedMs: number;
	/** Timestamp when delay started */
	startedAt: number;
	/** Timestamp when delay ended */
	endedAt: number;
}

/**
 * Waits for the configured duration. Durations <= 0 resolve immediately.
 */
export async function delay(config: DelayConfig): Promise<DelayResult> {
	const { seconds, milliseconds } = config;

	if (seconds === undefined && milliseconds === undefined) {
		throw new Error("delay requires either 'seconds' or 'milliseconds'");
	}

	const delayMs = seconds !== undefined ? seconds * 1000 : (milliseconds ?? 0);
	const startedAt = Date.now();

	if (delayMs <= 0) {
		return { delayedMs: 0, startedAt, endedAt: startedAt };
	}

	await new Promise((resolve) => setTimeout(resolve, delayMs));

	const endedAt = Date.now();
	return { delayedMs: endedAt - startedAt, startedAt, endedAt };
}
