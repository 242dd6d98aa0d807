/**
 * Predefined Steps
 *
 * Factory functions for common step patterns.
 */

export { httpStep } from "./http-step";
export type { HttpStepConfig } from "./http-step";

export { delay } from "./delay";
export type { DelayConfig, DelayResult } from "./delay";
