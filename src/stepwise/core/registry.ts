/**
 * Step Registry
 *
 * Name-keyed store of steps. Built once at startup, then only read, so
 * concurrent executions can look steps up without coordination.
 */

import type { Step } from "../types";
import { DuplicateStepNameError, StepNotFoundError } from "../types";

export interface StepRegistryOptions {
	/**
	 * Throw DuplicateStepNameError when a name is inserted twice.
	 * By default the later insert replaces the earlier one.
	 */
	strict?: boolean;
}

export class StepRegistry {
	private steps: Map<string, Step> = new Map();
	private readonly strict: boolean;

	constructor(options: StepRegistryOptions = {}) {
		this.strict = options.strict ?? false;
	}

	/**
	 * Register a step under its name.
	 */
	insert(step: Step): this {
		if (this.strict && this.steps.has(step.name)) {
			throw new DuplicateStepNameError(step.name);
		}
		this.steps.set(step.name, step);
		return this;
	}

	/**
	 * Register several steps. In strict mode nothing is inserted if any name clashes,
	 * whether with the registry or within the batch.
	 */
	insertMany(steps: Iterable<Step>): this {
		const batch = [...steps];

		if (this.strict) {
			const seen = new Set<string>();
			for (const step of batch) {
				if (this.steps.has(step.name) || seen.has(step.name)) {
					throw new DuplicateStepNameError(step.name);
				}
				seen.add(step.name);
			}
		}

		for (const step of batch) {
			this.steps.set(step.name, step);
		}
		return this;
	}

	/**
	 * Get a step by name.
	 *
	 * @throws StepNotFoundError when no step has that name
	 */
	get(name: string): Step {
		const step = this.steps.get(name);
		if (!step) {
			throw new StepNotFoundError(name);
		}
		return step;
	}

	/**
	 * Get a step by name, or undefined.
	 */
	find(name: string): Step | undefined {
		return this.steps.get(name);
	}

	has(name: string): boolean {
		return this.steps.has(name);
	}

	/**
	 * Check membership by the step's name, not by reference.
	 */
	containsStep(step: Pick<Step, "name">): boolean {
		return this.steps.has(step.name);
	}

	remove(name: string): boolean {
		return this.steps.delete(name);
	}

	get size(): number {
		return this.steps.size;
	}

	names(): string[] {
		return Array.from(this.steps.keys());
	}

	/**
	 * Clear all registered steps.
	 * Useful for testing.
	 */
	clear(): void {
		this.steps.clear();
	}
}
