import { logDestinationCacheCleared, logDestinationResolved } from "../logging/events.js";
import type { PropertySource } from "../properties.js";

export type Direction = "input" | "output";

const SUFFIX: Record<Direction, string> = { input: "in-0", output: "out-0" };

export function bindingMappingKey(definition: string, direction: Direction): string {
	return `stream.function.bindings.${definition}-${SUFFIX[direction]}`;
}

export function destinationKey(binding: string): string {
	return `stream.bindings.${binding}.destination`;
}

export type DestinationResolver = {
	input(definition: string): string;
	output(definition: string): string;
	/** Drops every cached entry; the next lookups recompute from properties. */
	clear(): void;
	size(): number;
};

/**
 * Resolves the destination a function reads from or writes to and caches
 * it per function definition, with separate caches for each direction.
 *
 * `stream.function.bindings.<fn>-in-0` may rename the binding (default
 * `<fn>-in-0`); `stream.bindings.<binding>.destination` names the
 * destination (default `<fn>`).
 *
 * Lookups are synchronous, so a computation always completes before a
 * concurrent clear() can run and never reinserts a stale value.
 */
export function createDestinationResolver(properties: PropertySource): DestinationResolver {
	const caches: Record<Direction, Map<string, string>> = {
		input: new Map(),
		output: new Map(),
	};

	function compute(definition: string, direction: Direction): string {
		const binding =
			properties.getProperty(bindingMappingKey(definition, direction)) ??
			`${definition}-${SUFFIX[direction]}`;
		const destination = properties.getProperty(destinationKey(binding)) ?? definition;
		logDestinationResolved({ function: definition, direction, binding, destination });
		return destination;
	}

	function resolve(definition: string, direction: Direction): string {
		const cache = caches[direction];
		const hit = cache.get(definition);
		if (hit !== undefined) return hit;
		const destination = compute(definition, direction);
		cache.set(definition, destination);
		return destination;
	}

	return {
		input: (definition) => resolve(definition, "input"),
		output: (definition) => resolve(definition, "output"),
		clear() {
			const entries = caches.input.size + caches.output.size;
			caches.input.clear();
			caches.output.clear();
			logDestinationCacheCleared({ entries });
		},
		size: () => caches.input.size + caches.output.size,
	};
}
