import { type Message, createMessage, toMessage } from "../messaging/message.js";
import type { FunctionAroundWrapper, FunctionInvocation } from "./trace_function_wrapper.js";

export type Supplier<R = unknown> = () => R | Promise<R>;
export type MessageFunction<R = unknown> = (message: Message) => R | Promise<R>;
export type Consumer = (message: Message) => void | Promise<void>;

export interface RegisteredFunction extends FunctionInvocation {
	/** Calls the function through the registry's around-wrapper, when it has one. */
	invoke(message?: Message | null): Promise<Message | null>;
}

export type FunctionRegistry = {
	registerFunction(definition: string, fn: MessageFunction): RegisteredFunction;
	registerSupplier(definition: string, fn: Supplier): RegisteredFunction;
	registerConsumer(definition: string, fn: Consumer): RegisteredFunction;
	lookup(definition: string): RegisteredFunction | undefined;
	names(): string[];
};

export function createFunctionRegistry(around?: FunctionAroundWrapper): FunctionRegistry {
	const functions = new Map<string, RegisteredFunction>();

	function add(
		definition: string,
		isSupplier: boolean,
		call: (message: Message | null) => unknown,
	): RegisteredFunction {
		if (functions.has(definition)) {
			throw new Error(`function already registered: ${definition}`);
		}
		const registered: RegisteredFunction = {
			definition,
			isSupplier,
			get: () => call(null),
			apply: (message) => call(message),
			async invoke(message) {
				if (around) return around.invoke(message, registered);
				// Unwrapped: no tracing, results are returned as messages
				const result = await (message == null && isSupplier
					? registered.get()
					: registered.apply(message ?? createMessage(null)));
				return result == null ? null : toMessage(result);
			},
		};
		functions.set(definition, registered);
		return registered;
	}

	return {
		registerFunction: (definition, fn) =>
			add(definition, false, (message) => fn(message ?? createMessage(null))),
		registerSupplier: (definition, fn) => add(definition, true, () => fn()),
		registerConsumer: (definition, fn) =>
			add(definition, false, async (message) => {
				await fn(message ?? createMessage(null));
				return undefined;
			}),
		lookup: (definition) => functions.get(definition),
		names: () => [...functions.keys()],
	};
}
