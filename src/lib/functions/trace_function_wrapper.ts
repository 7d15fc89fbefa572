import { logFunctionInvocationFailed } from "../logging/events.js";
import { childLogger } from "../logging/logger.js";
import {
	type MessageAndSpan,
	type MessageAndSpans,
	createTraceMessageHandler,
} from "../messaging/trace_message_handler.js";
import { type Message, toMessage } from "../messaging/message.js";
import type { PropertySource } from "../properties.js";
import type { Propagator, Span, Tracer } from "../tracing/api.js";
import { type DestinationResolver, createDestinationResolver } from "./destinations.js";

/** What the wrapper needs to know about, and do with, a registered function. */
export interface FunctionInvocation<R = unknown> {
	readonly definition: string;
	readonly isSupplier: boolean;
	get(): R | Promise<R>;
	apply(message: Message): R | Promise<R>;
}

export interface FunctionAroundWrapper {
	invoke(message: Message | null | undefined, target: FunctionInvocation): Promise<Message | null>;
}

export type TraceFunctionWrapper = FunctionAroundWrapper & {
	inputDestination(definition: string): string;
	outputDestination(definition: string): string;
	/** Clears the destination cache. Register it with the host's refresh signal. */
	invalidate(): void;
};

export function createTraceFunctionWrapper(deps: {
	properties: PropertySource;
	tracer: Tracer;
	propagator: Propagator;
	destinations?: DestinationResolver;
}): TraceFunctionWrapper {
	const { tracer } = deps;
	const destinations = deps.destinations ?? createDestinationResolver(deps.properties);
	const handler = createTraceMessageHandler(deps);
	const log = childLogger({ component: "trace-function-wrapper" });

	async function invoke(
		message: Message | null | undefined,
		target: FunctionInvocation,
	): Promise<Message | null> {
		if (!target) throw new TypeError("target function is required");
		let invocationMessage: MessageAndSpans | null = null;
		let span: Span;
		if (message == null && target.isSupplier) {
			span = tracer.spanBuilder().setNoParent().name(target.definition).start();
		} else {
			log.debug("will retrieve the tracing headers from the message");
			invocationMessage = handler.wrapInputMessage(
				toMessage(message),
				destinations.input(target.definition),
			);
			span = invocationMessage.childSpan;
		}

		const input = invocationMessage?.message;
		let result: unknown;
		let failure: unknown;
		try {
			result = await tracer.withSpan(span.start(), async () =>
				input === undefined ? target.get() : target.apply(input),
			);
		} catch (e) {
			failure = e;
			logFunctionInvocationFailed({
				function: target.definition,
				error: e instanceof Error ? e.message : String(e),
			});
			throw e;
		} finally {
			handler.afterMessageHandled(span, failure);
		}

		if (result == null) {
			log.debug("returned message is null - we have a consumer");
			return null;
		}

		const output = toMessage(result);
		const destination = destinations.output(target.definition);
		// The outbound span is a sibling of the handling span, not its child.
		const wrapped: MessageAndSpan = invocationMessage
			? handler.wrapOutputMessage(output, invocationMessage.parentSpan, destination)
			: handler.wrapOutputMessage(output, span, destination);
		handler.afterMessageHandled(wrapped.span);
		return wrapped.message;
	}

	return {
		invoke,
		inputDestination: destinations.input,
		outputDestination: destinations.output,
		invalidate: destinations.clear,
	};
}
