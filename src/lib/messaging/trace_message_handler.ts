import type { Propagator, Span, Tracer } from "../tracing/api.js";
import {
	type Message,
	type MessageHeaders,
	createMessage,
	headerGetter,
	headerSetter,
} from "./message.js";

export const DESTINATION_TAG = "messaging.destination.name";

export type MessageAndSpans = {
	message: Message;
	/** Consumer span covering receipt; already ended. Outbound spans hang off it. */
	parentSpan: Span;
	/** Span for the handling of the message; ended by {@link TraceMessageHandler.afterMessageHandled}. */
	childSpan: Span;
};

export type MessageAndSpan = {
	message: Message;
	span: Span;
};

export type TraceMessageHandler = {
	wrapInputMessage(message: Message, destination: string): MessageAndSpans;
	wrapOutputMessage(
		message: Message,
		parentSpan: Span,
		destination: string,
	): MessageAndSpan;
	afterMessageHandled(span: Span, error?: unknown): void;
};

export function createTraceMessageHandler(deps: {
	tracer: Tracer;
	propagator: Propagator;
}): TraceMessageHandler {
	const { tracer, propagator } = deps;

	function withoutTracingHeaders(headers: Readonly<MessageHeaders>): MessageHeaders {
		const copy: MessageHeaders = { ...headers };
		for (const field of propagator.fields()) delete copy[field];
		return copy;
	}

	return {
		wrapInputMessage(message, destination) {
			const parentSpan = propagator
				.extract(message.headers, headerGetter)
				.name("receive")
				.kind("consumer")
				.tag(DESTINATION_TAG, destination)
				.start();
			parentSpan.end();
			const childSpan = tracer
				.nextSpan(parentSpan)
				.name("handle")
				.tag(DESTINATION_TAG, destination);
			const headers = withoutTracingHeaders(message.headers);
			return {
				message: createMessage(message.payload, headers),
				parentSpan,
				childSpan,
			};
		},

		wrapOutputMessage(message, parentSpan, destination) {
			const span = tracer
				.spanBuilder()
				.setParent(parentSpan.context())
				.name("send")
				.kind("producer")
				.tag(DESTINATION_TAG, destination)
				.start();
			const headers = withoutTracingHeaders(message.headers);
			propagator.inject(span.context(), headers, headerSetter);
			return { message: createMessage(message.payload, headers), span };
		},

		afterMessageHandled(span, error) {
			if (error !== undefined) span.error(error);
			span.end();
		},
	};
}
