import type { TextMapPropagator, Tracer as ApiTracer } from "@opentelemetry/api";
import {
	CompositePropagator,
	W3CBaggagePropagator,
	W3CTraceContextPropagator,
} from "@opentelemetry/core";
import { configPropertySource, onConfigReload } from "./config.js";
import { type FunctionRegistry, createFunctionRegistry } from "./lib/functions/registry.js";
import {
	type TraceFunctionWrapper,
	createTraceFunctionWrapper,
} from "./lib/functions/trace_function_wrapper.js";
import type { PropertySource } from "./lib/properties.js";
import { tracer as defaultTracer } from "./lib/telemetry/otel.js";
import { OtelPropagator } from "./lib/telemetry/propagator.js";
import { OtelTracer } from "./lib/telemetry/tracer.js";

export type FunctionTracingOptions = {
	/** Defaults to the library's tracer on the global provider. */
	tracer?: ApiTracer;
	/** Defaults to W3C trace context + baggage. */
	propagator?: TextMapPropagator;
	/** Defaults to the `stream` section of the config file. */
	properties?: PropertySource;
	/** Clear the destination cache when the config file reloads. Default true. */
	invalidateOnReload?: boolean;
};

export type FunctionTracing = {
	wrapper: TraceFunctionWrapper;
	registry: FunctionRegistry;
	close(): void;
};

export function createFunctionTracing(opts: FunctionTracingOptions = {}): FunctionTracing {
	const apiTracer = opts.tracer ?? defaultTracer();
	const wrapper = createTraceFunctionWrapper({
		properties: opts.properties ?? configPropertySource(),
		tracer: new OtelTracer(apiTracer),
		propagator: new OtelPropagator(
			apiTracer,
			opts.propagator ??
				new CompositePropagator({
					propagators: [new W3CTraceContextPropagator(), new W3CBaggagePropagator()],
				}),
		),
	});
	const unsubscribe =
		opts.invalidateOnReload === false ? () => {} : onConfigReload(wrapper.invalidate);
	return {
		wrapper,
		registry: createFunctionRegistry(wrapper),
		close: unsubscribe,
	};
}

export { configPropertySource, getConfig, loadConfig, onConfigReload, reloadConfig } from "./config.js";
export type { Config } from "./config.js";
export { createDestinationResolver } from "./lib/functions/destinations.js";
export type { DestinationResolver, Direction } from "./lib/functions/destinations.js";
export { createFunctionRegistry } from "./lib/functions/registry.js";
export type {
	Consumer,
	FunctionRegistry,
	MessageFunction,
	RegisteredFunction,
	Supplier,
} from "./lib/functions/registry.js";
export { createTraceFunctionWrapper } from "./lib/functions/trace_function_wrapper.js";
export type {
	FunctionAroundWrapper,
	FunctionInvocation,
	TraceFunctionWrapper,
} from "./lib/functions/trace_function_wrapper.js";
export { childLogger, logger } from "./lib/logging/logger.js";
export { createMessage, isMessage, toMessage } from "./lib/messaging/message.js";
export type { Message, MessageHeaders } from "./lib/messaging/message.js";
export { createTraceMessageHandler } from "./lib/messaging/trace_message_handler.js";
export type {
	MessageAndSpan,
	MessageAndSpans,
	TraceMessageHandler,
} from "./lib/messaging/trace_message_handler.js";
export { createPropertySource } from "./lib/properties.js";
export type { PropertySource } from "./lib/properties.js";
export {
	initTelemetry,
	shutdownTelemetry,
	telemetryOptionsFromConfig,
	tracer,
} from "./lib/telemetry/otel.js";
export type { TelemetryOptions } from "./lib/telemetry/otel.js";
export { OtelPropagator } from "./lib/telemetry/propagator.js";
export { OtelSpan, OtelSpanBuilder } from "./lib/telemetry/span.js";
export { OtelTraceContext, OtelTraceContextBuilder } from "./lib/telemetry/trace_context.js";
export { OtelTracer } from "./lib/telemetry/tracer.js";
export type {
	Getter,
	Propagator,
	Setter,
	Span,
	SpanBuilder,
	SpanKind,
	TraceContext,
	TraceContextBuilder,
	Tracer,
} from "./lib/tracing/api.js";
