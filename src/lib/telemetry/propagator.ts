import {
	ROOT_CONTEXT,
	type TextMapPropagator,
	type Tracer as ApiTracer,
	trace,
} from "@opentelemetry/api";
import type {
	Getter,
	Propagator,
	Setter,
	SpanBuilder,
	TraceContext,
} from "../tracing/api.js";
import { OtelSpanBuilder } from "./span.js";
import { OtelTraceContext } from "./trace_context.js";

export class OtelPropagator implements Propagator {
	constructor(
		private readonly tracer: ApiTracer,
		private readonly delegate: TextMapPropagator,
	) {}

	fields(): readonly string[] {
		return this.delegate.fields();
	}

	inject<C>(traceContext: TraceContext, carrier: C, setter: Setter<C>): void {
		const sc = OtelTraceContext.toOtel(traceContext);
		if (!sc) return;
		const base = OtelTraceContext.baseContext(traceContext);
		this.delegate.inject(trace.setSpanContext(base, sc), carrier, setter);
	}

	// Extraction starts from the root context so that an empty carrier never
	// inherits whatever span happens to be active. The extracted context,
	// baggage included, becomes the scope of the spans built from it.
	extract<C>(carrier: C, getter: Getter<C>): SpanBuilder {
		const parent = this.delegate.extract(ROOT_CONTEXT, carrier, getter);
		return new OtelSpanBuilder(this.tracer, parent);
	}
}
