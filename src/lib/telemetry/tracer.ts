import {
	type Tracer as ApiTracer,
	context,
	trace,
} from "@opentelemetry/api";
import type { Span, SpanBuilder, Tracer } from "../tracing/api.js";
import { OtelSpan, OtelSpanBuilder } from "./span.js";
import { OtelTraceContext } from "./trace_context.js";

export class OtelTracer implements Tracer {
	constructor(private readonly delegate: ApiTracer) {}

	nextSpan(parent?: Span | null): Span {
		const builder = this.spanBuilder();
		if (parent) builder.setParent(parent.context());
		return builder.start();
	}

	spanBuilder(): SpanBuilder {
		return new OtelSpanBuilder(this.delegate);
	}

	withSpan<T>(span: Span | null, fn: () => T): T {
		const ctx = span
			? OtelTraceContext.toOtelContext(span.context())
			: trace.deleteSpan(context.active());
		return context.with(ctx, fn);
	}

	currentSpan(): Span | null {
		const active = context.active();
		const span = trace.getSpan(active);
		return span ? new OtelSpan(span, active) : null;
	}
}
