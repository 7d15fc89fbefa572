import {
	type Attributes,
	type Context,
	type Exception,
	type Span as ApiSpan,
	SpanKind as ApiSpanKind,
	type Tracer as ApiTracer,
	SpanStatusCode,
	context,
	trace,
} from "@opentelemetry/api";
import type { Span, SpanBuilder, SpanKind, TraceContext } from "../tracing/api.js";
import { OtelTraceContext } from "./trace_context.js";

const KINDS: Record<SpanKind, ApiSpanKind> = {
	client: ApiSpanKind.CLIENT,
	server: ApiSpanKind.SERVER,
	producer: ApiSpanKind.PRODUCER,
	consumer: ApiSpanKind.CONSUMER,
	internal: ApiSpanKind.INTERNAL,
};

function toException(error: unknown): Exception {
	return error instanceof Error ? error : String(error);
}

export class OtelSpan implements Span {
	/** `scope` is the context holding this span, baggage included, when known. */
	constructor(
		readonly delegate: ApiSpan,
		readonly scope?: Context,
	) {}

	isNoop(): boolean {
		return !this.delegate.isRecording();
	}

	context(): TraceContext {
		return OtelTraceContext.fromSpan(this.delegate, this.scope);
	}

	// OpenTelemetry spans are started when they are created.
	start(): Span {
		return this;
	}

	name(name: string): Span {
		this.delegate.updateName(name);
		return this;
	}

	event(value: string): Span {
		this.delegate.addEvent(value);
		return this;
	}

	tag(key: string, value: string): Span {
		this.delegate.setAttribute(key, value);
		return this;
	}

	error(error: unknown): Span {
		this.delegate.recordException(toException(error));
		this.delegate.setStatus({
			code: SpanStatusCode.ERROR,
			message: error instanceof Error ? error.message : String(error),
		});
		return this;
	}

	end(): void {
		this.delegate.end();
	}
}

/**
 * Collects name, kind, attributes and parent, and creates the OpenTelemetry
 * span on {@link start}. Without an explicit parent the span is a child of
 * the active context, unless {@link setNoParent} was called.
 */
export class OtelSpanBuilder implements SpanBuilder {
	private spanName = "";
	private spanKind: ApiSpanKind = ApiSpanKind.INTERNAL;
	private readonly attributes: Attributes = {};
	private root = false;

	constructor(
		private readonly tracer: ApiTracer,
		private parent?: Context,
	) {}

	name(name: string): SpanBuilder {
		this.spanName = name;
		return this;
	}

	kind(kind: SpanKind): SpanBuilder {
		this.spanKind = KINDS[kind];
		return this;
	}

	tag(key: string, value: string): SpanBuilder {
		this.attributes[key] = value;
		return this;
	}

	setParent(parent: TraceContext): SpanBuilder {
		const sc = OtelTraceContext.toOtel(parent);
		if (sc) this.parent = trace.setSpanContext(OtelTraceContext.baseContext(parent), sc);
		this.root = false;
		return this;
	}

	setNoParent(): SpanBuilder {
		this.root = true;
		return this;
	}

	start(): Span {
		const base = this.parent ?? context.active();
		const span = this.tracer.startSpan(
			this.spanName,
			{ kind: this.spanKind, attributes: this.attributes, root: this.root },
			base,
		);
		return new OtelSpan(span, trace.setSpan(base, span));
	}
}
