import {
	type Context,
	type Span,
	type SpanContext,
	TraceFlags,
	type TraceState,
	context,
	isSpanContextValid,
	trace,
} from "@opentelemetry/api";
import type { TraceContext, TraceContextBuilder } from "../tracing/api.js";
import {
	bigintFromHex,
	longFromBase16,
	spanIdFromLong,
	traceIdFromLongs,
} from "./bigendian.js";

const ZERO_SPAN_ID = "0000000000000000";

// ReadableSpan is an SDK type; read the parent id structurally so that
// SDK 1.x (parentSpanId) and 2.x (parentSpanContext) spans both work.
function parentSpanIdOf(span: Span | null): string | undefined {
	if (!span) return undefined;
	if ("parentSpanId" in span && typeof span.parentSpanId === "string")
		return span.parentSpanId;
	if ("parentSpanContext" in span) {
		const parent = span.parentSpanContext;
		if (
			parent &&
			typeof parent === "object" &&
			"spanId" in parent &&
			typeof parent.spanId === "string"
		)
			return parent.spanId;
	}
	return undefined;
}

function traceStateOf(sc: SpanContext): string {
	return sc.traceState?.serialize() ?? "";
}

function sameSpanContext(a: SpanContext, b: SpanContext): boolean {
	return (
		a.traceId === b.traceId &&
		a.spanId === b.spanId &&
		a.traceFlags === b.traceFlags &&
		traceStateOf(a) === traceStateOf(b)
	);
}

/**
 * {@link TraceContext} over an OpenTelemetry `SpanContext`, optionally tied to
 * the live span it came from and the OpenTelemetry context that span was
 * started in (which carries baggage extracted alongside the span context).
 *
 * OpenTelemetry has no notion of a local root id, shared spans, debug or
 * local sampling, or extra context data; those accessors return false, 0n,
 * null or an empty list.
 */
export class OtelTraceContext implements TraceContext {
	constructor(
		readonly delegate: SpanContext,
		readonly span: Span | null = null,
		readonly scope: Context | null = null,
	) {}

	static fromSpan(span: Span, scope?: Context): OtelTraceContext {
		return new OtelTraceContext(span.spanContext(), span, scope ?? null);
	}

	/**
	 * Unwraps a context produced by this adapter. Any other implementation is
	 * a programming error and throws.
	 */
	static toOtel(traceContext: TraceContext | null | undefined): SpanContext | null {
		if (traceContext == null) return null;
		if (!(traceContext instanceof OtelTraceContext)) {
			throw new TypeError(
				`expected an OtelTraceContext, got ${traceContext.constructor.name}`,
			);
		}
		return traceContext.delegate;
	}

	static fromOtel(spanContext: SpanContext): TraceContext {
		return new OtelTraceContext(spanContext, null);
	}

	/**
	 * The context the span was started in, or else the active context with
	 * the live span bound, when there is one.
	 */
	static toOtelContext(traceContext: TraceContext): Context {
		if (!(traceContext instanceof OtelTraceContext)) return context.active();
		if (traceContext.scope) return traceContext.scope;
		if (traceContext.span) return trace.setSpan(context.active(), traceContext.span);
		return context.active();
	}

	/** Base context for children and injection: the span's own scope, or the active one. */
	static baseContext(traceContext: TraceContext): Context {
		return traceContext instanceof OtelTraceContext && traceContext.scope
			? traceContext.scope
			: context.active();
	}

	traceIdHigh(): bigint {
		return longFromBase16(this.delegate.traceId, 0);
	}

	traceId(): bigint {
		return longFromBase16(this.delegate.traceId, 16);
	}

	localRootId(): bigint {
		return 0n;
	}

	isLocalRoot(): boolean {
		return (
			bigintFromHex(this.delegate.traceId) === bigintFromHex(this.delegate.spanId)
		);
	}

	parentId(): bigint | null {
		const hex = parentSpanIdOf(this.span);
		if (!hex || hex === ZERO_SPAN_ID) return null;
		const id = longFromBase16(hex);
		return id === 0n ? null : id;
	}

	parentIdAsLong(): bigint {
		return this.parentId() ?? 0n;
	}

	spanId(): bigint {
		return longFromBase16(this.delegate.spanId);
	}

	shared(): boolean {
		return false;
	}

	extra(): readonly unknown[] {
		return [];
	}

	findExtra<T>(_type: abstract new (...args: never[]) => T): T | null {
		return null;
	}

	toBuilder(): TraceContextBuilder {
		return new OtelTraceContextBuilder(this.delegate);
	}

	traceIdString(): string {
		return this.delegate.traceId;
	}

	parentIdString(): string | null {
		const id = this.parentId();
		return id === null ? null : spanIdFromLong(id);
	}

	localRootIdString(): string | null {
		return null;
	}

	spanIdString(): string {
		return this.delegate.spanId;
	}

	sampled(): boolean | null {
		if (!isSpanContextValid(this.delegate)) return null;
		return (this.delegate.traceFlags & TraceFlags.SAMPLED) === TraceFlags.SAMPLED;
	}

	sampledLocal(): boolean {
		return false;
	}

	debug(): boolean {
		return false;
	}

	spanContext(): SpanContext {
		return this.delegate;
	}

	equals(other: unknown): boolean {
		return (
			other instanceof OtelTraceContext &&
			sameSpanContext(this.delegate, other.delegate)
		);
	}

	hashCode(): number {
		const key = `${this.delegate.traceId}/${this.delegate.spanId}/${this.delegate.traceFlags}/${traceStateOf(this.delegate)}`;
		let h = 0;
		for (let i = 0; i < key.length; i++) h = (Math.imul(31, h) + key.charCodeAt(i)) | 0;
		return h;
	}

	toString(): string {
		return `${this.delegate.traceId}/${this.delegate.spanId} flags=${this.delegate.traceFlags}`;
	}
}

/**
 * Accumulates trace id, span id, trace flags and trace state. Id setters take
 * unsigned 64-bit values and throw a RangeError for anything else. Parent id,
 * debug, shared, local sampling and extra data are not supported by
 * OpenTelemetry span contexts: their setters accept the value and do nothing.
 */
export class OtelTraceContextBuilder implements TraceContextBuilder {
	private traceIdHex: string;
	private spanIdHex: string;
	private traceFlags: number;
	private state: TraceState | undefined;
	private readonly isRemote: boolean | undefined;

	constructor(seed: SpanContext) {
		this.traceIdHex = seed.traceId;
		this.spanIdHex = seed.spanId;
		this.traceFlags = seed.traceFlags;
		this.state = seed.traceState;
		this.isRemote = seed.isRemote;
	}

	/** Replaces the high 64 bits of the trace id, keeping the low half. */
	traceIdHigh(traceIdHigh: bigint): TraceContextBuilder {
		this.traceIdHex = traceIdFromLongs(
			traceIdHigh,
			longFromBase16(this.traceIdHex, 16),
		);
		return this;
	}

	/** Replaces the low 64 bits of the trace id, keeping the high half. */
	traceId(traceId: bigint): TraceContextBuilder {
		this.traceIdHex = traceIdFromLongs(longFromBase16(this.traceIdHex, 0), traceId);
		return this;
	}

	/** Not supported. */
	parentId(_parentId: bigint | null): TraceContextBuilder {
		return this;
	}

	spanId(spanId: bigint): TraceContextBuilder {
		this.spanIdHex = spanIdFromLong(spanId);
		return this;
	}

	/** Not supported. */
	sampledLocal(_sampledLocal: boolean): TraceContextBuilder {
		return this;
	}

	/** null clears the sampled flag. */
	sampled(sampled: boolean | null): TraceContextBuilder {
		this.traceFlags = sampled
			? this.traceFlags | TraceFlags.SAMPLED
			: this.traceFlags & ~TraceFlags.SAMPLED;
		return this;
	}

	/** Not supported. */
	debug(_debug: boolean): TraceContextBuilder {
		return this;
	}

	/** Not supported. */
	shared(_shared: boolean): TraceContextBuilder {
		return this;
	}

	/** Not supported. */
	clearExtra(): TraceContextBuilder {
		return this;
	}

	/** Not supported. */
	addExtra(_extra: unknown): TraceContextBuilder {
		return this;
	}

	traceState(traceState: TraceState | undefined): OtelTraceContextBuilder {
		this.state = traceState;
		return this;
	}

	build(): TraceContext {
		return new OtelTraceContext(
			{
				traceId: this.traceIdHex,
				spanId: this.spanIdHex,
				traceFlags: this.traceFlags,
				traceState: this.state,
				isRemote: this.isRemote,
			},
			null,
		);
	}
}
