// Vendor-neutral tracing contracts. Everything under lib/functions and
// lib/messaging depends on these only; lib/telemetry bridges them onto
// OpenTelemetry.

/**
 * A position in a trace. Ids are unsigned; a 128-bit trace id is exposed as
 * two 64-bit halves. Implementations that cannot represent a field return a
 * fixed neutral value for it instead of throwing.
 */
export interface TraceContext {
	traceIdHigh(): bigint;
	traceId(): bigint;
	localRootId(): bigint;
	isLocalRoot(): boolean;
	/** null when the context has no parent (or the parent is unknown). */
	parentId(): bigint | null;
	parentIdAsLong(): bigint;
	spanId(): bigint;
	shared(): boolean;
	extra(): readonly unknown[];
	findExtra<T>(type: abstract new (...args: never[]) => T): T | null;
	toBuilder(): TraceContextBuilder;
	traceIdString(): string;
	parentIdString(): string | null;
	localRootIdString(): string | null;
	spanIdString(): string;
	/** null when no sampling decision was made. */
	sampled(): boolean | null;
	sampledLocal(): boolean;
	debug(): boolean;
	equals(other: unknown): boolean;
	hashCode(): number;
}

export interface TraceContextBuilder {
	traceIdHigh(traceIdHigh: bigint): TraceContextBuilder;
	traceId(traceId: bigint): TraceContextBuilder;
	parentId(parentId: bigint | null): TraceContextBuilder;
	spanId(spanId: bigint): TraceContextBuilder;
	sampledLocal(sampledLocal: boolean): TraceContextBuilder;
	sampled(sampled: boolean | null): TraceContextBuilder;
	debug(debug: boolean): TraceContextBuilder;
	shared(shared: boolean): TraceContextBuilder;
	clearExtra(): TraceContextBuilder;
	addExtra(extra: unknown): TraceContextBuilder;
	build(): TraceContext;
}

export type SpanKind = "client" | "server" | "producer" | "consumer" | "internal";

export interface Span {
	isNoop(): boolean;
	context(): TraceContext;
	start(): Span;
	name(name: string): Span;
	event(value: string): Span;
	tag(key: string, value: string): Span;
	error(error: unknown): Span;
	/** Terminal. Calling it twice is a caller bug. */
	end(): void;
}

export interface SpanBuilder {
	name(name: string): SpanBuilder;
	kind(kind: SpanKind): SpanBuilder;
	tag(key: string, value: string): SpanBuilder;
	setParent(parent: TraceContext): SpanBuilder;
	setNoParent(): SpanBuilder;
	start(): Span;
}

export interface Tracer {
	/** A new span, child of `parent` or of the current span when omitted. */
	nextSpan(parent?: Span | null): Span;
	spanBuilder(): SpanBuilder;
	/**
	 * Runs `fn` with `span` as the current span. The previous binding is
	 * restored when `fn` returns or throws; async continuations started
	 * inside `fn` keep seeing `span`. A null span clears the binding.
	 */
	withSpan<T>(span: Span | null, fn: () => T): T;
	currentSpan(): Span | null;
}

export interface Getter<C> {
	get(carrier: C, key: string): string | undefined;
	keys(carrier: C): string[];
}

export interface Setter<C> {
	set(carrier: C, key: string, value: string): void;
}

export interface Propagator {
	/** Header names this propagator reads and writes. */
	fields(): readonly string[];
	inject<C>(context: TraceContext, carrier: C, setter: Setter<C>): void;
	/**
	 * A builder parented on the context found in `carrier`. When the carrier
	 * holds no context the builder starts a new trace.
	 */
	extract<C>(carrier: C, getter: Getter<C>): SpanBuilder;
}
