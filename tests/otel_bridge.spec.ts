import { context, propagation, trace } from "@opentelemetry/api";
import { describe, expect, it } from "vitest";
import { OtelSpan } from "../src/lib/telemetry/span.js";
import { OtelTraceContext } from "../src/lib/telemetry/trace_context.js";
import {
	TRACEPARENT,
	UPSTREAM_SPAN_ID,
	UPSTREAM_TRACE_ID,
	inMemoryTracing,
	only,
	withBaggage,
} from "./helpers/tracing.js";

const recordGetter = {
	get: (c: Record<string, string>, k: string) => c[k],
	keys: (c: Record<string, string>) => Object.keys(c),
};
const recordSetter = {
	set: (c: Record<string, string>, k: string, v: string) => {
		c[k] = v;
	},
};

describe("otel tracer: scoping", () => {
	it("binds the span for the callback and restores the previous one", () => {
		const t = inMemoryTracing();
		const outer = t.tracer.nextSpan().name("outer");
		const inner = t.tracer.nextSpan().name("inner");
		t.tracer.withSpan(outer, () => {
			expect(t.tracer.currentSpan()?.context().spanIdString()).toBe(outer.context().spanIdString());
			t.tracer.withSpan(inner, () => {
				expect(trace.getActiveSpan()?.spanContext().spanId).toBe(inner.context().spanIdString());
			});
			expect(trace.getActiveSpan()?.spanContext().spanId).toBe(outer.context().spanIdString());
		});
		expect(t.tracer.currentSpan()).toBeNull();
		inner.end();
		outer.end();
	});

	it("restores the binding when the callback throws", () => {
		const t = inMemoryTracing();
		const span = t.tracer.nextSpan().name("failing");
		expect(() =>
			t.tracer.withSpan(span, () => {
				throw new Error("inside");
			}),
		).toThrow("inside");
		expect(t.tracer.currentSpan()).toBeNull();
		span.end();
	});

	it("clears the binding for a null span", () => {
		const t = inMemoryTracing();
		const span = t.tracer.nextSpan().name("outer");
		t.tracer.withSpan(span, () => {
			t.tracer.withSpan(null, () => {
				expect(t.tracer.currentSpan()).toBeNull();
			});
		});
		span.end();
	});

	it("parents new spans on the current span unless told otherwise", () => {
		const t = inMemoryTracing();
		const outer = t.tracer.nextSpan().name("outer");
		t.tracer.withSpan(outer, () => {
			t.tracer.nextSpan().name("child").end();
			t.tracer.spanBuilder().setNoParent().name("root").start().end();
		});
		outer.end();
		expect(only(t.byName("child")).parentSpanId).toBe(outer.context().spanIdString());
		expect(only(t.byName("root")).parentSpanId).toBeUndefined();
	});

	it("parents on an explicit span", () => {
		const t = inMemoryTracing();
		const parent = t.tracer.nextSpan().name("parent");
		t.tracer.nextSpan(parent).name("child").end();
		parent.end();
		const child = only(t.byName("child"));
		expect(child.parentSpanId).toBe(parent.context().spanIdString());
		expect(child.spanContext().traceId).toBe(parent.context().traceIdString());
	});
});

describe("otel span", () => {
	it("records tags, events and errors", () => {
		const t = inMemoryTracing();
		const span = t.tracer.spanBuilder().name("work").kind("client").tag("a", "1").start();
		span.tag("b", "2").event("checkpoint").error("plain failure");
		span.end();
		const finished = only(t.byName("work"));
		expect(finished.attributes).toEqual({ a: "1", b: "2" });
		expect(finished.events.map((e) => e.name)).toEqual(["checkpoint", "exception"]);
		expect(finished.status).toEqual({ code: 2, message: "plain failure" });
		expect(span.isNoop()).toBe(true);
	});

	it("exposes a context tied to the live span", () => {
		const t = inMemoryTracing();
		const span = t.tracer.nextSpan();
		const ctx = span.context();
		if (!(span instanceof OtelSpan) || !(ctx instanceof OtelTraceContext))
			throw new Error("expected the OpenTelemetry bridge types");
		expect(ctx.span).toBe(span.delegate);
		expect(ctx.spanIdString()).toBe(span.delegate.spanContext().spanId);
		span.end();
	});
});

describe("otel propagator", () => {
	it("extracts the upstream context as the parent of the next span", () => {
		const t = inMemoryTracing();
		t.propagator.extract({ traceparent: TRACEPARENT }, recordGetter).name("consume").start().end();
		const consumed = only(t.byName("consume"));
		expect(consumed.spanContext().traceId).toBe(UPSTREAM_TRACE_ID);
		expect(consumed.parentSpanId).toBe(UPSTREAM_SPAN_ID);
	});

	it("starts a new trace from an empty carrier even inside an active span", () => {
		const t = inMemoryTracing();
		const active = t.tracer.nextSpan().name("active");
		t.tracer.withSpan(active, () => {
			t.propagator.extract({}, recordGetter).name("fresh").start().end();
		});
		active.end();
		const fresh = only(t.byName("fresh"));
		expect(fresh.parentSpanId).toBeUndefined();
		expect(fresh.spanContext().traceId).not.toBe(active.context().traceIdString());
	});

	it("injects traceparent for a context", () => {
		const t = inMemoryTracing();
		const carrier: Record<string, string> = {};
		t.propagator.inject(
			OtelTraceContext.fromOtel({
				traceId: UPSTREAM_TRACE_ID,
				spanId: UPSTREAM_SPAN_ID,
				traceFlags: 1,
			}),
			carrier,
			recordSetter,
		);
		expect(carrier).toEqual({ traceparent: TRACEPARENT });
	});

	it("carries extracted baggage to child spans and back into the carrier", () => {
		const t = inMemoryTracing(withBaggage());
		const receive = t.propagator
			.extract({ traceparent: TRACEPARENT, baggage: "tenant=acme" }, recordGetter)
			.name("receive")
			.start();
		const child = t.tracer.nextSpan(receive).name("child");
		const seen = t.tracer.withSpan(child, () =>
			propagation.getBaggage(context.active())?.getEntry("tenant")?.value,
		);
		const carrier: Record<string, string> = {};
		t.propagator.inject(child.context(), carrier, recordSetter);
		child.end();
		receive.end();
		expect(seen).toBe("acme");
		expect(carrier).toEqual({
			traceparent: `00-${UPSTREAM_TRACE_ID}-${child.context().spanIdString()}-01`,
			baggage: "tenant=acme",
		});
	});

	it("lists the W3C fields", () => {
		expect(inMemoryTracing().propagator.fields()).toEqual(["traceparent", "tracestate"]);
	});
});
