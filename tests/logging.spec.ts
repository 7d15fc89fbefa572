import { Writable } from "node:stream";
import { type SpanContext, TraceFlags, context, trace } from "@opentelemetry/api";
import pino from "pino";
import { afterEach, describe, expect, it } from "vitest";
import { createDestinationResolver } from "../src/lib/functions/destinations.js";
import { logDestinationResolved } from "../src/lib/logging/events.js";
import { __setTestLogger, buildLogger } from "../src/lib/logging/logger.js";
import { createPropertySource } from "../src/lib/properties.js";

function capture() {
	const lines: Record<string, unknown>[] = [];
	const stream = new Writable({
		write(chunk, _enc, callback) {
			const s = chunk.toString("utf8").trim();
			for (const line of s.split("\n")) if (line) lines.push(JSON.parse(line));
			callback();
		},
	});
	return { stream, lines };
}

const tick = () => new Promise((resolve) => setTimeout(resolve, 10));

afterEach(() => {
	__setTestLogger(pino({ level: "silent" }));
});

describe("logging: trace correlation", () => {
	it("includes trace_id/span_id when inside an active span", async () => {
		const { stream, lines } = capture();
		const logger = buildLogger(stream);
		const spanContext: SpanContext = {
			traceId: "f".repeat(32),
			spanId: "a".repeat(16),
			traceFlags: TraceFlags.SAMPLED,
		};
		context.with(trace.setSpan(context.active(), trace.wrapSpanContext(spanContext)), () => {
			logger.info({ foo: "bar" }, "inside span");
		});
		await tick();
		expect(lines[0]).toMatchObject({
			trace_id: "f".repeat(32),
			span_id: "a".repeat(16),
			msg: "inside span",
			foo: "bar",
			service: "function-tracing",
		});
	});

	it("does not include trace_id when no active span", async () => {
		const { stream, lines } = capture();
		buildLogger(stream).info({ data: "test" }, "no span");
		await tick();
		expect(lines[0]).not.toHaveProperty("trace_id");
		expect(lines[0]).toHaveProperty("msg", "no span");
	});

	it("redacts credentials in headers", async () => {
		const { stream, lines } = capture();
		buildLogger(stream).info({ headers: { authorization: "test-secret", id: "1" } }, "headers");
		await tick();
		expect(lines[0].headers).toEqual({ authorization: "[REDACTED]", id: "1" });
	});
});

describe("logging: events", () => {
	it("emits a stamped event when the destination cache is cleared", async () => {
		const { stream, lines } = capture();
		__setTestLogger(buildLogger(stream));
		const resolver = createDestinationResolver(createPropertySource({}));
		resolver.input("fn");
		resolver.clear();
		await tick();
		expect(lines).toHaveLength(1);
		expect(lines[0]).toMatchObject({
			event: "DestinationCacheCleared",
			event_version: "1",
			entries: 1,
			msg: "context refreshed, destination cache reset",
		});
		expect(typeof lines[0].iso_time).toBe("string");
	});

	it("drops invalid event payloads with a warning", async () => {
		const { stream, lines } = capture();
		__setTestLogger(buildLogger(stream));
		logDestinationResolved({ function: "", direction: "input", binding: "b", destination: "d" });
		await tick();
		expect(lines).toHaveLength(1);
		expect(lines[0]).toMatchObject({ event: "DestinationResolved", msg: "invalid_event_payload" });
	});
});
