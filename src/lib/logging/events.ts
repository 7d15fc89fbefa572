import { z } from "zod";
import { childLogger } from "./logger.js";

const EVENT_VERSION = "1";

function stamp<T extends Record<string, unknown>>(
	fields: T,
): T & { event_version: string; iso_time: string } {
	return { event_version: EVENT_VERSION, iso_time: new Date().toISOString(), ...fields };
}

function validate<T>(event: string, schema: z.ZodType<T>, value: unknown): boolean {
	const parsed = schema.safeParse(value);
	if (!parsed.success) {
		childLogger({ event }).warn({ error: parsed.error.message }, "invalid_event_payload");
		return false;
	}
	return true;
}

const zDirection = z.enum(["input", "output"]);

const zDestinationResolved = z.object({
	function: z.string().min(1),
	direction: zDirection,
	binding: z.string().min(1),
	destination: z.string().min(1),
});

export function logDestinationResolved(fields: z.infer<typeof zDestinationResolved>) {
	if (!validate("DestinationResolved", zDestinationResolved, fields)) return;
	childLogger({ event: "DestinationResolved" }).debug(stamp(fields), "destination resolved");
}

const zDestinationCacheCleared = z.object({
	entries: z.number().int().nonnegative(),
});

export function logDestinationCacheCleared(fields: z.infer<typeof zDestinationCacheCleared>) {
	if (!validate("DestinationCacheCleared", zDestinationCacheCleared, fields)) return;
	childLogger({ event: "DestinationCacheCleared" }).info(
		stamp(fields),
		"context refreshed, destination cache reset",
	);
}

const zFunctionInvocationFailed = z.object({
	function: z.string().min(1),
	error: z.string(),
});

export function logFunctionInvocationFailed(fields: z.infer<typeof zFunctionInvocationFailed>) {
	if (!validate("FunctionInvocationFailed", zFunctionInvocationFailed, fields)) return;
	childLogger({ event: "FunctionInvocationFailed" }).debug(stamp(fields), "function invocation failed");
}

const zTelemetryInit = z.object({
	enabled: z.boolean(),
	endpoint: z.string(),
	protocol: z.enum(["grpc", "http"]),
	sample_ratio: z.number(),
	error: z.string().optional(),
});

export function logTelemetryInit(fields: z.infer<typeof zTelemetryInit>) {
	if (!validate("TelemetryInit", zTelemetryInit, fields)) return;
	const log = childLogger({ event: "TelemetryInit" });
	if (fields.error) log.error(stamp(fields), "telemetry init failed");
	else log.info(stamp(fields), "telemetry initialized");
}
