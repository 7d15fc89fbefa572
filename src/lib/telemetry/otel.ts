import { type Tracer as ApiTracer, trace } from "@opentelemetry/api";
import type { NodeSDK } from "@opentelemetry/sdk-node";
import type { SpanExporter } from "@opentelemetry/sdk-trace-base";
import { type Config, getConfig } from "../../config.js";
import { logTelemetryInit } from "../logging/events.js";
import { getVersion } from "../logging/logger.js";

export const TRACER_NAME = "function-tracing";

export type TelemetryOptions = {
	enabled: boolean;
	endpoint: string;
	protocol: "grpc" | "http";
	sampleRatio: number;
	serviceName: string;
	serviceVersion: string;
	env?: string;
};

let sdk: NodeSDK | null = null;

export function telemetryOptionsFromConfig(cfg: Config = getConfig()): TelemetryOptions {
	const t = cfg.telemetry;
	return {
		enabled: t.enabled,
		endpoint: t.endpoint,
		protocol: t.protocol,
		sampleRatio: t.sample_ratio,
		serviceName: t.service_name,
		serviceVersion: getVersion(),
		env: t.env,
	};
}

/**
 * Starts the OpenTelemetry Node SDK with an OTLP trace exporter, configured
 * from the `[telemetry]` section unless options are given. Idempotent, and a
 * no-op when disabled. Failures are logged, never thrown.
 */
export async function initTelemetry(
	opts: TelemetryOptions = telemetryOptionsFromConfig(),
): Promise<boolean> {
	if (sdk || !opts.enabled) return sdk !== null;
	const event = {
		enabled: opts.enabled,
		endpoint: opts.endpoint,
		protocol: opts.protocol,
		sample_ratio: opts.sampleRatio,
	};
	try {
		// Lazy import SDK to avoid loading exporters when disabled
		const { NodeSDK } = await import("@opentelemetry/sdk-node");
		const { Resource } = await import("@opentelemetry/resources");
		const { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } = await import(
			"@opentelemetry/semantic-conventions"
		);
		const { ParentBasedSampler, TraceIdRatioBasedSampler } = await import(
			"@opentelemetry/sdk-trace-base"
		);
		let traceExporter: SpanExporter;
		if (opts.protocol === "grpc") {
			const { OTLPTraceExporter } = await import("@opentelemetry/exporter-trace-otlp-grpc");
			traceExporter = new OTLPTraceExporter({ url: opts.endpoint });
		} else {
			const { OTLPTraceExporter } = await import("@opentelemetry/exporter-trace-otlp-http");
			traceExporter = new OTLPTraceExporter({ url: `${opts.endpoint}/v1/traces` });
		}

		const started = new NodeSDK({
			resource: new Resource({
				[ATTR_SERVICE_NAME]: opts.serviceName,
				[ATTR_SERVICE_VERSION]: opts.serviceVersion,
				"deployment.environment": opts.env ?? "local",
			}),
			traceExporter,
			sampler: new ParentBasedSampler({
				root: new TraceIdRatioBasedSampler(opts.sampleRatio),
			}),
		});
		started.start();
		sdk = started;
		logTelemetryInit(event);
		return true;
	} catch (e) {
		logTelemetryInit({ ...event, error: e instanceof Error ? e.message : String(e) });
		return false;
	}
}

export async function shutdownTelemetry(): Promise<void> {
	const current = sdk;
	sdk = null;
	await current?.shutdown();
}

export function tracer(): ApiTracer {
	return trace.getTracer(TRACER_NAME);
}
