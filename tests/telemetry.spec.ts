import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";
import {
	initTelemetry,
	shutdownTelemetry,
	telemetryOptionsFromConfig,
	tracer,
} from "../src/lib/telemetry/otel.js";

describe("telemetry bootstrap", () => {
	let dir: string | undefined;

	afterEach(() => {
		if (dir) fs.rmSync(dir, { recursive: true, force: true });
		dir = undefined;
	});

	it("does nothing when disabled", async () => {
		const started = await initTelemetry({
			enabled: false,
			endpoint: "http://127.0.0.1:4318",
			protocol: "http",
			sampleRatio: 1,
			serviceName: "test",
			serviceVersion: "0.0.0",
		});
		expect(started).toBe(false);
		await expect(shutdownTelemetry()).resolves.toBeUndefined();
	});

	it("takes its options from the telemetry section of the config", () => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "function-tracing-"));
		const file = path.join(dir, "config.toml");
		fs.writeFileSync(
			file,
			`
[telemetry]
enabled = true
endpoint = "http://collector:4317"
protocol = "grpc"
sample_ratio = 0.25
service_name = "orders"
env = "staging"
`,
		);
		expect(telemetryOptionsFromConfig(loadConfig(file))).toEqual({
			enabled: true,
			endpoint: "http://collector:4317",
			protocol: "grpc",
			sampleRatio: 0.25,
			serviceName: "orders",
			serviceVersion: "0.1.0",
			env: "staging",
		});
	});

	it("stays off under the default config", async () => {
		expect(telemetryOptionsFromConfig().enabled).toBe(false);
		await expect(initTelemetry()).resolves.toBe(false);
	});

	it("hands out a usable API tracer without an SDK", () => {
		const span = tracer().startSpan("noop");
		expect(span.isRecording()).toBe(false);
		span.end();
	});
});
