import fs from "node:fs";
import os from "node:os";
import { context, trace } from "@opentelemetry/api";
import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";
import { getConfig } from "../../config.js";

// Bind OTel trace/span if present
function traceBindings(): Record<string, string> {
	const sc = trace.getSpan(context.active())?.spanContext();
	if (sc?.traceId) return { trace_id: sc.traceId, span_id: sc.spanId };
	return {};
}

const DEFAULT_REDACT = [
	"headers.authorization",
	"headers.cookie",
	"*.token",
	"*.secret",
	"*.password",
	"*.apiKey",
	"*.api_key",
];

export function getVersion(): string {
	const pkgUrl = new URL("../../../package.json", import.meta.url);
	if (!fs.existsSync(pkgUrl)) return "0.0.0";
	const pkg: unknown = JSON.parse(fs.readFileSync(pkgUrl, "utf-8"));
	if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string")
		return pkg.version;
	return "0.0.0";
}

export function buildLogger(destOverride?: DestinationStream): Logger {
	const cfg = getConfig();
	const env = cfg.telemetry.env;
	const opts: LoggerOptions = {
		base: {
			service: cfg.telemetry.service_name,
			version: getVersion(),
			env,
			host: os.hostname(),
		},
		level: cfg.telemetry.logs.level,
		redact: {
			paths: [...DEFAULT_REDACT, ...cfg.telemetry.redact.paths],
			censor: cfg.telemetry.redact.censor,
		},
		mixin: traceBindings,
		messageKey: "msg",
	};

	// If override provided (for testing), use it
	if (destOverride) return pino(opts, destOverride);

	// In tests, and outside local, JSON to stderr
	if (env !== "local" || process.env.NODE_ENV === "test" || process.env.VITEST) {
		return pino(opts, pino.destination(2));
	}
	const transport = pino.transport({
		target: "pino-pretty",
		options: { colorize: true, translateTime: "SYS:standard", destination: 2 },
	});
	return pino(opts, transport);
}

// Singleton logger
let _logger: Logger | null = null;

export function logger(): Logger {
	if (!_logger) {
		_logger = buildLogger();
	}
	return _logger;
}

export function childLogger(bindings: Record<string, unknown>): Logger {
	return logger().child(bindings);
}

// Test helper to inject custom logger
export function __setTestLogger(l: Logger | null): void {
	_logger = l;
}
