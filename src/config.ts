import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import toml from "toml";
import { z } from "zod";
import { type PropertySource, flattenProperties } from "./lib/properties.js";

export const zConfig = z.object({
	telemetry: z
		.object({
			enabled: z.boolean().default(false),
			endpoint: z.string().default("http://127.0.0.1:4318"),
			protocol: z.enum(["grpc", "http"]).default("http"),
			sample_ratio: z.number().min(0).max(1).default(1.0),
			service_name: z.string().default("function-tracing"),
			env: z.string().default("local"),
			logs: z
				.object({
					level: z
						.enum(["trace", "debug", "info", "warn", "error"])
						.default("info"),
				})
				.default({ level: "info" }),
			redact: z
				.object({
					paths: z.array(z.string()).default([]),
					censor: z.string().default("[REDACTED]"),
				})
				.default({ paths: [], censor: "[REDACTED]" }),
		})
		.default({}),
	// Binding properties, looked up as stream.<dotted.path>
	stream: z.record(z.unknown()).default({}),
});

export type Config = z.infer<typeof zConfig>;

function errorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}

function expandHome(p: string): string {
	if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
	return p;
}

export function configPath(): string {
	return expandHome(
		process.env.FUNCTION_TRACING_CONFIG ??
			path.join(os.homedir(), ".config", "function-tracing", "config.toml"),
	);
}

let cached: Config | null = null;
let watcher: fs.FSWatcher | null = null;
let reloadTimer: NodeJS.Timeout | null = null;
let lastMtimeMs = 0;
const reloadListeners = new Set<() => void>();

/** Reads and validates the config file; a missing file yields the defaults. */
export function loadConfig(cfgPath = configPath()): Config {
	let raw: string;
	try {
		raw = fs.readFileSync(cfgPath, "utf8");
		lastMtimeMs = fs.statSync(cfgPath).mtimeMs;
	} catch (e) {
		if (e instanceof Error && "code" in e && e.code === "ENOENT")
			return zConfig.parse({});
		throw e;
	}
	const parsed: unknown = toml.parse(raw);
	return zConfig.parse(parsed);
}

/**
 * Registers a listener called after every successful reload. Returns the
 * unsubscribe function.
 */
export function onConfigReload(listener: () => void): () => void {
	reloadListeners.add(listener);
	return () => {
		reloadListeners.delete(listener);
	};
}

function notifyReload(): void {
	for (const listener of [...reloadListeners]) {
		try {
			listener();
		} catch (e) {
			process.stderr.write(
				`[config] reload listener failed: ${errorMessage(e)}\n`,
			);
		}
	}
}

/** Reloads now, keeping the previous config when the new one is invalid. */
export function reloadConfig(): Config | null {
	try {
		cached = loadConfig();
	} catch (e) {
		process.stderr.write(
			`[config] reload failed, keeping previous: ${errorMessage(e)}\n`,
		);
		return cached;
	}
	notifyReload();
	return cached;
}

function watch(cfgPath: string): void {
	if (watcher || !fs.existsSync(cfgPath)) return;
	try {
		watcher = fs.watch(cfgPath, { persistent: false }, () => {
			if (reloadTimer) clearTimeout(reloadTimer);
			reloadTimer = setTimeout(() => {
				reloadTimer = null;
				reloadConfig();
			}, 200);
		});
	} catch (e) {
		process.stderr.write(
			`[config] watch setup failed: ${errorMessage(e)}\n`,
		);
	}
}

export function getConfig(): Config {
	const cfgPath = configPath();
	if (!cached) {
		cached = loadConfig(cfgPath);
		watch(cfgPath);
		return cached;
	}
	// In case fs.watch does not fire, opportunistically reload if mtime changed
	let mtimeMs: number;
	try {
		mtimeMs = fs.statSync(cfgPath).mtimeMs;
	} catch {
		return cached;
	}
	if (mtimeMs > lastMtimeMs) return reloadConfig() ?? cached;
	return cached;
}

/** Binding properties of the current config, re-read on every lookup. */
export function configPropertySource(): PropertySource {
	return {
		getProperty(key) {
			const flat = flattenProperties(getConfig().stream, "stream");
			return Object.hasOwn(flat, key) ? flat[key] : undefined;
		},
	};
}

export function __resetConfigForTests(): void {
	cached = null;
	lastMtimeMs = 0;
	if (reloadTimer) clearTimeout(reloadTimer);
	reloadTimer = null;
	watcher?.close();
	watcher = null;
	reloadListeners.clear();
}
