import os from "node:os";
import path from "node:path";
import { context } from "@opentelemetry/api";
import { AsyncLocalStorageContextManager } from "@opentelemetry/context-async-hooks";
import pino from "pino";
import { __setTestLogger } from "../src/lib/logging/logger.js";

// Never read the developer's own config file from tests
process.env.FUNCTION_TRACING_CONFIG ??= path.join(
	os.tmpdir(),
	"function-tracing-tests",
	"missing.toml",
);

context.disable();
context.setGlobalContextManager(new AsyncLocalStorageContextManager().enable());

__setTestLogger(pino({ level: "silent" }));
