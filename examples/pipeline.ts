import { W3CTraceContextPropagator } from "@opentelemetry/core";
import { createFunctionTracing, createMessage, initTelemetry, logger, shutdownTelemetry } from "../src/index.js";

async function main() {
	// [telemetry] in the config file decides whether spans are exported
	await initTelemetry();
	const { registry, close } = createFunctionTracing({
		propagator: new W3CTraceContextPropagator(),
	});
	registry.registerFunction("uppercase", (m) => String(m.payload).toUpperCase());
	registry.registerSupplier("greeting", () => "hello");

	const greeting = await registry.lookup("greeting")?.invoke();
	logger().info({ headers: greeting?.headers }, "supplier produced");

	const shout = await registry.lookup("uppercase")?.invoke(
		createMessage(greeting?.payload ?? "", { ...greeting?.headers }),
	);
	logger().info({ payload: shout?.payload, headers: shout?.headers }, "function produced");

	close();
	await shutdownTelemetry();
}

main().catch((e) => {
	logger().error({ error: String(e) }, "pipeline example failed");
	process.exitCode = 1;
});
