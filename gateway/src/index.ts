import { pathToFileURL } from "url";
import { EventBus } from "../../runtime/src/event-bus.js";
import type { RunEvent } from "../../runtime/src/events.js";
import { createRuntime } from "../../runtime/src/index.js";
import { loadRuntimeConfig } from "../../runtime/src/config.js";
import { RunLogger } from "./run-logger.js";
import { buildServer } from "./server.js";
import { TaskService } from "./task-service.js";

export interface GatewayOverrides {
  port?: number;
  host?: string;
}

export async function start(overrides: GatewayOverrides = {}): Promise<void> {
  console.log("🔧 Initializing Conductor runtime...");
  const config = loadRuntimeConfig();
  const runtime = createRuntime(config);
  console.log(
    `✅ Runtime initialized (${config.llm.provider}/${config.llm.model})`,
  );

  const bus = new EventBus<RunEvent>();
  const runLogger = new RunLogger(config.logDir);
  bus.subscribe((event) => runLogger.logEvent(event));
  console.log(`📝 Writing run log to ${runLogger.logPath}`);

  const taskService = new TaskService(runtime.oracle, runtime.executor, bus, {
    stepDelayMs: config.stepDelayMs,
  });

  const app = await buildServer({ taskService, bus });

  const port = overrides.port ?? config.gateway.port;
  const host = overrides.host ?? config.gateway.host;
  await app.listen({ port, host });
  console.log(`🚀 Gateway running on http://${host}:${port}`);
  console.log(`📡 WebSocket available at ws://${host}:${port}/ws`);

  // Graceful shutdown
  const shutdown = async () => {
    console.log("\n🛑 Shutting down gateway...");
    try {
      await app.close();
      await taskService.drain();
      process.exit(0);
    } catch (error) {
      console.error("Error during shutdown:", error);
      process.exit(1);
    }
  };
  process.once("SIGTERM", () => void shutdown());
  process.once("SIGINT", () => void shutdown());
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  start().catch((error) => {
    console.error("Fatal error starting gateway:", error);
    process.exit(1);
  });
}
