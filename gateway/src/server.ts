import Fastify, { type FastifyInstance } from "fastify";
import websocket from "@fastify/websocket";
import cors from "@fastify/cors";
import type { EventBus } from "../../runtime/src/event-bus.js";
import type { RunEvent } from "../../runtime/src/events.js";
import { handleClientMessage, streamRunEvents } from "./event-stream.js";
import type { TaskService } from "./task-service.js";

export interface GatewayDeps {
  taskService: TaskService;
  bus: EventBus<RunEvent>;
  logger?: boolean;
}

interface TaskBody {
  prompt?: unknown;
}

interface RunParams {
  id: string;
}

interface StreamQuery {
  runId?: string;
}

export async function buildServer(deps: GatewayDeps): Promise<FastifyInstance> {
  const { taskService, bus } = deps;
  const app = Fastify({
    logger: deps.logger ?? true,
  });

  // Register plugins
  await app.register(cors);
  await app.register(websocket);

  // Health check
  app.get("/health", async () => {
    return { status: "ok", timestamp: new Date().toISOString() };
  });

  app.post<{ Body: TaskBody }>("/api/tasks", async (request, reply) => {
    const prompt =
      typeof request.body?.prompt === "string" ? request.body.prompt.trim() : "";
    if (!prompt) {
      return reply.code(400).send({ error: "prompt is required" });
    }

    const taskId = taskService.submit(prompt);
    return reply.code(202).send({ status: "Task received", taskId });
  });

  app.get("/api/tasks", async () => {
    return { runs: taskService.listRuns() };
  });

  app.get<{ Params: RunParams }>("/api/tasks/:id", async (request, reply) => {
    const run = taskService.getRun(request.params.id);
    if (!run) {
      return reply.code(404).send({ error: "Unknown task" });
    }
    return run;
  });

  app.get<{ Params: RunParams }>(
    "/api/tasks/:id/events",
    async (request, reply) => {
      const runId = request.params.id;
      const events = taskService.getEvents(runId);
      if (!events) {
        return reply.code(404).send({ error: "Unknown task" });
      }
      return { events };
    },
  );

  // WebSocket endpoint streaming run events
  await app.register(async (fastify) => {
    fastify.get<{ Querystring: StreamQuery }>(
      "/ws",
      { websocket: true },
      (socket, req) => {
        const runId = req.query.runId || undefined;
        console.log(
          `🔌 Client connected${runId ? ` (run ${runId})` : ""}`,
        );
        const stop = streamRunEvents(bus, socket, {
          runId,
          replay: runId ? taskService.getEvents(runId) : undefined,
        });

        socket.on("message", (message: Buffer) => {
          const reply = handleClientMessage(message.toString());
          if (reply) socket.send(reply);
        });

        socket.on("close", () => {
          console.log("🔌 Client disconnected");
          stop();
        });

        socket.on("error", (error) => {
          console.error("WebSocket error:", error);
          stop();
        });
      },
    );
  });

  app.get("/api/status", async () => {
    return {
      status: "running",
      version: "0.1.0",
      uptime: process.uptime(),
      activeRuns: taskService.getActiveRunCount(),
      subscribers: bus.subscriberCount,
    };
  });

  return app;
}
