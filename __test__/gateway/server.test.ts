import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { EventBus } from "../../runtime/src/event-bus.js";
import type { RunEvent } from "../../runtime/src/events.js";
import { StepExecutor } from "../../runtime/src/executor.js";
import { buildServer } from "../../gateway/src/server.js";
import { TaskService } from "../../gateway/src/task-service.js";
import { ScriptedOracle, createProviders } from "../helpers/fakes.js";

let app: FastifyInstance;
let taskService: TaskService;

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  const oracle = new ScriptedOracle({
    planner: [[{ agent: "WeatherAgent", action: "check the sky" }]],
  });
  const executor = new StepExecutor(oracle, createProviders(), {
    simulatedActionDelayMs: 0,
  });
  const bus = new EventBus<RunEvent>();
  taskService = new TaskService(oracle, executor, bus, {
    stepDelayMs: 0,
    createRunId: () => "run-1",
  });
  app = await buildServer({ taskService, bus, logger: false });
});

afterEach(async () => {
  await app.close();
  vi.restoreAllMocks();
});

describe("gateway HTTP API", () => {
  it("answers health checks", async () => {
    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: "ok" });
  });

  it("accepts a task and returns its id", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/api/tasks",
      payload: { prompt: "what's the weather" },
    });

    expect(response.statusCode).toBe(202);
    expect(response.json()).toEqual({ status: "Task received", taskId: "run-1" });
    await taskService.drain();
  });

  it("rejects an empty prompt", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/api/tasks",
      payload: { prompt: "   " },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: "prompt is required" });
  });

  it("reports run state and recorded events", async () => {
    await app.inject({
      method: "POST",
      url: "/api/tasks",
      payload: { prompt: "what's the weather" },
    });
    await taskService.drain();

    const run = await app.inject({ method: "GET", url: "/api/tasks/run-1" });
    expect(run.statusCode).toBe(200);
    expect(run.json()).toMatchObject({
      runId: "run-1",
      phase: "done",
      steps: [
        { index: 0, agent: "WeatherAgent", action: "check the sky", status: "completed" },
      ],
    });

    const events = await app.inject({
      method: "GET",
      url: "/api/tasks/run-1/events",
    });
    const body: { events: RunEvent[] } = events.json();
    expect(body.events.map((event) => event.type)).toEqual([
      "log",
      "plan",
      "status_update",
      "log",
      "status_update",
      "log",
      "log",
    ]);

    const list = await app.inject({ method: "GET", url: "/api/tasks" });
    expect(list.json().runs).toHaveLength(1);
  });

  it("returns 404 for unknown runs", async () => {
    const run = await app.inject({ method: "GET", url: "/api/tasks/nope" });
    const events = await app.inject({
      method: "GET",
      url: "/api/tasks/nope/events",
    });

    expect(run.statusCode).toBe(404);
    expect(run.json()).toEqual({ error: "Unknown task" });
    expect(events.statusCode).toBe(404);
  });

  it("reports gateway status", async () => {
    const response = await app.inject({ method: "GET", url: "/api/status" });

    expect(response.json()).toMatchObject({
      status: "running",
      activeRuns: 0,
      subscribers: 0,
    });
  });
});
