import { beforeEach, describe, expect, it, vi } from "vitest";
import type { CompletionOracle } from "../../agent/src/index.js";
import { EventBus } from "../../runtime/src/event-bus.js";
import {
  RUN_ABORTED_PREFIX,
  isTerminalEvent,
  type RunEvent,
} from "../../runtime/src/events.js";
import { StepExecutor, type StepOutcome } from "../../runtime/src/executor.js";
import { TaskService } from "../../gateway/src/task-service.js";
import { createProviders } from "../helpers/fakes.js";

/** Answers by template, echoing its input so concurrent runs stay distinguishable. */
const echoOracle: CompletionOracle = {
  async complete(promptData, template) {
    switch (template) {
      case "planner":
        return [
          { agent: "SearchAgent", action: `find ${promptData.user_prompt}` },
          { agent: "SlackAgent", action: "post {search_result} to #general" },
        ];
      case "search_query_parser":
        return promptData.action_text;
      case "messaging_parser": {
        const match = /^post (.*) to (#\S+)$/.exec(promptData.action_text);
        return { channel: match?.[2], message: match?.[1] };
      }
      default:
        throw new Error(`Unexpected template ${template}`);
    }
  },
};

/** Throws where a StepExecutor would return an outcome. */
class ThrowingExecutor extends StepExecutor {
  async execute(): Promise<StepOutcome> {
    throw new Error("disk full");
  }
}

function createService(
  options: { maxRuns?: number; busSize?: number; throwing?: boolean } = {},
) {
  const { maxRuns, busSize, throwing } = options;
  const providers = createProviders();
  providers.search.query.mockImplementation(async (query) => `result for ${query}`);
  const executorOptions = { simulatedActionDelayMs: 0 };
  const executor = throwing
    ? new ThrowingExecutor(echoOracle, providers, executorOptions)
    : new StepExecutor(echoOracle, providers, executorOptions);
  const bus = new EventBus<RunEvent>(busSize);
  const ids = ["run-a", "run-b", "run-c"];
  const service = new TaskService(echoOracle, executor, bus, {
    stepDelayMs: 0,
    maxRuns,
    createRunId: () => ids.shift() ?? "run-overflow",
  });
  return { service, providers, bus };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  return () => {
    vi.restoreAllMocks();
  };
});

describe("TaskService", () => {
  it("returns a run id immediately and finishes in the background", async () => {
    const { service } = createService();

    const runId = service.submit("alpha");

    expect(runId).toBe("run-a");
    expect(service.getActiveRunCount()).toBe(1);
    await service.drain();
    expect(service.getActiveRunCount()).toBe(0);
    expect(service.getRun(runId)).toMatchObject({
      runId: "run-a",
      prompt: "alpha",
      phase: "done",
      failed: false,
    });
  });

  it("keeps the context of concurrent runs apart", async () => {
    const { service, providers, bus } = createService();

    const first = service.submit("alpha");
    const second = service.submit("beta");
    await service.drain();

    expect(providers.messaging.post).toHaveBeenCalledTimes(2);
    expect(providers.messaging.post).toHaveBeenCalledWith(
      "#general",
      "result for find alpha",
    );
    expect(providers.messaging.post).toHaveBeenCalledWith(
      "#general",
      "result for find beta",
    );
    expect(bus.history((event) => event.runId === first)).toHaveLength(11);
    expect(bus.history((event) => event.runId === second)).toHaveLength(11);
    expect(service.listRuns().map((run) => run.runId)).toEqual([
      "run-a",
      "run-b",
    ]);
  });

  it("forgets the oldest finished runs beyond the limit", async () => {
    const { service } = createService({ maxRuns: 1 });

    const first = service.submit("alpha");
    await service.drain();
    const second = service.submit("beta");
    await service.drain();

    expect(service.getRun(first)).toBeUndefined();
    expect(service.getEvents(first)).toBeUndefined();
    expect(service.getRun(second)?.phase).toBe("done");
  });

  it("keeps every event of a retained run after the bus history rolls over", async () => {
    const { service, bus } = createService({ busSize: 5 });

    const first = service.submit("alpha");
    await service.drain();
    service.submit("beta");
    await service.drain();

    expect(bus.history((event) => event.runId === first)).toHaveLength(0);
    const events = service.getEvents(first);
    expect(events).toHaveLength(11);
    expect(events?.[1]).toMatchObject({ runId: "run-a", type: "plan" });
    expect(events?.at(-1)).toMatchObject({
      type: "log",
      message: "Task automation completed.",
    });
  });

  it("ends a run whose execution throws with a terminal error event", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const { service, bus } = createService({ throwing: true });

    const runId = service.submit("alpha");
    await service.drain();

    const events = service.getEvents(runId) ?? [];
    expect(events.at(-1)).toMatchObject({
      type: "log",
      agent: "System",
      level: "error",
      message: `${RUN_ABORTED_PREFIX} Error: disk full`,
    });
    expect(events.filter(isTerminalEvent)).toHaveLength(1);
    expect(bus.history().at(-1)).toEqual(events.at(-1));
    expect(service.getRun(runId)).toMatchObject({ phase: "done", failed: true });
  });
});
