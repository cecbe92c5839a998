import chalk from "chalk";
import { beforeAll, describe, expect, it } from "vitest";
import { formatEvent, parseRunEvent } from "../../cli/src/format.js";
import type { RunEvent } from "../../runtime/src/events.js";

beforeAll(() => {
  chalk.level = 0;
});

const base = { runId: "run-1", timestamp: 1700000000000 };

describe("parseRunEvent", () => {
  it("accepts run events", () => {
    const event: RunEvent = {
      ...base,
      type: "status_update",
      stepIndex: 0,
      stepAction: "find x",
      status: "completed",
    };
    expect(parseRunEvent(JSON.stringify(event))).toEqual(event);
  });

  it("ignores other frames", () => {
    expect(parseRunEvent('{"type":"pong"}')).toBeNull();
    expect(parseRunEvent("not json")).toBeNull();
    expect(
      parseRunEvent(
        JSON.stringify({
          ...base,
          type: "status_update",
          stepIndex: 0,
          stepAction: "x",
          status: "done",
        }),
      ),
    ).toBeNull();
  });
});

describe("formatEvent", () => {
  it("formats log lines", () => {
    expect(
      formatEvent({
        ...base,
        type: "log",
        agent: "PlannerAgent",
        message: "Contacting the planner...",
        level: "info",
      }),
    ).toBe("ℹ️  [PlannerAgent] Contacting the planner...");
    expect(
      formatEvent({
        ...base,
        type: "log",
        agent: "System",
        message: "boom",
        level: "error",
      }),
    ).toBe("❌ [System] boom");
  });

  it("formats plans", () => {
    expect(
      formatEvent({
        ...base,
        type: "plan",
        steps: [
          { index: 0, agent: "SearchAgent", action: "find x", status: "pending" },
        ],
      }),
    ).toBe("📋 Plan (1 steps)\n   1. [SearchAgent] find x");
  });

  it("formats status updates", () => {
    expect(
      formatEvent({
        ...base,
        type: "status_update",
        stepIndex: 2,
        stepAction: "post y",
        status: "failed",
      }),
    ).toBe("🔄 Step 3 failed: post y");
  });
});
