import { afterEach, describe, expect, it, vi } from "vitest";
import {
  CapabilityKind,
  resolveCapability,
} from "../../runtime/src/capabilities.js";
import {
  EmptyPlanError,
  NotAListError,
  StepTransitionError,
} from "../../runtime/src/errors.js";
import {
  snapshotSteps,
  toRawPlan,
  transitionStep,
  validatePlan,
  type PlanStep,
} from "../../runtime/src/plan.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("resolveCapability", () => {
  it("maps planner agent names case-insensitively", () => {
    expect(resolveCapability("SearchAgent")).toBe(CapabilityKind.Search);
    expect(resolveCapability("slackagent")).toBe(CapabilityKind.Messaging);
    expect(resolveCapability(" CommunicationAgent ")).toBe(
      CapabilityKind.VoiceSms,
    );
    expect(resolveCapability("Voice/SMS")).toBe(CapabilityKind.VoiceSms);
    expect(resolveCapability("KnowledgeAgent")).toBe(CapabilityKind.Knowledge);
    expect(resolveCapability("CalendarAgent")).toBe(CapabilityKind.Calendar);
  });

  it("treats anything else as Unknown", () => {
    expect(resolveCapability("WeatherAgent")).toBe(CapabilityKind.Unknown);
    expect(resolveCapability("")).toBe(CapabilityKind.Unknown);
    expect(resolveCapability("constructor")).toBe(CapabilityKind.Unknown);
  });
});

describe("validatePlan", () => {
  it("builds pending steps in order", () => {
    const plan = validatePlan([
      { agent: "SearchAgent", action: "find capital of France" },
      { agent: "WeatherAgent", action: "check the sky" },
    ]);

    expect(plan).toEqual([
      {
        agent: CapabilityKind.Search,
        agentName: "SearchAgent",
        action: "find capital of France",
        status: "pending",
      },
      {
        agent: CapabilityKind.Unknown,
        agentName: "WeatherAgent",
        action: "check the sky",
        status: "pending",
      },
    ]);
  });

  it("drops malformed entries with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const plan = validatePlan([
      { agent: "SearchAgent" },
      "not a step",
      { agent: 3, action: "x" },
      { agent: "SlackAgent", action: "post hi to #general" },
    ]);

    expect(toRawPlan(plan)).toEqual([
      { agent: "SlackAgent", action: "post hi to #general" },
    ]);
    expect(warn).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenCalledWith(
      '⚠️ Skipping invalid step received from planner: {"agent":"SearchAgent"}',
    );
  });

  it("rejects output that is not a list", () => {
    expect(() => validatePlan({ agent: "SearchAgent", action: "x" })).toThrow(
      new NotAListError("object"),
    );
    expect(() => validatePlan("steps")).toThrow(
      "The planner returned an invalid format. Expected a list, but got string.",
    );
    expect(() => validatePlan(null)).toThrow(NotAListError);
  });

  it("rejects a plan with no valid steps", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(() => validatePlan([])).toThrow(EmptyPlanError);
    expect(() => validatePlan([{ action: "x" }])).toThrow(
      "The planner returned a plan with no valid steps.",
    );
  });
});

describe("toRawPlan", () => {
  it("validates back to the same plan", () => {
    const plan = validatePlan([
      { agent: "KnowledgeAgent", action: "look up Q3 revenue" },
      { agent: "CommunicationAgent", action: "text {knowledge_answer} to +15550100" },
    ]);
    expect(validatePlan(toRawPlan(plan))).toEqual(plan);
  });
});

describe("transitionStep", () => {
  function step(): PlanStep {
    return {
      agent: CapabilityKind.Unknown,
      agentName: "X",
      action: "a",
      status: "pending",
    };
  }

  it("allows pending → in-progress → completed", () => {
    const s = step();
    transitionStep(s, "in-progress");
    transitionStep(s, "completed");
    expect(s.status).toBe("completed");
  });

  it("refuses to skip or leave a terminal status", () => {
    const s = step();
    expect(() => transitionStep(s, "completed")).toThrow(StepTransitionError);
    transitionStep(s, "in-progress");
    transitionStep(s, "failed");
    expect(() => transitionStep(s, "in-progress")).toThrow(
      "Illegal step transition from failed to in-progress",
    );
  });
});

describe("snapshotSteps", () => {
  it("reports the planner's agent names with indices", () => {
    const plan = validatePlan([{ agent: "CalendarAgent", action: "book" }]);
    expect(snapshotSteps(plan)).toEqual([
      { index: 0, agent: "CalendarAgent", action: "book", status: "pending" },
    ]);
  });
});
