import { CapabilityKind, resolveCapability } from "./capabilities.js";
import { EmptyPlanError, NotAListError, StepTransitionError } from "./errors.js";

export type StepStatus = "pending" | "in-progress" | "completed" | "failed";

export interface PlanStep {
  agent: CapabilityKind;
  /** Name the planner used, kept for display and re-validation. */
  agentName: string;
  action: string;
  /** The action with context values filled in, set when the step starts. */
  resolvedAction?: string;
  status: StepStatus;
}

export type Plan = PlanStep[];

export interface RawPlanStep {
  agent: string;
  action: string;
}

export interface StepSnapshot {
  index: number;
  agent: string;
  action: string;
  status: StepStatus;
}

const TRANSITIONS: Record<StepStatus, StepStatus[]> = {
  pending: ["in-progress"],
  "in-progress": ["completed", "failed"],
  completed: [],
  failed: [],
};

/**
 * Turns raw planner output into a plan. Malformed entries are dropped with
 * a warning; the plan must keep at least one step.
 */
export function validatePlan(raw: unknown): Plan {
  if (!Array.isArray(raw)) {
    throw new NotAListError(describeType(raw));
  }

  const plan: Plan = [];
  for (const entry of raw) {
    if (!isRawStep(entry)) {
      console.warn(
        `⚠️ Skipping invalid step received from planner: ${safeStringify(entry)}`,
      );
      continue;
    }
    plan.push({
      agent: resolveCapability(entry.agent),
      agentName: entry.agent,
      action: entry.action,
      status: "pending",
    });
  }

  if (plan.length === 0) {
    throw new EmptyPlanError();
  }
  return plan;
}

export function toRawPlan(plan: Plan): RawPlanStep[] {
  return plan.map((step) => ({ agent: step.agentName, action: step.action }));
}

export function transitionStep(step: PlanStep, next: StepStatus): void {
  if (!TRANSITIONS[step.status].includes(next)) {
    throw new StepTransitionError(step.status, next);
  }
  step.status = next;
}

export function snapshotSteps(plan: Plan): StepSnapshot[] {
  return plan.map((step, index) => ({
    index,
    agent: step.agentName,
    action: step.resolvedAction ?? step.action,
    status: step.status,
  }));
}

function isRawStep(value: unknown): value is RawPlanStep {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return (
    "agent" in value &&
    typeof value.agent === "string" &&
    "action" in value &&
    typeof value.action === "string"
  );
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
