import type { StepSnapshot, StepStatus } from "./plan.js";

export type LogLevel = "info" | "error" | "success";

interface RunEventBase {
  runId: string;
  timestamp: number;
}

export interface LogEvent extends RunEventBase {
  type: "log";
  agent: string;
  message: string;
  level: LogLevel;
}

export interface PlanEvent extends RunEventBase {
  type: "plan";
  steps: StepSnapshot[];
}

export interface StatusUpdateEvent extends RunEventBase {
  type: "status_update";
  stepIndex: number;
  stepAction: string;
  status: StepStatus;
}

export type RunEvent = LogEvent | PlanEvent | StatusUpdateEvent;

export const PLANNER_AGENT = "PlannerAgent";
export const SYSTEM_AGENT = "System";

export const RUN_COMPLETED_MESSAGE = "Task automation completed.";
export const PLANNING_FAILED_PREFIX =
  "Failed to create a valid task plan. Please try rephrasing your command.";
export const RUN_ABORTED_PREFIX = "Task automation aborted.";

/**
 * True for the last event a run emits, whichever way it ended.
 */
export function isTerminalEvent(event: RunEvent): boolean {
  return (
    event.type === "log" &&
    event.agent === SYSTEM_AGENT &&
    (event.message === RUN_COMPLETED_MESSAGE ||
      event.message.startsWith(PLANNING_FAILED_PREFIX) ||
      event.message.startsWith(RUN_ABORTED_PREFIX))
  );
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;

/** An event before the orchestrator stamps it with run id and time. */
export type RunEventInput = DistributiveOmit<RunEvent, "runId" | "timestamp">;
