import {
  describeError,
  type CompletionOracle,
} from "../../agent/src/index.js";
import { interpolate, RunContext } from "./context.js";
import type { EventPublisher } from "./event-bus.js";
import {
  PLANNER_AGENT,
  PLANNING_FAILED_PREFIX,
  RUN_ABORTED_PREFIX,
  RUN_COMPLETED_MESSAGE,
  SYSTEM_AGENT,
  type LogLevel,
  type RunEvent,
  type RunEventInput,
} from "./events.js";
import { waitMs, type StepExecutor } from "./executor.js";
import {
  snapshotSteps,
  transitionStep,
  validatePlan,
  type Plan,
  type StepSnapshot,
} from "./plan.js";

export type RunPhase = "awaiting_plan" | "planning" | "executing" | "done";

export interface PlanOrchestratorOptions {
  /** Pause before each step so observers can follow along. */
  stepDelayMs: number;
}

export interface RunSnapshot {
  runId: string;
  prompt: string;
  phase: RunPhase;
  failed: boolean;
  steps: StepSnapshot[];
  startedAt: number;
  finishedAt?: number;
}

/**
 * Drives one run: asks the planner for a plan, then executes its steps in
 * order, publishing every transition on the event bus. One instance per
 * run; the context lives and dies with it.
 */
export class PlanOrchestrator {
  private phase: RunPhase = "awaiting_plan";
  private failed = false;
  private plan: Plan = [];
  private prompt = "";
  private readonly startedAt = Date.now();
  private finishedAt: number | undefined;
  private readonly context = new RunContext();

  constructor(
    readonly runId: string,
    private readonly oracle: CompletionOracle,
    private readonly executor: StepExecutor,
    private readonly bus: EventPublisher<RunEvent>,
    private readonly options: PlanOrchestratorOptions,
  ) {}

  getPhase(): RunPhase {
    return this.phase;
  }

  snapshot(): RunSnapshot {
    return {
      runId: this.runId,
      prompt: this.prompt,
      phase: this.phase,
      failed: this.failed,
      steps: snapshotSteps(this.plan),
      startedAt: this.startedAt,
      finishedAt: this.finishedAt,
    };
  }

  async execute(prompt: string): Promise<void> {
    const plan = await this.generatePlan(prompt);
    if (plan) {
      await this.run(plan);
    }
  }

  /**
   * Returns null when planning failed; the failure has already been
   * reported on the bus.
   */
  async generatePlan(prompt: string): Promise<Plan | null> {
    this.expectPhase("awaiting_plan");
    this.prompt = prompt;
    this.phase = "planning";
    this.log(
      PLANNER_AGENT,
      "Contacting the planner to create an execution plan...",
      "info",
    );

    try {
      const raw = await this.oracle.complete(
        { user_prompt: prompt },
        "planner",
        true,
      );
      this.plan = validatePlan(raw);
    } catch (error) {
      this.failed = true;
      this.finish();
      this.log(
        SYSTEM_AGENT,
        `${PLANNING_FAILED_PREFIX} Error: ${describeError(error)}`,
        "error",
      );
      return null;
    }

    console.log(`📋 Run ${this.runId} planned ${this.plan.length} step(s)`);
    this.emit({ type: "plan", steps: snapshotSteps(this.plan) });
    return this.plan;
  }

  async run(plan: Plan): Promise<void> {
    if (this.phase === "awaiting_plan") {
      // Plan supplied by the caller rather than generated here.
      this.plan = plan;
    } else {
      this.expectPhase("planning");
    }
    this.phase = "executing";

    for (const [index, step] of plan.entries()) {
      await waitMs(this.options.stepDelayMs);

      const action = interpolate(step.action, this.context, "tolerant");
      step.resolvedAction = action;
      transitionStep(step, "in-progress");
      this.emit({
        type: "status_update",
        stepIndex: index,
        stepAction: action,
        status: step.status,
      });
      this.log(step.agentName, `Starting: ${action}...`, "info");

      const outcome = await this.executor.execute(step, this.context);

      transitionStep(step, outcome.succeeded ? "completed" : "failed");
      this.emit({
        type: "status_update",
        stepIndex: index,
        stepAction: action,
        status: step.status,
      });
      this.log(
        step.agentName,
        outcome.resultMessage,
        outcome.succeeded ? "info" : "error",
      );
    }

    this.finish();
    this.log(SYSTEM_AGENT, RUN_COMPLETED_MESSAGE, "success");
  }

  /**
   * Ends a run whose execution threw instead of completing. Publishes the
   * terminal event so followers stop waiting. No-op once the run is done.
   */
  abort(error: unknown): void {
    if (this.phase === "done") return;
    this.failed = true;
    this.finish();
    this.log(
      SYSTEM_AGENT,
      `${RUN_ABORTED_PREFIX} Error: ${describeError(error)}`,
      "error",
    );
  }

  private finish(): void {
    this.phase = "done";
    this.finishedAt = Date.now();
  }

  private expectPhase(expected: RunPhase): void {
    if (this.phase !== expected) {
      throw new Error(
        `Run ${this.runId} is in phase '${this.phase}', expected '${expected}'`,
      );
    }
  }

  private log(agent: string, message: string, level: LogLevel): void {
    this.emit({ type: "log", agent, message, level });
  }

  private emit(event: RunEventInput): void {
    this.bus.publish({ ...event, runId: this.runId, timestamp: Date.now() });
  }
}
