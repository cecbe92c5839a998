import { randomUUID } from "crypto";
import {
  describeError,
  type CompletionOracle,
} from "../../agent/src/index.js";
import type { EventBus } from "../../runtime/src/event-bus.js";
import type { RunEvent } from "../../runtime/src/events.js";
import type { StepExecutor } from "../../runtime/src/executor.js";
import {
  PlanOrchestrator,
  type RunSnapshot,
} from "../../runtime/src/orchestrator.js";

export interface TaskServiceConfig {
  stepDelayMs: number;
  /** Finished runs beyond this count are forgotten with their events, oldest first. */
  maxRuns?: number;
  createRunId?: () => string;
}

/**
 * Entry point for plan submission. Each submission gets its own
 * orchestrator (and so its own context); the caller only receives the
 * run id and follows progress on the event bus.
 */
export class TaskService {
  private readonly runs = new Map<string, PlanOrchestrator>();
  private readonly events = new Map<string, RunEvent[]>();
  private readonly pending = new Set<Promise<void>>();
  private readonly maxRuns: number;
  private readonly createRunId: () => string;

  constructor(
    private readonly oracle: CompletionOracle,
    private readonly executor: StepExecutor,
    private readonly bus: EventBus<RunEvent>,
    private readonly config: TaskServiceConfig,
  ) {
    this.maxRuns = config.maxRuns ?? 100;
    this.createRunId = config.createRunId ?? randomUUID;
  }

  submit(prompt: string): string {
    const runId = this.createRunId();
    const recorded: RunEvent[] = [];
    const orchestrator = new PlanOrchestrator(
      runId,
      this.oracle,
      this.executor,
      {
        publish: (event) => {
          recorded.push(event);
          this.bus.publish(event);
        },
      },
      { stepDelayMs: this.config.stepDelayMs },
    );
    this.runs.set(runId, orchestrator);
    this.events.set(runId, recorded);
    this.evictFinishedRuns();

    console.log(`📨 Received task ${runId}: ${prompt}`);
    const execution: Promise<void> = orchestrator
      .execute(prompt)
      .catch((error: unknown) => {
        console.error(`❌ Run ${runId} crashed: ${describeError(error)}`);
        orchestrator.abort(error);
      })
      .finally(() => {
        this.pending.delete(execution);
      });
    this.pending.add(execution);

    return runId;
  }

  getRun(runId: string): RunSnapshot | undefined {
    return this.runs.get(runId)?.snapshot();
  }

  /** Every event of a retained run, in publish order. */
  getEvents(runId: string): RunEvent[] | undefined {
    const events = this.events.get(runId);
    return events ? [...events] : undefined;
  }

  listRuns(): RunSnapshot[] {
    return [...this.runs.values()].map((run) => run.snapshot());
  }

  getActiveRunCount(): number {
    return this.pending.size;
  }

  /** Resolves once every run submitted so far has finished. */
  async drain(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  private evictFinishedRuns(): void {
    for (const [runId, run] of this.runs) {
      if (this.runs.size <= this.maxRuns) return;
      if (run.getPhase() === "done") {
        this.runs.delete(runId);
        this.events.delete(runId);
      }
    }
  }
}
