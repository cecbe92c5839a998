import { appendFileSync, existsSync, mkdirSync } from "fs";
import { join } from "path";
import type { RunEvent } from "../../runtime/src/events.js";

/**
 * Appends every run event to a log file.
 * Default location: ~/.conductor/runs.log
 */
export class RunLogger {
  readonly logPath: string;

  constructor(logDir: string) {
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
    this.logPath = join(logDir, "runs.log");
  }

  logEvent(event: RunEvent): void {
    this.write(formatLogLine(event));
  }

  private write(content: string): void {
    try {
      appendFileSync(this.logPath, content + "\n", "utf-8");
    } catch (error) {
      console.error(`⚠️ Could not write ${this.logPath}:`, error);
    }
  }
}

export function formatLogLine(event: RunEvent): string {
  const timestamp = new Date(event.timestamp).toISOString();
  const run = event.runId.slice(0, 8);

  switch (event.type) {
    case "log":
      return `[${timestamp}] ${run} ${levelIcon(event.level)} ${event.agent} | ${event.message}`;
    case "plan":
      return `[${timestamp}] ${run} 📋 PLAN | ${event.steps.length} steps:\n${event.steps
        .map((step) => `    ${step.index + 1}. [${step.agent}] ${step.action}`)
        .join("\n")}`;
    case "status_update":
      return `[${timestamp}] ${run} 🔄 STEP ${event.stepIndex + 1} ${event.status.toUpperCase()} | ${event.stepAction}`;
  }
}

function levelIcon(level: "info" | "error" | "success"): string {
  switch (level) {
    case "info":
      return "ℹ️";
    case "error":
      return "❌";
    case "success":
      return "✅";
  }
}
