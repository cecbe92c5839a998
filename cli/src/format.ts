import chalk from "chalk";
import { z } from "zod";
import type { RunEvent } from "../../runtime/src/events.js";

const stepStatusSchema = z.enum(["pending", "in-progress", "completed", "failed"]);

const eventBase = {
  runId: z.string(),
  timestamp: z.number(),
};

const runEventSchema = z.discriminatedUnion("type", [
  z.object({
    ...eventBase,
    type: z.literal("log"),
    agent: z.string(),
    message: z.string(),
    level: z.enum(["info", "error", "success"]),
  }),
  z.object({
    ...eventBase,
    type: z.literal("plan"),
    steps: z.array(
      z.object({
        index: z.number(),
        agent: z.string(),
        action: z.string(),
        status: stepStatusSchema,
      }),
    ),
  }),
  z.object({
    ...eventBase,
    type: z.literal("status_update"),
    stepIndex: z.number(),
    stepAction: z.string(),
    status: stepStatusSchema,
  }),
]);

export const submitResponseSchema = z.object({
  status: z.string(),
  taskId: z.string(),
});

/**
 * Parses one WebSocket frame from the gateway. Frames that are not run
 * events (pongs, errors, anything malformed) yield null.
 */
export function parseRunEvent(raw: string): RunEvent | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = runEventSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}

const LEVEL_ICONS = {
  info: "ℹ️ ",
  error: "❌",
  success: "✅",
} as const;

export function formatEvent(event: RunEvent): string {
  switch (event.type) {
    case "log": {
      const agent = chalk.gray(`[${event.agent}]`);
      const message =
        event.level === "error"
          ? chalk.red(event.message)
          : event.level === "success"
            ? chalk.green(event.message)
            : event.message;
      return `${LEVEL_ICONS[event.level]} ${agent} ${message}`;
    }
    case "plan": {
      const lines = event.steps.map(
        (step) =>
          `   ${step.index + 1}. ${chalk.cyan(`[${step.agent}]`)} ${step.action}`,
      );
      return [chalk.bold(`📋 Plan (${event.steps.length} steps)`), ...lines].join(
        "\n",
      );
    }
    case "status_update":
      return `🔄 Step ${event.stepIndex + 1} ${colorStatus(event.status)}: ${event.stepAction}`;
  }
}

function colorStatus(status: z.infer<typeof stepStatusSchema>): string {
  switch (status) {
    case "completed":
      return chalk.green(status);
    case "failed":
      return chalk.red(status);
    case "in-progress":
      return chalk.yellow(status);
    default:
      return chalk.gray(status);
  }
}
