import chalk from "chalk";
import ora from "ora";
import WebSocket from "ws";
import { loadRuntimeConfig } from "../../../runtime/src/config.js";
import {
  isTerminalEvent,
  RUN_ABORTED_PREFIX,
  RUN_COMPLETED_MESSAGE,
  type RunEvent,
} from "../../../runtime/src/events.js";
import { formatEvent, parseRunEvent, submitResponseSchema } from "../format.js";

export interface RunCommandOptions {
  host?: string;
  port?: string;
  timeout?: string;
}

const DEFAULT_TIMEOUT_MS = 120_000;

export async function runCommand(prompt: string, options: RunCommandOptions) {
  console.log(chalk.cyan(`\n🚀 Executing: ${prompt}\n`));

  const config = loadRuntimeConfig();
  const host = options.host || config.gateway.host;
  const port = options.port || String(config.gateway.port);
  const timeoutMs =
    Number.parseInt(options.timeout || "", 10) || DEFAULT_TIMEOUT_MS;

  const spinner = ora("Submitting task to gateway...").start();

  try {
    const taskId = await submitTask(`http://${host}:${port}`, prompt);
    spinner.text = `Waiting for events (task ${taskId})...`;

    // The gateway replays the run's history on connect
    const ws = new WebSocket(
      `ws://${host}:${port}/ws?runId=${encodeURIComponent(taskId)}`,
    );

    let failedSteps = 0;
    const terminal = await followRun(ws, timeoutMs, (event) => {
      if (event.type === "status_update" && event.status === "failed") {
        failedSteps += 1;
      }
      spinner.clear();
      console.log(formatEvent(event));
      spinner.render();
    });
    ws.removeAllListeners("close");
    ws.close();

    const completed =
      terminal.type === "log" && terminal.message === RUN_COMPLETED_MESSAGE;
    if (!completed) {
      spinner.fail(
        terminal.type === "log" && terminal.message.startsWith(RUN_ABORTED_PREFIX)
          ? "Task aborted"
          : "Planning failed",
      );
      process.exit(1);
    }
    if (failedSteps > 0) {
      spinner.warn(`Task finished with ${failedSteps} failed step(s)`);
      process.exit(1);
    }
    spinner.succeed("Task completed");
  } catch (error) {
    spinner.fail("Task failed");
    console.error(
      chalk.red("\nError:"),
      error instanceof Error ? error.message : String(error),
    );
    console.log(chalk.gray("\nMake sure the gateway is running:"));
    console.log(chalk.gray("  conductor serve\n"));
    process.exit(1);
  }
}

async function submitTask(baseUrl: string, prompt: string): Promise<string> {
  const response = await fetch(`${baseUrl}/api/tasks`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify({ prompt }),
  });
  if (!response.ok) {
    throw new Error(
      `Gateway responded with HTTP ${response.status}: ${await response.text()}`,
    );
  }
  return submitResponseSchema.parse(await response.json()).taskId;
}

/**
 * Hands every event of the run to `onEvent` and resolves with the
 * terminal one.
 */
function followRun(
  ws: WebSocket,
  timeoutMs: number,
  onEvent: (event: RunEvent) => void,
): Promise<RunEvent> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`Execution timeout after ${timeoutMs}ms`));
    }, timeoutMs);

    ws.on("message", (data) => {
      const event = parseRunEvent(data.toString());
      if (!event) return;
      onEvent(event);
      if (isTerminalEvent(event)) {
        clearTimeout(timer);
        resolve(event);
      }
    });

    ws.on("error", (error) => {
      clearTimeout(timer);
      reject(error);
    });

    ws.on("close", () => {
      clearTimeout(timer);
      reject(new Error("Connection closed before the task finished"));
    });
  });
}
