#!/usr/bin/env node
import { program } from "commander";
import chalk from "chalk";

import { runCommand } from "./commands/run.js";
import { serveCommand } from "./commands/serve.js";

program
  .name("conductor")
  .description(chalk.cyan("🎼 Conductor task automation CLI"))
  .version("0.1.0");

program
  .command("serve")
  .description("Start the gateway (HTTP API and event WebSocket)")
  .option("-p, --port <port>", "Port to listen on")
  .option("-H, --host <host>", "Host to bind")
  .action(serveCommand);

// Quick actions
program
  .command("run <prompt>")
  .description("Submit a task and follow its progress")
  .option("-p, --port <port>", "Gateway port")
  .option("-H, --host <host>", "Gateway host")
  .option("-t, --timeout <ms>", "Give up after this many milliseconds")
  .action(runCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(
    chalk.red("Error:"),
    error instanceof Error ? error.message : String(error),
  );
  process.exit(1);
});
