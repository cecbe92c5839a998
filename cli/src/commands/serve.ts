import chalk from "chalk";
import { start } from "../../../gateway/src/index.js";

export interface ServeCommandOptions {
  host?: string;
  port?: string;
}

export async function serveCommand(options: ServeCommandOptions) {
  const port = Number.parseInt(options.port || "", 10);
  try {
    await start({
      host: options.host,
      port: Number.isFinite(port) && port > 0 ? port : undefined,
    });
  } catch (error) {
    console.error(
      chalk.red("Failed to start gateway:"),
      error instanceof Error ? error.message : String(error),
    );
    process.exit(1);
  }
}
