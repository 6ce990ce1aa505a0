/**
 * Command-line program definition.
 * Commands: run, demo, serve
 */

import { Command } from "commander";
import { runCommand } from "./commands/run.js";
import { demoCommand } from "./commands/demo.js";
import { serveCommand } from "./commands/serve.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("taskscope")
    .description("Profile tasks, blocking calls and event loop lag of async code")
    .version("0.1.0");

  program
    .command("run <module>")
    .description("Profile a module's exported function")
    .option("-e, --export <name>", "Export to call (default: the default export)")
    .option("-b, --backend <name>", "Backend to use (auto, inspector, tasktracker)")
    .option("--json", "Output stats as JSON")
    .action(async (modulePath, options) => {
      await runCommand(modulePath, options);
    });

  program
    .command("demo")
    .description("Profile the built-in scenarios")
    .option("-s, --scenario <name>", "Run one scenario (basic, mixed, blocking, lag, nested)")
    .option("-b, --backend <name>", "Backend to use (auto, inspector, tasktracker)")
    .option("--json", "Output stats as JSON")
    .action(async (options) => {
      await demoCommand(options);
    });

  program
    .command("serve")
    .description("Start the demo server with per-request profiling")
    .option("-p, --port <port>", "Port to listen on", "4300")
    .action(async (options) => {
      await serveCommand(options);
    });

  return program;
}
