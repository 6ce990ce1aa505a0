/**
 * Library surface of @taskscope/cli.
 */

export { createProgram } from "./program.js";
export { runCommand, type RunCommandOptions } from "./commands/run.js";
export { demoCommand, type DemoCommandOptions } from "./commands/demo.js";
export { serveCommand, type ServeCommandOptions } from "./commands/serve.js";
export { formatReport, formatMs, formatLocation } from "./report/format.js";
