#!/usr/bin/env node
/**
 * @taskscope/cli
 *
 * CLI entry point.
 */

import { createProgram } from "./program.js";

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error("taskscope failed:", error);
    process.exit(1);
  });
