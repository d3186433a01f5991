#!/usr/bin/env node

/**
 * log-analyzer CLI - per-URL response time reports from nginx access logs
 */

import { Command } from "commander";
import { createAnalyzeCommand } from "./commands/analyze.js";
import { createLatestCommand } from "./commands/latest.js";
import { logger } from "../utils/logger.js";

const pkg = {
  name: "log-analyzer",
  version: "0.1.0",
  description: "Per-URL response time reports from nginx access logs",
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version);

  program.addCommand(createAnalyzeCommand(), { isDefault: true });
  program.addCommand(createLatestCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message,
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});
