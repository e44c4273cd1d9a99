#!/usr/bin/env node

/**
 * crewline command-line entry point
 */

import { Command } from "commander";
import pc from "picocolors";
import { createConfigCommand } from "./commands/config.js";
import { createResultsCommand } from "./commands/results.js";
import { createRunCommand } from "./commands/run.js";
import { createTemplatesCommand } from "./commands/templates.js";
import { createWorkerCommand } from "./commands/worker.js";
import { CrewlineError } from "../types/errors.js";
import { logger } from "../utils/logger.js";

const VERSION = "0.1.0";

async function main(): Promise<void> {
  const program = new Command()
    .name("crewline")
    .description("Coordinate LLM-backed agents through workflow DAGs with cost-aware provider routing")
    .version(VERSION, "-v, --version");

  program.addCommand(createRunCommand());
  program.addCommand(createResultsCommand());
  program.addCommand(createTemplatesCommand());
  program.addCommand(createConfigCommand());
  program.addCommand(createWorkerCommand());

  try {
    await program.parseAsync(process.argv);
  } catch (error: unknown) {
    const message = error instanceof CrewlineError ? error.userMessage : error instanceof Error ? error.message : String(error);
    logger.error({ error: error instanceof Error ? error.message : String(error) }, "CLI error");
    process.stderr.write(pc.red(`Error: ${message}\n`));
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  process.stderr.write(
    pc.red(`Fatal error: ${error instanceof Error ? error.message : String(error)}\n`),
  );
  process.exit(1);
});
