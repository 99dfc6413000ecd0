#!/usr/bin/env node

/**
 * survey-load CLI - survey export → PostgreSQL full replace load
 */

import "dotenv/config";
import { Command } from "commander";
import { createLoadCommand } from "./commands/load.js";
import { createInspectCommand } from "./commands/inspect.js";
import { applyLogLevel, reportCommandError } from "./commands/shared.js";
import { logger } from "../utils/logger.js";
import { TOOL_NAME, TOOL_VERSION } from "../lib/reporter/index.js";
import { SurveyLoadError, errorMessage } from "../utils/errors.js";

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(TOOL_NAME)
    .description(
      "Load a survey export into PostgreSQL, mapping questions onto a fixed schema",
    )
    .version(TOOL_VERSION)
    .option(
      "--log-level <level>",
      "Logging verbosity: error, warn, info, debug",
    )
    .hook("preAction", (command) => {
      applyLogLevel(command.opts<{ logLevel?: string }>().logLevel);
    });

  program.addCommand(createLoadCommand());
  program.addCommand(createInspectCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (error instanceof SurveyLoadError) {
    process.exit(reportCommandError(error, "configuration"));
  }
  logger.error("Unexpected error", { error: errorMessage(error) });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message: errorMessage(error),
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});
