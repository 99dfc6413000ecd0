/**
 * Load command - fetch the export and replace the destination table
 */

import { Command } from "commander";
import type { LoadCommandOptions } from "../config/types.js";
import type { PipelineConfig } from "../../types/config.js";
import { runPipeline } from "../../lib/pipeline/index.js";
import { buildPipelineConfig, reportCommandError } from "./shared.js";

export function createLoadCommand(): Command {
  return new Command("load")
    .description(
      "Fetch the survey export and load it into a freshly created table",
    )
    .option("--config <path>", "Path to config file (JSON or YAML)")
    .option(
      "--input-path <path>",
      "Read the export from a local file instead of fetching it",
    )
    .option("--url <url>", "Export URL (overrides EXPORT_URL)")
    .option("--delimiter <char>", "Field delimiter of the export")
    .option("--schema <name>", "Destination schema (namespace)")
    .option("--table <name>", "Destination table")
    .option("--report-dir <path>", "Write run-manifest.json to this directory")
    .option(
      "--dry-run",
      "Resolve the column mapping without touching the database",
      false,
    )
    .action(async (options: LoadCommandOptions) => {
      let config: PipelineConfig;
      try {
        config = buildPipelineConfig(options, {
          requireSource: !options.inputPath,
          requireTarget: !options.dryRun,
        });
      } catch (error) {
        process.exitCode = reportCommandError(error, "configuration");
        return;
      }

      const result = await runPipeline(config, {
        inputPath: options.inputPath,
        dryRun: options.dryRun,
        reportDir: options.reportDir,
      });

      if (result.error) {
        process.exitCode = reportCommandError(result.error, result.phase);
        return;
      }

      console.log(
        JSON.stringify(
          {
            status: "success",
            phase: result.phase,
            records: result.records,
            skippedLines: result.skippedLines,
            mapping: result.mapping,
            report: result.report,
            ...(result.manifestPath ? { manifest: result.manifestPath } : {}),
          },
          null,
          2,
        ),
      );
      process.exitCode = result.exitCode;
    });
}
