/**
 * Inspect command - show how an export would be mapped, without loading it
 */

import { Command } from "commander";
import type { InspectCommandOptions } from "../config/types.js";
import { fetchExport, readExportFile } from "../../lib/fetcher/index.js";
import { analyzeExport } from "../../lib/pipeline/index.js";
import { canonicalFieldName } from "../../lib/normalizer/index.js";
import { describeMapping } from "../../lib/resolver/index.js";
import { ExitCode } from "../../utils/errors.js";
import { buildPipelineConfig, reportCommandError } from "./shared.js";

export function createInspectCommand(): Command {
  return new Command("inspect")
    .description("Decode the export and print its canonical fields and column mapping")
    .option("--config <path>", "Path to config file (JSON or YAML)")
    .option(
      "--input-path <path>",
      "Read the export from a local file instead of fetching it",
    )
    .option("--url <url>", "Export URL (overrides EXPORT_URL)")
    .option("--delimiter <char>", "Field delimiter of the export")
    .action(async (options: InspectCommandOptions) => {
      try {
        const config = buildPipelineConfig(options, {
          requireSource: !options.inputPath,
          requireTarget: false,
        });

        const payload = options.inputPath
          ? await readExportFile(options.inputPath)
          : await fetchExport(config.source);
        const { decoded, table, mapping } = analyzeExport(
          payload.body,
          config.source.delimiter,
        );

        console.log(
          JSON.stringify(
            {
              status: "success",
              phase: "inspection",
              source: payload.location,
              records: table.records.length,
              skippedLines: decoded.skippedLines,
              fields: decoded.headers.map((raw) => ({
                raw,
                canonical: canonicalFieldName(raw),
              })),
              collisions: table.collisions,
              mapping: describeMapping(mapping),
            },
            null,
            2,
          ),
        );
        process.exitCode = ExitCode.SUCCESS;
      } catch (error) {
        process.exitCode = reportCommandError(error, "inspection");
      }
    });
}
