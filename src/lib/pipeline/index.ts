/**
 * Pipeline module - one full replace load from export to verified table
 */

import type { PipelineConfig } from "../../types/config.js";
import type {
  FieldMapping,
  LoadPhase,
  LoadReport,
} from "../../types/data-model.js";
import { fetchExport, readExportFile } from "../fetcher/index.js";
import { decodeTable } from "../decoder/index.js";
import { normalizeTable } from "../normalizer/index.js";
import { resolveFieldMapping } from "../resolver/index.js";
import { RowLoader } from "../loader/index.js";
import { createPgStore } from "../store/pg-store.js";
import type { SqlStore, StoreFactory } from "../store/types.js";
import { RunReporter } from "../reporter/index.js";
import { logger } from "../../utils/logger.js";
import {
  ExitCode,
  StoreConnectionError,
  SurveyLoadError,
  errorMessage,
  exitCodeFor,
  toSurveyLoadError,
} from "../../utils/errors.js";
import type {
  ExportAnalysis,
  PipelineDeps,
  PipelineOptions,
  PipelineResult,
} from "./types.js";

export * from "./types.js";

/**
 * Decode, normalize and resolve the column mapping for an export body
 */
export function analyzeExport(body: string, delimiter: string): ExportAnalysis {
  const decoded = decodeTable(body, delimiter);
  const table = normalizeTable(decoded);
  const mapping = resolveFieldMapping(table.fields);
  return { decoded, table, mapping };
}

async function openStoreOrFail(openStore: StoreFactory): Promise<SqlStore> {
  try {
    return await openStore();
  } catch (error) {
    if (error instanceof SurveyLoadError) throw error;
    throw new StoreConnectionError(
      `Failed to open store: ${errorMessage(error)}`,
      undefined,
      { cause: error },
    );
  }
}

/**
 * Run the pipeline. Never throws: failures come back as a failed result with
 * an exit code.
 */
export async function runPipeline(
  config: PipelineConfig,
  options: PipelineOptions = {},
  deps: PipelineDeps = {},
): Promise<PipelineResult> {
  const reporter = new RunReporter(config.target);
  const openStore =
    deps.openStore ?? (() => createPgStore(config.target));

  let phase: LoadPhase = "idle";
  let mapping: FieldMapping | null = null;
  let report: LoadReport | null = null;
  let records = 0;
  let skippedLines = 0;
  let failure: SurveyLoadError | undefined;

  try {
    const payload = options.inputPath
      ? await readExportFile(options.inputPath)
      : await fetchExport(config.source, deps.fetchImpl);
    reporter.recordSource(payload.location, payload.body);

    const analysis = analyzeExport(payload.body, config.source.delimiter);
    reporter.recordTable(analysis.decoded, analysis.table);
    reporter.recordMapping(analysis.mapping);
    mapping = analysis.mapping;
    records = analysis.table.records.length;
    skippedLines = analysis.decoded.skippedLines;

    if (options.dryRun) {
      logger.info("Dry run: skipping load", { records });
    } else {
      const store = await openStoreOrFail(openStore);
      const loader = new RowLoader(store, config.target, config.load);
      try {
        await loader.prepare();
        const loadReport = await loader.load(analysis.table, analysis.mapping);
        report = loadReport;
        logger.info("Pipeline completed successfully", {
          inserted: loadReport.inserted,
          failed: loadReport.failed,
          verifiedCount: loadReport.verifiedCount,
        });
      } finally {
        phase = loader.phase;
        await store.close().catch((error: unknown) => {
          logger.warn("Closing the store failed", error);
        });
      }
    }
  } catch (error) {
    failure = toSurveyLoadError(error);
    logger.error(`Pipeline failed: ${failure.message}`, failure.details);
  }

  reporter.recordOutcome(phase, report, failure);
  let manifestPath: string | undefined;
  if (options.reportDir) {
    try {
      manifestPath = (await reporter.save(options.reportDir)).path;
    } catch (error) {
      logger.error("Failed to save run manifest", error);
    }
  }

  return {
    status: failure ? "failed" : "success",
    exitCode: failure ? exitCodeFor(failure) : ExitCode.SUCCESS,
    phase,
    records,
    skippedLines,
    mapping,
    report,
    error: failure,
    manifestPath,
  };
}
