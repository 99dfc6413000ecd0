/**
 * Pipeline module types
 */

import type {
  CanonicalTable,
  DecodedTable,
  FieldMapping,
  LoadPhase,
  LoadReport,
} from "../../types/data-model.js";
import type { ExitCode, SurveyLoadError } from "../../utils/errors.js";
import type { FetchImpl } from "../fetcher/types.js";
import type { StoreFactory } from "../store/types.js";

/**
 * Collaborators that can be replaced, mainly by tests
 */
export interface PipelineDeps {
  fetchImpl?: FetchImpl;
  openStore?: StoreFactory;
}

export interface PipelineOptions {
  /** Read the export from this file instead of fetching it */
  inputPath?: string;
  /** Stop after resolving the column mapping; the store is never opened */
  dryRun?: boolean;
  /** Write run-manifest.json into this directory */
  reportDir?: string;
}

/**
 * ExportAnalysis - Everything derived from the export before loading
 */
export interface ExportAnalysis {
  decoded: DecodedTable;
  table: CanonicalTable;
  mapping: FieldMapping;
}

export interface PipelineResult {
  status: "success" | "failed";
  exitCode: ExitCode;
  phase: LoadPhase;
  records: number;
  skippedLines: number;
  mapping: FieldMapping | null;
  report: LoadReport | null;
  error?: SurveyLoadError;
  manifestPath?: string;
}
