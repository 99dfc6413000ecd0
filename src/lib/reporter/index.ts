/**
 * Reporter module - run manifests for auditability
 */

import fs from "fs/promises";
import path from "path";
import crypto from "crypto";
import type {
  CanonicalTable,
  DecodedTable,
  FieldMapping,
  LoadPhase,
  LoadReport,
  RunManifest,
} from "../../types/data-model.js";
import type { TargetConfig } from "../../types/config.js";
import type { SurveyLoadError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { ReporterResult } from "./types.js";

export type { ReporterResult } from "./types.js";

export const TOOL_NAME = "survey-load";
export const TOOL_VERSION = "0.1.0";

/**
 * RunReporter collects what a run did and writes it as run-manifest.json
 */
export class RunReporter {
  private _manifest: RunManifest;

  constructor(target: Pick<TargetConfig, "schema" | "table">) {
    this._manifest = {
      version: "1.0.0",
      tool: {
        name: TOOL_NAME,
        version: TOOL_VERSION,
      },
      run: {
        id: crypto.randomBytes(8).toString("hex"),
        timestamp: new Date().toISOString(),
        status: "failed",
        phase: "idle",
      },
      source: {
        location: "",
        sha256: null,
        records: 0,
        columns: 0,
        skippedLines: 0,
      },
      target: {
        schema: target.schema,
        table: target.table,
      },
      mapping: null,
      report: null,
      error: null,
    };
  }

  /**
   * Calculate SHA-256 hash of the export body
   */
  static hashContent(content: string): string {
    return crypto.createHash("sha256").update(content, "utf8").digest("hex");
  }

  recordSource(location: string, body: string): void {
    this._manifest.source.location = location;
    this._manifest.source.sha256 = RunReporter.hashContent(body);
  }

  recordTable(decoded: DecodedTable, table: CanonicalTable): void {
    this._manifest.source.records = table.records.length;
    this._manifest.source.columns = table.fields.length;
    this._manifest.source.skippedLines = decoded.skippedLines;
  }

  recordMapping(mapping: FieldMapping): void {
    this._manifest.mapping = mapping;
  }

  recordOutcome(
    phase: LoadPhase,
    report: LoadReport | null,
    error?: SurveyLoadError,
  ): void {
    this._manifest.run.phase = phase;
    this._manifest.run.status = error ? "failed" : "success";
    this._manifest.report = report;
    this._manifest.error = error
      ? { code: error.code, message: error.message }
      : null;
  }

  /**
   * Get current manifest
   */
  getManifest(): RunManifest {
    return structuredClone(this._manifest);
  }

  /**
   * Save manifest to JSON file
   */
  async save(outputDir: string): Promise<ReporterResult> {
    await fs.mkdir(outputDir, { recursive: true });
    const manifestPath = path.join(outputDir, "run-manifest.json");
    await fs.writeFile(manifestPath, JSON.stringify(this._manifest, null, 2));
    logger.info("Run manifest saved", { path: manifestPath });
    return { manifest: this.getManifest(), path: manifestPath };
  }
}
