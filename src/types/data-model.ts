/**
 * Core data model types for survey-load
 * These structures flow through the pipeline: fetch → decode → normalize → resolve → load → verify
 */

import type { SubmissionTimestamp } from "../lib/normalizer/timestamps.js";

/**
 * RawRecord - One survey submission as decoded from the export, keyed by the
 * raw source field name in column order. Empty cells are empty strings.
 */
export type RawRecord = ReadonlyMap<string, string>;

/**
 * DecodedTable - Output of the tabular decoder
 */
export interface DecodedTable {
  headers: string[];
  records: RawRecord[];
  skippedLines: number; // Data lines dropped: wrong field count or unterminated quote
}

/**
 * FieldValue - A normalized cell. `null` is the missing marker: an empty cell,
 * or a submission timestamp that could not be parsed.
 */
export type FieldValue = string | SubmissionTimestamp | null;

export type CanonicalRecord = ReadonlyMap<string, FieldValue>;

/**
 * CanonicalCollision - A raw column dropped because an earlier column already
 * produced the same canonical name
 */
export interface CanonicalCollision {
  canonical: string;
  kept: string; // Raw name of the column that won
  dropped: string;
}

/**
 * CanonicalTable - Decoded records re-keyed by canonical field name
 */
export interface CanonicalTable {
  fields: string[]; // Canonical names, source column order
  records: CanonicalRecord[];
  collisions: CanonicalCollision[];
}

/**
 * Logical roles of the destination table, in destination column order
 */
export const FIELD_ROLES = [
  "submission_start",
  "submission_end",
  "age_group",
  "gender",
  "vaccination_status",
  "healthcare_visits_count",
  "exercise_frequency",
  "water_source",
  "sleep_hours",
  "health_insurance",
] as const;

export type FieldRole = (typeof FIELD_ROLES)[number];

/**
 * FieldMapping - Role → canonical field name, or null when no column matched.
 * Computed once per run and frozen.
 */
export type FieldMapping = Readonly<Record<FieldRole, string | null>>;

/**
 * TargetRow - Storage-ready values for one destination row
 */
export interface TargetRow {
  submission_start: SubmissionTimestamp | null;
  submission_end: SubmissionTimestamp | null;
  age_group: string | null;
  gender: string | null;
  vaccination_status: string | null;
  healthcare_visits_count: number;
  exercise_frequency: string | null;
  water_source: string | null;
  sleep_hours: number;
  health_insurance: string | null;
}

/**
 * RowResult - Outcome of transforming one record
 */
export type RowResult =
  | { ok: true; row: TargetRow }
  | { ok: false; reason: string };

/**
 * RowFailure - A row that could not be built or written
 */
export interface RowFailure {
  rowIndex: number; // 0-based position among decoded records
  message: string;
}

/**
 * LoadReport - Outcome of the load phase
 */
export interface LoadReport {
  attempted: number;
  inserted: number;
  failed: number;
  failures: RowFailure[]; // Only the first few, see LoadOptions.maxReportedErrors
  verifiedCount: number; // Row count read back after commit
  durationMs: number;
}

/**
 * LoadPhase - States of the load phase
 *
 * idle → table-prepared → loading → committed → verified
 * Any non-row error after idle ends in aborted-fatal.
 */
export type LoadPhase =
  | "idle"
  | "table-prepared"
  | "loading"
  | "committed"
  | "verified"
  | "aborted-fatal";

/**
 * RunManifest - Record of a single run, written next to other run artifacts
 */
export interface RunManifest {
  version: string;
  tool: {
    name: string;
    version: string;
  };
  run: {
    id: string;
    timestamp: string;
    status: "success" | "failed";
    phase: LoadPhase;
  };
  source: {
    location: string;
    sha256: string | null;
    records: number;
    columns: number;
    skippedLines: number;
  };
  target: {
    schema: string;
    table: string;
  };
  mapping: FieldMapping | null;
  report: LoadReport | null;
  error: { code: string; message: string } | null;
}
