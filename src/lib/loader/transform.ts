/**
 * Record → destination row transformation
 */

import type {
  CanonicalRecord,
  FieldMapping,
  FieldRole,
  FieldValue,
  RowResult,
  TargetRow,
} from "../../types/data-model.js";
import {
  SubmissionTimestamp,
  parseSubmissionTimestamp,
} from "../normalizer/timestamps.js";
import {
  INTEGER_MAX,
  INTEGER_MIN,
  TARGET_COLUMNS,
  type TargetColumn,
} from "../target/schema.js";

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a plain decimal number ("3", "-2.5", "1e2"). Anything else,
 * including "N/A", hex and infinities, yields null.
 */
export function parseDecimal(value: FieldValue): number | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function valueFor(
  record: CanonicalRecord,
  mapping: FieldMapping,
  role: FieldRole,
): FieldValue {
  const field = mapping[role];
  if (field === null) return null;
  return record.get(field) ?? null;
}

function asText(value: FieldValue): string | null {
  if (value === null) return null;
  return value instanceof SubmissionTimestamp ? value.toString() : value;
}

function asTimestamp(value: FieldValue): SubmissionTimestamp | null {
  if (value === null || value instanceof SubmissionTimestamp) return value;
  return parseSubmissionTimestamp(value);
}

/**
 * Build a destination row. Unbound or empty text roles become null and
 * unparseable numbers become 0; this never fails.
 */
export function buildTargetRow(
  record: CanonicalRecord,
  mapping: FieldMapping,
): TargetRow {
  const text = (role: FieldRole) => asText(valueFor(record, mapping, role));
  const visits = parseDecimal(
    valueFor(record, mapping, "healthcare_visits_count"),
  );
  const sleep = parseDecimal(valueFor(record, mapping, "sleep_hours"));

  return {
    submission_start: asTimestamp(
      valueFor(record, mapping, "submission_start"),
    ),
    submission_end: asTimestamp(valueFor(record, mapping, "submission_end")),
    age_group: text("age_group"),
    gender: text("gender"),
    vaccination_status: text("vaccination_status"),
    // Math.trunc(-0.5) is -0; `|| 0` folds it back to 0
    healthcare_visits_count: visits === null ? 0 : Math.trunc(visits) || 0,
    exercise_frequency: text("exercise_frequency"),
    water_source: text("water_source"),
    sleep_hours: sleep ?? 0,
    health_insurance: text("health_insurance"),
  };
}

function checkColumn(column: TargetColumn, value: unknown): string | null {
  switch (column.kind) {
    case "varchar": {
      if (typeof value !== "string") return null;
      const length = [...value].length;
      return length > column.maxLength
        ? `${column.name} is ${length} characters, limit is VARCHAR(${column.maxLength})`
        : null;
    }
    case "integer":
      return typeof value === "number" &&
        (value < INTEGER_MIN || value > INTEGER_MAX)
        ? `${column.name} value ${value} is out of INTEGER range`
        : null;
    case "decimal": {
      if (typeof value !== "number") return null;
      const factor = 10 ** column.scale;
      const rounded = Math.round(Math.abs(value) * factor) / factor;
      return rounded >= 10 ** (column.precision - column.scale)
        ? `${column.name} value ${value} does not fit DECIMAL(${column.precision},${column.scale})`
        : null;
    }
    case "timestamp":
      return null;
  }
}

/**
 * Find the first column whose value the destination would reject
 */
export function checkTargetRow(row: TargetRow): string | null {
  for (const column of TARGET_COLUMNS) {
    const violation = checkColumn(column, row[column.name]);
    if (violation !== null) return violation;
  }
  return null;
}

/**
 * Transform one canonical record into a row result
 */
export function transformRecord(
  record: CanonicalRecord,
  mapping: FieldMapping,
): RowResult {
  const row = buildTargetRow(record, mapping);
  const violation = checkTargetRow(row);
  return violation === null
    ? { ok: true, row }
    : { ok: false, reason: violation };
}

/**
 * Positional insert parameters, in TARGET_COLUMNS order
 */
export function rowParams(row: TargetRow): unknown[] {
  return TARGET_COLUMNS.map((column) => row[column.name]);
}
