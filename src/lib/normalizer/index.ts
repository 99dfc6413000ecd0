/**
 * Normalizer module - rewrites raw column names to canonical names and
 * coerces submission timestamps
 */

import type {
  CanonicalCollision,
  CanonicalRecord,
  CanonicalTable,
  DecodedTable,
  FieldValue,
  RawRecord,
} from "../../types/data-model.js";
import { canonicalFieldName } from "./field-names.js";
import { parseSubmissionTimestamp } from "./timestamps.js";
import { logger } from "../../utils/logger.js";

export * from "./field-names.js";
export * from "./timestamps.js";

export const SUBMISSION_TIMESTAMP_FIELDS: readonly string[] = ["start", "end"];

interface ColumnPlan {
  raw: string;
  canonical: string;
  isTimestamp: boolean;
}

/**
 * Decide which raw column feeds each canonical field. When two raw names
 * normalize to the same canonical name, the first column keeps it.
 */
function planColumns(headers: string[]): {
  plan: ColumnPlan[];
  collisions: CanonicalCollision[];
} {
  const plan: ColumnPlan[] = [];
  const collisions: CanonicalCollision[] = [];
  const owners = new Map<string, string>();

  for (const raw of headers) {
    const canonical = canonicalFieldName(raw);
    const owner = owners.get(canonical);
    if (owner !== undefined) {
      collisions.push({ canonical, kept: owner, dropped: raw });
      continue;
    }
    owners.set(canonical, raw);
    plan.push({
      raw,
      canonical,
      isTimestamp: SUBMISSION_TIMESTAMP_FIELDS.includes(canonical),
    });
  }

  return { plan, collisions };
}

function normalizeRecord(
  record: RawRecord,
  plan: ColumnPlan[],
): CanonicalRecord {
  const normalized = new Map<string, FieldValue>();
  for (const column of plan) {
    const value = record.get(column.raw) ?? "";
    if (column.isTimestamp) {
      normalized.set(column.canonical, parseSubmissionTimestamp(value));
    } else {
      normalized.set(column.canonical, value === "" ? null : value);
    }
  }
  return normalized;
}

/**
 * Normalize a decoded table
 */
export function normalizeTable(decoded: DecodedTable): CanonicalTable {
  const { plan, collisions } = planColumns(decoded.headers);

  for (const collision of collisions) {
    logger.warn("Column dropped: canonical name already taken", collision);
  }

  const records = decoded.records.map((record) =>
    normalizeRecord(record, plan),
  );

  logger.info("Normalization complete", {
    records: records.length,
    fields: plan.length,
    collisions: collisions.length,
  });

  return {
    fields: plan.map((column) => column.canonical),
    records,
    collisions,
  };
}
