/**
 * Destination table definition
 */

import type { FieldRole } from "../../types/data-model.js";

export type TargetColumn =
  | { name: FieldRole; kind: "timestamp" }
  | { name: FieldRole; kind: "varchar"; maxLength: number }
  | { name: FieldRole; kind: "integer" }
  | { name: FieldRole; kind: "decimal"; precision: number; scale: number };

/**
 * Loaded columns in destination order. `id` and `created_at` are filled in by
 * the database and are not listed here.
 */
export const TARGET_COLUMNS: readonly TargetColumn[] = [
  { name: "submission_start", kind: "timestamp" },
  { name: "submission_end", kind: "timestamp" },
  { name: "age_group", kind: "varchar", maxLength: 100 },
  { name: "gender", kind: "varchar", maxLength: 50 },
  { name: "vaccination_status", kind: "varchar", maxLength: 100 },
  { name: "healthcare_visits_count", kind: "integer" },
  { name: "exercise_frequency", kind: "varchar", maxLength: 100 },
  { name: "water_source", kind: "varchar", maxLength: 100 },
  { name: "sleep_hours", kind: "decimal", precision: 5, scale: 2 },
  { name: "health_insurance", kind: "varchar", maxLength: 50 },
];

export const INTEGER_MIN = -2147483648;
export const INTEGER_MAX = 2147483647;

/**
 * SQL type of a column. Numeric columns always receive a value from the
 * loader, so they are NOT NULL.
 */
export function columnDefinition(column: TargetColumn): string {
  switch (column.kind) {
    case "timestamp":
      return "TIMESTAMP";
    case "varchar":
      return `VARCHAR(${column.maxLength})`;
    case "integer":
      return "INTEGER NOT NULL";
    case "decimal":
      return `DECIMAL(${column.precision},${column.scale}) NOT NULL`;
  }
}
