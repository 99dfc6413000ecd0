/**
 * Resolver module - binds canonical field names to destination roles
 */

import {
  FIELD_ROLES,
  type FieldMapping,
  type FieldRole,
} from "../../types/data-model.js";
import type { ColumnRules, RoleBinding } from "./types.js";
import { DEFAULT_COLUMN_RULES, matchesColumn } from "./rules.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";
export * from "./rules.js";

/**
 * Resolve the field mapping for one run.
 *
 * Fields are tested in column order and the first match wins. Roles are
 * resolved independently, so one column may feed more than one role.
 */
export function resolveFieldMapping(
  fields: readonly string[],
  rules: ColumnRules = DEFAULT_COLUMN_RULES,
): FieldMapping {
  const bind = (role: FieldRole): string | null =>
    fields.find((field) => matchesColumn(field, rules[role])) ?? null;

  const mapping: FieldMapping = Object.freeze({
    submission_start: bind("submission_start"),
    submission_end: bind("submission_end"),
    age_group: bind("age_group"),
    gender: bind("gender"),
    vaccination_status: bind("vaccination_status"),
    healthcare_visits_count: bind("healthcare_visits_count"),
    exercise_frequency: bind("exercise_frequency"),
    water_source: bind("water_source"),
    sleep_hours: bind("sleep_hours"),
    health_insurance: bind("health_insurance"),
  });

  const bindings = describeMapping(mapping);
  const unbound = bindings.filter((binding) => binding.field === null);
  logger.info("Column mapping resolved", {
    bound: bindings.length - unbound.length,
    unbound: unbound.map((binding) => binding.role),
  });

  return mapping;
}

/**
 * List role bindings in destination column order
 */
export function describeMapping(mapping: FieldMapping): RoleBinding[] {
  return FIELD_ROLES.map((role) => ({ role, field: mapping[role] }));
}
