/**
 * Keyword rules that bind survey questions to destination columns
 */

import type { ColumnMatcher, ColumnRules } from "./types.js";

function keywords(...alternatives: string[][]): ColumnMatcher {
  return { kind: "anyOf", alternatives };
}

export const DEFAULT_COLUMN_RULES: ColumnRules = {
  submission_start: { kind: "exact", name: "start" },
  submission_end: { kind: "exact", name: "end" },
  age_group: keywords(["age", "group"]),
  gender: keywords(["gender"]),
  vaccination_status: keywords(["vaccin"]),
  healthcare_visits_count: keywords(["healthcare"], ["visit"]),
  exercise_frequency: keywords(["exercise"], ["physical"]),
  water_source: keywords(["water"], ["drinking"]),
  sleep_hours: keywords(["sleep"], ["hour"]),
  health_insurance: keywords(["insurance"], ["coverage"]),
};

/**
 * Test a canonical field name against a matcher
 */
export function matchesColumn(field: string, matcher: ColumnMatcher): boolean {
  if (matcher.kind === "exact") {
    return field === matcher.name;
  }
  const lowered = field.toLowerCase();
  return matcher.alternatives.some((alternative) =>
    alternative.every((keyword) => lowered.includes(keyword.toLowerCase())),
  );
}
