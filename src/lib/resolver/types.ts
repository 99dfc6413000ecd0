/**
 * Resolver module types
 */

import type { FieldRole } from "../../types/data-model.js";

/**
 * ColumnMatcher - How a role recognizes its source column
 *
 * - `exact`: the canonical name must equal this string (case-sensitive)
 * - `anyOf`: at least one alternative must match; an alternative matches when
 *   every one of its keywords occurs in the lower-cased canonical name
 */
export type ColumnMatcher =
  | { kind: "exact"; name: string }
  | { kind: "anyOf"; alternatives: ReadonlyArray<readonly string[]> };

export type ColumnRules = Readonly<Record<FieldRole, ColumnMatcher>>;

export interface RoleBinding {
  role: FieldRole;
  field: string | null;
}
