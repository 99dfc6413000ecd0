/**
 * SQL text for the destination table
 */

import type { TargetConfig } from "../../types/config.js";
import { TARGET_COLUMNS, columnDefinition } from "./schema.js";

type TableIdentity = Pick<TargetConfig, "schema" | "table">;

export function quoteIdentifier(name: string): string {
  return `"${name.replaceAll('"', '""')}"`;
}

export function qualifiedTableName(target: TableIdentity): string {
  return `${quoteIdentifier(target.schema)}.${quoteIdentifier(target.table)}`;
}

export function createSchemaSql(target: TableIdentity): string {
  return `CREATE SCHEMA IF NOT EXISTS ${quoteIdentifier(target.schema)}`;
}

export function dropTableSql(target: TableIdentity): string {
  return `DROP TABLE IF EXISTS ${qualifiedTableName(target)}`;
}

export function createTableSql(target: TableIdentity): string {
  const columns = [
    "id INTEGER GENERATED ALWAYS AS IDENTITY PRIMARY KEY",
    ...TARGET_COLUMNS.map(
      (column) => `${column.name} ${columnDefinition(column)}`,
    ),
    "created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP",
  ];
  return `CREATE TABLE ${qualifiedTableName(target)} (\n  ${columns.join(",\n  ")}\n)`;
}

export function insertRowSql(target: TableIdentity): string {
  const names = TARGET_COLUMNS.map((column) => column.name);
  const placeholders = names.map((_, index) => `$${index + 1}`);
  return `INSERT INTO ${qualifiedTableName(target)} (${names.join(", ")}) VALUES (${placeholders.join(", ")})`;
}

export function countRowsSql(target: TableIdentity): string {
  return `SELECT COUNT(*) AS count FROM ${qualifiedTableName(target)}`;
}
