/**
 * Target module - prepares the destination table for a full replace load
 */

import type { TargetConfig } from "../../types/config.js";
import type { SqlStore } from "../store/types.js";
import { logger } from "../../utils/logger.js";
import {
  LoadError,
  TablePreparationError,
  errorMessage,
} from "../../utils/errors.js";
import {
  countRowsSql,
  createSchemaSql,
  createTableSql,
  dropTableSql,
  qualifiedTableName,
} from "./sql.js";

export * from "./schema.js";
export * from "./sql.js";

type TableIdentity = Pick<TargetConfig, "schema" | "table">;

/**
 * Ensure the schema exists, drop any previous table and create it afresh.
 * Committed on its own, before any row is loaded.
 *
 * @throws TablePreparationError on any failure; the run cannot continue
 */
export async function prepareTargetTable(
  store: SqlStore,
  target: TableIdentity,
): Promise<void> {
  const tableName = qualifiedTableName(target);
  try {
    await store.execute(createSchemaSql(target));
    logger.info(`Schema "${target.schema}" ready`);

    await store.execute(dropTableSql(target));
    await store.execute(createTableSql(target));
    await store.commit();
    logger.info(`Table ${tableName} created`);
  } catch (error) {
    logger.error("Table preparation failed", error);
    await store.rollback().catch((rollbackError: unknown) => {
      logger.warn("Rollback after failed table preparation failed", rollbackError);
    });
    throw new TablePreparationError(
      `Failed to prepare table ${tableName}: ${errorMessage(error)}`,
      { schema: target.schema, table: target.table },
      { cause: error },
    );
  }
}

/**
 * Read back the number of rows in the destination table
 */
export async function countRows(
  store: SqlStore,
  target: TableIdentity,
): Promise<number> {
  const result = await store.execute(countRowsSql(target));
  const count = Number(result.rows[0]?.count);
  if (!Number.isInteger(count)) {
    throw new LoadError("Row count query returned no usable count", {
      table: qualifiedTableName(target),
    });
  }
  return count;
}
