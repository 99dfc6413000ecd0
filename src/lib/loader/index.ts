/**
 * Loader module - row-by-row load with per-row fault isolation
 */

import type {
  CanonicalTable,
  FieldMapping,
  LoadPhase,
  LoadReport,
  RowFailure,
} from "../../types/data-model.js";
import {
  DEFAULT_LOAD_OPTIONS,
  type LoadOptions,
  type TargetConfig,
} from "../../types/config.js";
import type { SqlStore } from "../store/types.js";
import { countRows, insertRowSql, prepareTargetTable } from "../target/index.js";
import { rowParams, transformRecord } from "./transform.js";
import { logger } from "../../utils/logger.js";
import {
  LoadError,
  SurveyLoadError,
  errorMessage,
} from "../../utils/errors.js";

export * from "./transform.js";

const ROW_SAVEPOINT = "survey_load_row";

const TRANSITIONS: Record<LoadPhase, readonly LoadPhase[]> = {
  idle: ["table-prepared", "aborted-fatal"],
  "table-prepared": ["loading", "aborted-fatal"],
  loading: ["committed", "aborted-fatal"],
  committed: ["verified", "aborted-fatal"],
  verified: [],
  "aborted-fatal": [],
};

type TableIdentity = Pick<TargetConfig, "schema" | "table">;

/**
 * Drives one load: table preparation, isolated row inserts, a single commit
 * and a verification count.
 *
 * Each insert runs inside its own savepoint, so a failed row is rolled back
 * alone and the surrounding transaction stays usable.
 */
export class RowLoader {
  private _phase: LoadPhase = "idle";
  private readonly options: LoadOptions;

  constructor(
    private readonly store: SqlStore,
    private readonly target: TableIdentity,
    options: Partial<LoadOptions> = {},
  ) {
    this.options = { ...DEFAULT_LOAD_OPTIONS, ...options };
  }

  get phase(): LoadPhase {
    return this._phase;
  }

  private transition(next: LoadPhase): void {
    if (!TRANSITIONS[this._phase].includes(next)) {
      throw new LoadError(`Invalid load phase transition: ${this._phase} → ${next}`);
    }
    logger.debug("Load phase", { from: this._phase, to: next });
    this._phase = next;
  }

  private abort(): void {
    if (this._phase !== "aborted-fatal" && this._phase !== "verified") {
      this._phase = "aborted-fatal";
    }
  }

  /**
   * Drop and recreate the destination table
   */
  async prepare(): Promise<void> {
    try {
      await prepareTargetTable(this.store, this.target);
    } catch (error) {
      this.abort();
      throw error;
    }
    this.transition("table-prepared");
  }

  /**
   * Load every record of the table, then commit once and count
   */
  async load(table: CanonicalTable, mapping: FieldMapping): Promise<LoadReport> {
    this.transition("loading");

    const startTime = Date.now();
    const total = table.records.length;
    const insertSql = insertRowSql(this.target);
    const failures: RowFailure[] = [];
    let attempted = 0;
    let inserted = 0;
    let failed = 0;

    const recordFailure = (rowIndex: number, message: string) => {
      failed++;
      if (failures.length < this.options.maxReportedErrors) {
        failures.push({ rowIndex, message });
        logger.warn(`Could not insert row ${rowIndex}: ${message}`);
      }
    };

    logger.info(`Inserting ${total} records...`);

    try {
      for (const [rowIndex, record] of table.records.entries()) {
        attempted++;

        const result = transformRecord(record, mapping);
        if (!result.ok) {
          recordFailure(rowIndex, result.reason);
          continue;
        }

        await this.store.execute(`SAVEPOINT ${ROW_SAVEPOINT}`);
        try {
          await this.store.execute(insertSql, rowParams(result.row));
        } catch (error) {
          await this.store.execute(`ROLLBACK TO SAVEPOINT ${ROW_SAVEPOINT}`);
          recordFailure(rowIndex, errorMessage(error));
          continue;
        }
        await this.store.execute(`RELEASE SAVEPOINT ${ROW_SAVEPOINT}`);
        inserted++;

        if (inserted % this.options.progressInterval === 0) {
          logger.info(`Inserted ${inserted}/${total} records...`);
        }
      }

      await this.store.commit();
      this.transition("committed");
      logger.info(`Successfully inserted ${inserted} records`);
      if (failed > 0) {
        logger.warn(`${failed} records failed to insert`);
      }

      const verifiedCount = await countRows(this.store, this.target);
      this.transition("verified");
      logger.info(`Total records in database: ${verifiedCount}`);

      return {
        attempted,
        inserted,
        failed,
        failures,
        verifiedCount,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      const committed = this._phase === "committed";
      this.abort();
      if (!committed) {
        await this.store.rollback().catch((rollbackError: unknown) => {
          logger.warn("Rollback after failed load failed", rollbackError);
        });
      }
      logger.error("Load aborted", error);
      if (error instanceof SurveyLoadError) throw error;
      throw new LoadError(
        `Load aborted after ${attempted} of ${total} rows: ${errorMessage(error)}`,
        { attempted, inserted, failed },
        { cause: error },
      );
    }
  }
}
