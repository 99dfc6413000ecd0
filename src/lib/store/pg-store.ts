import pg from "pg";
import type { Client } from "pg";
import type { TargetConfig } from "../../types/config.js";
import { logger } from "../../utils/logger.js";
import { StoreConnectionError, errorMessage } from "../../utils/errors.js";
import type { SqlResult, SqlStore } from "./types.js";

/**
 * PostgreSQL store backed by a single client connection
 */
export class PgStore implements SqlStore {
  private client: Client;
  private inTransaction = false;
  private connected = false;

  constructor(private readonly config: TargetConfig) {
    this.client = new pg.Client({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      statement_timeout: config.statementTimeoutMs,
      connectionTimeoutMillis: config.connectionTimeoutMs,
    });
  }

  /**
   * Open the connection
   */
  async connect(): Promise<void> {
    try {
      logger.info("Connecting to PostgreSQL", {
        host: this.config.host,
        port: this.config.port,
        database: this.config.database,
      });
      await this.client.connect();
      this.connected = true;
      logger.info("Connected to PostgreSQL");
    } catch (error) {
      logger.error("PostgreSQL connection failed", error);
      throw new StoreConnectionError(
        `Failed to connect to PostgreSQL: ${errorMessage(error)}`,
        { host: this.config.host, database: this.config.database },
        { cause: error },
      );
    }
  }

  async execute(
    sql: string,
    params: readonly unknown[] = [],
  ): Promise<SqlResult> {
    if (!this.inTransaction) {
      await this.client.query("BEGIN");
      this.inTransaction = true;
    }
    const result = await this.client.query(sql, [...params]);
    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
  }

  async commit(): Promise<void> {
    if (!this.inTransaction) return;
    await this.client.query("COMMIT");
    this.inTransaction = false;
  }

  async rollback(): Promise<void> {
    if (!this.inTransaction) return;
    await this.client.query("ROLLBACK");
    this.inTransaction = false;
  }

  /**
   * Close the connection. An open transaction is discarded by the server.
   */
  async close(): Promise<void> {
    if (!this.connected) return;
    await this.client.end();
    this.connected = false;
    this.inTransaction = false;
    logger.info("PostgreSQL connection closed");
  }
}

/**
 * Factory function for creating connected PgStore instances
 */
export async function createPgStore(config: TargetConfig): Promise<PgStore> {
  const store = new PgStore(config);
  await store.connect();
  return store;
}
