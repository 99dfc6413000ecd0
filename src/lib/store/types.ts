/**
 * Store module types
 */

export type SqlRow = Record<string, unknown>;

export interface SqlResult {
  rows: SqlRow[];
  rowCount: number;
}

/**
 * SqlStore - The relational store as the pipeline sees it.
 *
 * Statements run inside an implicit transaction that begins with the first
 * `execute` after a `commit` or `rollback`, and nothing is durable until
 * `commit` returns.
 */
export interface SqlStore {
  execute(sql: string, params?: readonly unknown[]): Promise<SqlResult>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
}

export type StoreFactory = () => Promise<SqlStore>;
