/**
 * Configuration types for survey-load
 */

/**
 * SourceConfig - Where the survey export comes from
 */
export interface SourceConfig {
  url: string;
  username?: string;
  password?: string;
  delimiter: string;
  timeoutMs: number;
}

/**
 * TargetConfig - PostgreSQL connection and destination table identity
 */
export interface TargetConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password?: string;
  schema: string; // Namespace the table lives in
  table: string;
  statementTimeoutMs: number;
  connectionTimeoutMs: number;
}

/**
 * LoadOptions - Row loader behavior
 */
export interface LoadOptions {
  progressInterval: number; // Log every Nth inserted row
  maxReportedErrors: number; // Row failures logged and kept in the report
}

/**
 * PipelineConfig - Built once at startup and passed to every component
 */
export interface PipelineConfig {
  source: SourceConfig;
  target: TargetConfig;
  load: LoadOptions;
}

export const DEFAULT_LOAD_OPTIONS: LoadOptions = {
  progressInterval: 10,
  maxReportedErrors: 3,
};
