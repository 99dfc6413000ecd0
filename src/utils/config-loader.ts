/**
 * Configuration loader for the pipeline
 */

import {
  DEFAULT_LOAD_OPTIONS,
  type PipelineConfig,
} from "../types/config.js";
import type { SurveyLoadConfigFile } from "../cli/config/types.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

export const DEFAULT_DELIMITER = ";";
export const DEFAULT_FETCH_TIMEOUT_MS = 60_000;
export const DEFAULT_STATEMENT_TIMEOUT_MS = 30_000;
export const DEFAULT_CONNECTION_TIMEOUT_MS = 10_000;
export const DEFAULT_SCHEMA = "survey";
export const DEFAULT_TABLE = "public_health_data";

// PostgreSQL truncates identifiers beyond NAMEDATALEN - 1 bytes
const MAX_IDENTIFIER_BYTES = 63;

/**
 * Values given directly on the command line
 */
export interface ConfigOverrides {
  url?: string;
  delimiter?: string;
  schema?: string;
  table?: string;
}

export interface ConfigRequirements {
  /** The export URL is needed (not reading from a local file) */
  requireSource?: boolean;
  /** Database connection settings are needed (not a dry run) */
  requireTarget?: boolean;
}

type Env = Record<string, string | undefined>;

function envString(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === "" ? undefined : value;
}

function envInteger(env: Env, name: string): number | undefined {
  const value = envString(env, name);
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Build the pipeline configuration
 *
 * Precedence: CLI overrides > config file > environment > defaults
 *
 * @example
 * const config = loadPipelineConfig(
 *   { table: "responses_2024" },
 *   { target: { schema: "health" } },
 *   process.env,
 * );
 */
export function loadPipelineConfig(
  overrides: ConfigOverrides = {},
  configFile: SurveyLoadConfigFile = {},
  env: Env = process.env,
  requirements: ConfigRequirements = {},
): PipelineConfig {
  const source = configFile.source ?? {};
  const target = configFile.target ?? {};
  const load = configFile.load ?? {};

  const config: PipelineConfig = {
    source: {
      url: overrides.url ?? source.url ?? envString(env, "EXPORT_URL") ?? "",
      username: source.username ?? envString(env, "EXPORT_USERNAME"),
      password: source.password ?? envString(env, "EXPORT_PASSWORD"),
      delimiter:
        overrides.delimiter ??
        source.delimiter ??
        envString(env, "EXPORT_DELIMITER") ??
        DEFAULT_DELIMITER,
      timeoutMs:
        source.timeoutMs ??
        envInteger(env, "EXPORT_TIMEOUT_MS") ??
        DEFAULT_FETCH_TIMEOUT_MS,
    },
    target: {
      host: target.host ?? envString(env, "PG_HOST") ?? "localhost",
      port: target.port ?? envInteger(env, "PG_PORT") ?? 5432,
      database: target.database ?? envString(env, "PG_DATABASE") ?? "",
      user: target.user ?? envString(env, "PG_USER") ?? "",
      password: target.password ?? envString(env, "PG_PASSWORD"),
      schema:
        overrides.schema ??
        target.schema ??
        envString(env, "TARGET_SCHEMA") ??
        DEFAULT_SCHEMA,
      table:
        overrides.table ??
        target.table ??
        envString(env, "TARGET_TABLE") ??
        DEFAULT_TABLE,
      statementTimeoutMs:
        target.statementTimeoutMs ??
        envInteger(env, "PG_STATEMENT_TIMEOUT_MS") ??
        DEFAULT_STATEMENT_TIMEOUT_MS,
      connectionTimeoutMs:
        target.connectionTimeoutMs ?? DEFAULT_CONNECTION_TIMEOUT_MS,
    },
    load: {
      progressInterval:
        load.progressInterval ?? DEFAULT_LOAD_OPTIONS.progressInterval,
      maxReportedErrors:
        load.maxReportedErrors ?? DEFAULT_LOAD_OPTIONS.maxReportedErrors,
    },
  };

  validatePipelineConfig(config, requirements);

  logger.debug("Pipeline config loaded", {
    delimiter: config.source.delimiter,
    host: config.target.host,
    database: config.target.database,
    schema: config.target.schema,
    table: config.target.table,
  });

  return config;
}

function validateIdentifier(value: string, name: string): void {
  if (value.trim() === "") {
    throw new ConfigError(`${name} must not be empty`);
  }
  if (Buffer.byteLength(value, "utf8") > MAX_IDENTIFIER_BYTES) {
    throw new ConfigError(
      `${name} must be at most ${MAX_IDENTIFIER_BYTES} bytes, got "${value}"`,
    );
  }
}

function validatePositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Validate pipeline configuration
 *
 * @throws ConfigError if configuration is invalid
 */
export function validatePipelineConfig(
  config: PipelineConfig,
  requirements: ConfigRequirements = {},
): void {
  const { requireSource = true, requireTarget = true } = requirements;

  if (requireSource) {
    if (!config.source.url) {
      throw new ConfigError(
        "Missing export URL: set EXPORT_URL, source.url or --url",
      );
    }
    try {
      new URL(config.source.url);
    } catch (error) {
      throw new ConfigError(
        `Invalid export URL: ${config.source.url}`,
        undefined,
        { cause: error },
      );
    }
  }

  const { delimiter } = config.source;
  if (delimiter === "" || /["\r\n]/.test(delimiter)) {
    throw new ConfigError(
      `Delimiter must be non-empty and contain no quotes or line breaks, got ${JSON.stringify(delimiter)}`,
    );
  }

  validatePositiveInteger(config.source.timeoutMs, "source.timeoutMs");
  validateIdentifier(config.target.schema, "target.schema");
  validateIdentifier(config.target.table, "target.table");

  if (requireTarget) {
    const missing = (["database", "user"] as const).filter(
      (field) => config.target[field] === "",
    );
    if (missing.length > 0) {
      throw new ConfigError(
        `Missing required target configuration: ${missing.join(", ")} (PG_DATABASE, PG_USER)`,
      );
    }
    if (
      !Number.isInteger(config.target.port) ||
      config.target.port < 1 ||
      config.target.port > 65535
    ) {
      throw new ConfigError(`target.port must be 1-65535, got ${config.target.port}`);
    }
    validatePositiveInteger(
      config.target.statementTimeoutMs,
      "target.statementTimeoutMs",
    );
    validatePositiveInteger(
      config.target.connectionTimeoutMs,
      "target.connectionTimeoutMs",
    );
  }

  validatePositiveInteger(config.load.progressInterval, "load.progressInterval");
  if (
    !Number.isInteger(config.load.maxReportedErrors) ||
    config.load.maxReportedErrors < 0
  ) {
    throw new ConfigError(
      `load.maxReportedErrors must be a non-negative integer, got ${config.load.maxReportedErrors}`,
    );
  }
}
