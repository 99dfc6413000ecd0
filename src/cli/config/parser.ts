/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import type { SurveyLoadConfigFile } from "./types.js";
import type {
  LoadOptions,
  SourceConfig,
  TargetConfig,
} from "../../types/config.js";
import { logger } from "../../utils/logger.js";
import { ConfigError } from "../../utils/errors.js";

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readSection(root: Section, name: string): Section | undefined {
  const value = root[name];
  if (value === undefined || value === null) return undefined;
  if (!isSection(value)) {
    throw new ConfigError(`Config section "${name}" must be an object`);
  }
  return value;
}

function readString(
  section: Section,
  key: string,
  sectionName: string,
): string | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`${sectionName}.${key} must be a string`);
  }
  return value;
}

function readNumber(
  section: Section,
  key: string,
  sectionName: string,
): number | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`${sectionName}.${key} must be a number`);
  }
  return value;
}

function parseSourceSection(section: Section): Partial<SourceConfig> {
  return {
    url: readString(section, "url", "source"),
    username: readString(section, "username", "source"),
    password: readString(section, "password", "source"),
    delimiter: readString(section, "delimiter", "source"),
    timeoutMs: readNumber(section, "timeoutMs", "source"),
  };
}

function parseTargetSection(section: Section): Partial<TargetConfig> {
  return {
    host: readString(section, "host", "target"),
    port: readNumber(section, "port", "target"),
    database: readString(section, "database", "target"),
    user: readString(section, "user", "target"),
    password: readString(section, "password", "target"),
    schema: readString(section, "schema", "target"),
    table: readString(section, "table", "target"),
    statementTimeoutMs: readNumber(section, "statementTimeoutMs", "target"),
    connectionTimeoutMs: readNumber(section, "connectionTimeoutMs", "target"),
  };
}

function parseLoadSection(section: Section): Partial<LoadOptions> {
  return {
    progressInterval: readNumber(section, "progressInterval", "load"),
    maxReportedErrors: readNumber(section, "maxReportedErrors", "load"),
  };
}

/**
 * Turn parsed JSON/YAML into a typed config file structure
 */
export function parseConfigContent(content: unknown): SurveyLoadConfigFile {
  if (content === undefined || content === null) return {};
  if (!isSection(content)) {
    throw new ConfigError("Config file must contain an object");
  }

  const source = readSection(content, "source");
  const target = readSection(content, "target");
  const load = readSection(content, "load");

  return {
    source: source ? parseSourceSection(source) : undefined,
    target: target ? parseTargetSection(target) : undefined,
    load: load ? parseLoadSection(load) : undefined,
  };
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): SurveyLoadConfigFile {
  logger.info("Parsing configuration file", { filePath });

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file: ${filePath}`,
      { filePath },
      { cause: error },
    );
  }

  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse config file: ${filePath}`,
      { filePath },
      { cause: error },
    );
  }

  const config = parseConfigContent(parsed);
  logger.info("Configuration file parsed successfully", {
    hasSourceConfig: !!config.source,
    hasTargetConfig: !!config.target,
    hasLoadConfig: !!config.load,
  });
  return config;
}
