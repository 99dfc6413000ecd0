/**
 * Helpers shared by the CLI commands
 */

import { parseConfigFile } from "../config/parser.js";
import type { SurveyLoadConfigFile } from "../config/types.js";
import type { PipelineConfig } from "../../types/config.js";
import {
  loadPipelineConfig,
  type ConfigOverrides,
  type ConfigRequirements,
} from "../../utils/config-loader.js";
import {
  ConfigError,
  exitCodeFor,
  toSurveyLoadError,
  type ExitCode,
} from "../../utils/errors.js";
import { isLogLevel, logger } from "../../utils/logger.js";

export interface CommandConfigOptions extends ConfigOverrides {
  config?: string;
}

/**
 * Merge the config file (if any) with CLI options and the environment
 */
export function buildPipelineConfig(
  options: CommandConfigOptions,
  requirements: ConfigRequirements,
): PipelineConfig {
  const configFile: SurveyLoadConfigFile = options.config
    ? parseConfigFile(options.config)
    : {};

  return loadPipelineConfig(
    {
      url: options.url,
      delimiter: options.delimiter,
      schema: options.schema,
      table: options.table,
    },
    configFile,
    process.env,
    requirements,
  );
}

/**
 * Apply the global --log-level option
 *
 * @throws ConfigError for an unknown level
 */
export function applyLogLevel(level: string | undefined): void {
  if (level === undefined) return;
  if (!isLogLevel(level)) {
    throw new ConfigError(
      `Unknown log level: ${level}. Use error, warn, info or debug`,
    );
  }
  logger.setLevel(level);
}

/**
 * Print the error envelope to stderr and return the exit code for it
 */
export function reportCommandError(error: unknown, phase: string): ExitCode {
  const failure = toSurveyLoadError(error);
  console.error(JSON.stringify(failure.toResponse(phase), null, 2));
  return exitCodeFor(failure);
}
