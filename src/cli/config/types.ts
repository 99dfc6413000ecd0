/**
 * CLI configuration types
 */

import type {
  LoadOptions,
  SourceConfig,
  TargetConfig,
} from "../../types/config.js";

/**
 * Complete configuration file structure. Every section and field is optional;
 * missing values fall back to the environment and then to defaults.
 */
export interface SurveyLoadConfigFile {
  source?: Partial<SourceConfig>;
  target?: Partial<TargetConfig>;
  load?: Partial<LoadOptions>;
}

/**
 * CLI command options (from commander)
 */
export interface LoadCommandOptions {
  config?: string;
  inputPath?: string;
  url?: string;
  delimiter?: string;
  schema?: string;
  table?: string;
  reportDir?: string;
  dryRun?: boolean;
  logLevel?: string;
}

export interface InspectCommandOptions {
  config?: string;
  inputPath?: string;
  url?: string;
  delimiter?: string;
  logLevel?: string;
}
