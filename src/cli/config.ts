/**
 * Config loading shared by every command
 */

import { extractInlineOptions, ignoredEnvSettings, type InlineConfigOptions, loadConfig } from "../config";
import type { RepovaultConfig } from "../types";
import { logger, setLogLevel } from "../utils/logger";

export const COMMON_OPTIONS = {
  config: { type: "string" as const, short: "c" },
  verbose: { type: "boolean" as const, short: "v", default: false },
  help: { type: "boolean" as const, short: "h", default: false },
} as const;

export interface CommandConfigValues {
  config?: string;
  verbose?: boolean;
  "backup-dir"?: string;
  retain?: string;
  compare?: string;
}

/**
 * Load config for a command and apply its log level. `--verbose` wins over
 * the configured level.
 */
export async function loadCommandConfig(
  values: CommandConfigValues,
  inline: InlineConfigOptions = extractInlineOptions(values),
): Promise<RepovaultConfig> {
  const config = await loadConfig({ configPath: values.config, inline });

  if (values.verbose) {
    setLogLevel("debug");
  } else if (config.logLevel) {
    setLogLevel(config.logLevel);
  }

  for (const warning of ignoredEnvSettings()) {
    logger.warn(warning);
  }

  return config;
}
