/**
 * Inline configuration from CLI flags
 */

import type { CompareMode, ProviderCommonConfig, ProvidersConfig, RepovaultConfig } from "../types";
import { ConfigError } from "./validator";

/**
 * Options that override the config file and environment for one invocation
 */
export interface InlineConfigOptions {
  backupDir?: string;
  /** Applied to every configured provider */
  retain?: number;
  /** Applied to every configured provider */
  compare?: CompareMode;
}

/**
 * CLI option definitions for inline config (for parseArgs)
 */
export const INLINE_CONFIG_OPTIONS = {
  "backup-dir": { type: "string" as const },
  retain: { type: "string" as const },
  compare: { type: "string" as const },
} as const;

interface InlineValues {
  "backup-dir"?: string;
  retain?: string;
  compare?: string;
}

/**
 * Extract inline config options from parsed CLI values
 */
export function extractInlineOptions(values: InlineValues): InlineConfigOptions {
  const options: InlineConfigOptions = {};

  if (values["backup-dir"]) {
    options.backupDir = values["backup-dir"];
  }

  if (values.retain !== undefined) {
    if (!/^\d+$/.test(values.retain)) {
      throw new ConfigError(`--retain must be a non-negative integer, got "${values.retain}"`);
    }
    options.retain = Number.parseInt(values.retain, 10);
  }

  if (values.compare !== undefined) {
    if (values.compare !== "clone" && values.compare !== "refs") {
      throw new ConfigError(`--compare must be 'clone' or 'refs', got "${values.compare}"`);
    }
    options.compare = values.compare;
  }

  return options;
}

/**
 * Merge inline options into a loaded config
 */
export function mergeInlineConfig(config: RepovaultConfig, options: InlineConfigOptions): RepovaultConfig {
  const overrides: ProviderCommonConfig = {};
  if (options.retain !== undefined) overrides.retain = options.retain;
  if (options.compare !== undefined) overrides.compare = options.compare;

  const apply = <T extends ProviderCommonConfig>(provider: T | undefined): T | undefined =>
    provider ? { ...provider, ...overrides } : undefined;

  const { github, gitlab, bitbucket, gitea, azureDevOps, sourcehut } = config.providers;
  const providers: ProvidersConfig = {};
  if (github) providers.github = apply(github);
  if (gitlab) providers.gitlab = apply(gitlab);
  if (bitbucket) providers.bitbucket = apply(bitbucket);
  if (gitea) providers.gitea = apply(gitea);
  if (azureDevOps) providers.azureDevOps = apply(azureDevOps);
  if (sourcehut) providers.sourcehut = apply(sourcehut);

  return {
    ...config,
    backupDir: options.backupDir ?? config.backupDir,
    providers,
  };
}
