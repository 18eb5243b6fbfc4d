/**
 * Configuration file loading
 */

import { existsSync, statSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { RepovaultConfig } from "../types";
import { DEFAULT_CONFIG, deepMerge, type RawConfig } from "./defaults";
import { type Env, loadConfigFromEnv } from "./env";
import { type InlineConfigOptions, mergeInlineConfig } from "./inline";
import { ConfigError, isRecord, validateConfig } from "./validator";

export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = ["repovault.config.yaml", "repovault.config.yml", "repovault.config.json"];

/**
 * Read and parse a config file. A relative backupDir is resolved against the
 * file's directory.
 */
export async function loadConfigFile(configPath: string): Promise<RawConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf8");
  } catch {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const parsed = parseConfigContent(content, path.extname(absolutePath).toLowerCase());
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file must contain an object: ${absolutePath}`);
  }

  if (typeof parsed.backupDir === "string" && parsed.backupDir !== "") {
    return { ...parsed, backupDir: path.resolve(path.dirname(absolutePath), parsed.backupDir) };
  }
  return parsed;
}

export function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Check if running inside a container
 */
function isRunningInContainer(): boolean {
  return existsSync("/.dockerenv") || existsSync("/run/.containerenv");
}

/**
 * Find a config file in the given directory or standard locations
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  const searchDirs = [startDir];

  // Only check /config inside a container
  if (isRunningInContainer()) {
    searchDirs.push("/config");
  }

  for (const dir of searchDirs) {
    for (const name of CONFIG_FILE_NAMES) {
      const configPath = path.join(dir, name);
      if (existsSync(configPath) && statSync(configPath).isFile()) {
        return configPath;
      }
    }
  }

  return null;
}

export interface LoadConfigOptions {
  /** Explicit --config path; must exist */
  configPath?: string;
  inline?: InlineConfigOptions;
  env?: Env;
  cwd?: string;
}

/**
 * Resolve the effective configuration: inline options over the config file
 * over environment variables over defaults.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<RepovaultConfig> {
  const cwd = options.cwd ?? process.cwd();
  const inline = options.inline ?? {};

  const fromEnv = loadConfigFromEnv(options.env ?? process.env);
  const filePath = options.configPath ?? findConfigFile(cwd);
  const fromFile = filePath ? await loadConfigFile(path.resolve(cwd, filePath)) : {};

  let merged = deepMerge(deepMerge(DEFAULT_CONFIG, fromEnv), fromFile);
  if (inline.backupDir) {
    merged = { ...merged, backupDir: inline.backupDir };
  }

  validateConfig(merged);

  const config = mergeInlineConfig(merged, inline);
  return { ...config, backupDir: path.resolve(cwd, config.backupDir) };
}
