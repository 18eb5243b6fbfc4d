/**
 * Default configuration values
 */

import { isRecord } from "./validator";

export type RawConfig = Record<string, unknown>;

export const DEFAULT_GIT_TIMEOUT_SECONDS = 3600;
export const DEFAULT_HTTP_TIMEOUT_SECONDS = 300;

export const DEFAULT_CONFIG: RawConfig = {
  version: "1",
  git: {
    timeoutSeconds: DEFAULT_GIT_TIMEOUT_SECONDS,
  },
  http: {
    timeoutSeconds: DEFAULT_HTTP_TIMEOUT_SECONDS,
  },
  providers: {},
};

/**
 * Deep merge two objects, with source overriding target. Arrays are replaced.
 */
export function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result: RawConfig = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
