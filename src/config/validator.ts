/**
 * Configuration validation
 */

import type { RepovaultConfig } from "../types";
import { isLogLevel } from "../utils/logger";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

type Validator = (config: Record<string, unknown>) => void;

const COMPARE_MODES = ["clone", "refs"];
const GITLAB_ACCESS_LEVELS = [10, 20, 30, 40, 50];
const WEBHOOK_FORMATS = ["full", "short"];

function requireString(section: Record<string, unknown>, key: string, at: string): void {
  const value = section[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(`${at}.${key} must be a non-empty string`);
  }
}

function optionalString(section: Record<string, unknown>, key: string, at: string): void {
  if (section[key] !== undefined && typeof section[key] !== "string") {
    throw new ConfigError(`${at}.${key} must be a string`);
  }
}

function optionalBoolean(section: Record<string, unknown>, key: string, at: string): void {
  if (section[key] !== undefined && typeof section[key] !== "boolean") {
    throw new ConfigError(`${at}.${key} must be a boolean`);
  }
}

function stringList(section: Record<string, unknown>, key: string, at: string, required = false): void {
  const value = section[key];
  if (value === undefined && !required) return;
  if (!Array.isArray(value) || value.some((item) => typeof item !== "string")) {
    throw new ConfigError(`${at}.${key} must be an array of strings`);
  }
  if (required && value.length === 0) {
    throw new ConfigError(`${at}.${key} must list at least one entry`);
  }
}

function nonNegativeInteger(value: unknown): boolean {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function section(c: Record<string, unknown>, key: string, at: string): Record<string, unknown> | null {
  const value = c[key];
  if (value === undefined) return null;
  if (!isRecord(value)) {
    throw new ConfigError(`${at}.${key} must be an object`);
  }
  return value;
}

function validateProviderCommon(p: Record<string, unknown>, at: string): void {
  if (p.compare !== undefined && (typeof p.compare !== "string" || !COMPARE_MODES.includes(p.compare))) {
    throw new ConfigError(`${at}.compare must be 'clone' or 'refs'`);
  }
  if (p.retain !== undefined && !nonNegativeInteger(p.retain)) {
    throw new ConfigError(`${at}.retain must be a non-negative integer`);
  }
  if (p.workers !== undefined && (!nonNegativeInteger(p.workers) || p.workers === 0)) {
    throw new ConfigError(`${at}.workers must be a positive integer`);
  }
}

const providerValidators: Record<string, (p: Record<string, unknown>, at: string) => void> = {
  github: (p, at) => {
    requireString(p, "token", at);
    stringList(p, "orgs", at);
    optionalBoolean(p, "skipUserRepos", at);
    optionalBoolean(p, "limitUserOwned", at);
  },

  gitlab: (p, at) => {
    requireString(p, "token", at);
    optionalString(p, "apiUrl", at);
    if (
      p.minAccessLevel !== undefined &&
      (typeof p.minAccessLevel !== "number" || !GITLAB_ACCESS_LEVELS.includes(p.minAccessLevel))
    ) {
      throw new ConfigError(`${at}.minAccessLevel must be one of ${GITLAB_ACCESS_LEVELS.join(", ")}`);
    }
  },

  bitbucket: (p, at) => {
    for (const key of ["email", "apiToken", "user", "key", "secret", "apiUrl"]) {
      optionalString(p, key, at);
    }
    const hasApiToken = Boolean(p.email && p.apiToken);
    const hasOAuth = Boolean(p.key && p.secret);
    if (!hasApiToken && !hasOAuth) {
      throw new ConfigError(`${at} needs email and apiToken, or key and secret`);
    }
  },

  gitea: (p, at) => {
    requireString(p, "token", at);
    requireString(p, "apiUrl", at);
    stringList(p, "orgs", at);
  },

  azureDevOps: (p, at) => {
    requireString(p, "userName", at);
    requireString(p, "pat", at);
    stringList(p, "orgs", at, true);
  },

  sourcehut: (p, at) => {
    requireString(p, "token", at);
    optionalString(p, "apiUrl", at);
  },
};

const validators: Record<string, Validator> = {
  version: (c) => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
  },

  backupDir: (c) => {
    if (!c.backupDir || typeof c.backupDir !== "string") {
      throw new ConfigError("backupDir must be set (config file, --backup-dir or GIT_BACKUP_DIR)");
    }
  },

  logLevel: (c) => {
    if (c.logLevel !== undefined && (typeof c.logLevel !== "string" || !isLogLevel(c.logLevel))) {
      throw new ConfigError("logLevel must be one of debug, info, warn, error");
    }
  },

  git: (c) => {
    const git = section(c, "git", "config");
    if (!git || !nonNegativeInteger(git.timeoutSeconds)) {
      throw new ConfigError("git.timeoutSeconds must be a non-negative integer");
    }
  },

  http: (c) => {
    const http = section(c, "http", "config");
    if (!http || !nonNegativeInteger(http.timeoutSeconds) || http.timeoutSeconds === 0) {
      throw new ConfigError("http.timeoutSeconds must be a positive integer");
    }
  },

  schedule: (c) => {
    const schedule = section(c, "schedule", "config");
    if (!schedule) return;
    optionalString(schedule, "cron", "schedule");
    optionalString(schedule, "interval", "schedule");
    if (schedule.cron && schedule.interval) {
      throw new ConfigError("schedule takes either cron or interval, not both");
    }
  },

  notify: (c) => {
    const notify = section(c, "notify", "config");
    if (!notify) return;

    const webhook = section(notify, "webhook", "notify");
    if (webhook) {
      requireString(webhook, "url", "notify.webhook");
      if (
        webhook.format !== undefined &&
        (typeof webhook.format !== "string" || !WEBHOOK_FORMATS.includes(webhook.format))
      ) {
        throw new ConfigError("notify.webhook.format must be 'full' or 'short'");
      }
    }

    const ntfy = section(notify, "ntfy", "notify");
    if (ntfy) requireString(ntfy, "url", "notify.ntfy");

    const slack = section(notify, "slack", "notify");
    if (slack) {
      requireString(slack, "token", "notify.slack");
      requireString(slack, "channelId", "notify.slack");
    }

    const telegram = section(notify, "telegram", "notify");
    if (telegram) {
      requireString(telegram, "botToken", "notify.telegram");
      requireString(telegram, "chatId", "notify.telegram");
    }

    optionalBoolean(notify, "onFailureOnly", "notify");
  },

  providers: (c) => {
    if (!isRecord(c.providers)) {
      throw new ConfigError("Config must have a 'providers' object");
    }
    for (const [name, value] of Object.entries(c.providers)) {
      const validate = providerValidators[name];
      if (!validate) {
        throw new ConfigError(
          `providers.${name} is not a known provider (${Object.keys(providerValidators).join(", ")})`,
        );
      }
      const at = `providers.${name}`;
      if (!isRecord(value)) {
        throw new ConfigError(`${at} must be an object`);
      }
      validateProviderCommon(value, at);
      validate(value, at);
    }
  },
};

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is RepovaultConfig {
  if (!isRecord(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
