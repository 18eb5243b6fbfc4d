import { describe, expect, test } from "vitest";
import { DEFAULT_CONFIG, deepMerge } from "../../src/config/defaults";
import { ConfigError, validateConfig } from "../../src/config/validator";

function withDefaults(config: Record<string, unknown>): Record<string, unknown> {
  return deepMerge(deepMerge(DEFAULT_CONFIG, { backupDir: "/backups" }), config);
}

describe("validateConfig", () => {
  test("accepts a complete configuration", () => {
    const config = withDefaults({
      schedule: { cron: "0 2 * * *" },
      notify: { webhook: { url: "https://hooks.example.com", format: "short" }, onFailureOnly: true },
      providers: {
        github: { token: "test-token", orgs: ["*"], compare: "refs", retain: 3, workers: 4 },
        gitlab: { token: "test-token", minAccessLevel: 30 },
        bitbucket: { email: "dev@example.com", apiToken: "test-token" },
        gitea: { token: "test-token", apiUrl: "https://gitea.example.com/api/v1" },
        azureDevOps: { userName: "soba", pat: "test-token", orgs: ["contoso"] },
        sourcehut: { token: "test-token" },
      },
    });

    expect(() => validateConfig(config)).not.toThrow();
  });

  test.each([
    [{ backupDir: "" }, "backupDir must be set (config file, --backup-dir or GIT_BACKUP_DIR)"],
    [{ logLevel: "trace" }, "logLevel must be one of debug, info, warn, error"],
    [{ git: { timeoutSeconds: -1 } }, "git.timeoutSeconds must be a non-negative integer"],
    [{ http: { timeoutSeconds: 0 } }, "http.timeoutSeconds must be a positive integer"],
    [{ schedule: { cron: "0 2 * * *", interval: "24h" } }, "schedule takes either cron or interval, not both"],
    [{ notify: { webhook: { url: "https://x", format: "xml" } } }, "notify.webhook.format must be 'full' or 'short'"],
    [{ notify: { slack: { token: "test-token" } } }, "notify.slack.channelId must be a non-empty string"],
    [{ providers: { github: { token: "" } } }, "providers.github.token must be a non-empty string"],
    [{ providers: { github: { token: "t", compare: "diff" } } }, "providers.github.compare must be 'clone' or 'refs'"],
    [{ providers: { github: { token: "t", retain: -1 } } }, "providers.github.retain must be a non-negative integer"],
    [{ providers: { github: { token: "t", workers: 0 } } }, "providers.github.workers must be a positive integer"],
    [{ providers: { gitlab: { token: "t", minAccessLevel: 25 } } }, "providers.gitlab.minAccessLevel must be one of 10, 20, 30, 40, 50"],
    [{ providers: { bitbucket: { user: "soba" } } }, "providers.bitbucket needs email and apiToken, or key and secret"],
    [{ providers: { azureDevOps: { userName: "u", pat: "p", orgs: [] } } }, "providers.azureDevOps.orgs must list at least one entry"],
    [{ providers: { forgejo: {} } }, "providers.forgejo is not a known provider (github, gitlab, bitbucket, gitea, azureDevOps, sourcehut)"],
  ])("rejects %j", (override, message) => {
    const config = withDefaults(override);
    expect(() => validateConfig(config)).toThrow(new ConfigError(message));
  });

  test("non-objects are rejected", () => {
    expect(() => validateConfig("nope")).toThrow("Config must be an object");
  });
});

describe("deepMerge", () => {
  test("merges nested objects and replaces arrays", () => {
    expect(
      deepMerge(
        { providers: { github: { token: "a", orgs: ["x"] } }, git: { timeoutSeconds: 1 } },
        { providers: { github: { orgs: ["y"] }, sourcehut: { token: "b" } }, git: undefined },
      ),
    ).toEqual({
      providers: { github: { token: "a", orgs: ["y"] }, sourcehut: { token: "b" } },
      git: { timeoutSeconds: 1 },
    });
  });
});
