import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ConfigError } from "../../src/config/validator";
import { runBackups } from "../../src/core/run";
import { GitClient } from "../../src/git/client";
import type { RepovaultConfig } from "../../src/types";
import { FakeGit } from "../helpers/fake-git";
import { mockHttp } from "../helpers/http";
import { memoryLogger } from "../helpers/logger";
import { FakeProvider, repository } from "../helpers/provider";

describe("runBackups", () => {
  let root: string;
  let fake: FakeGit;

  const config = (): RepovaultConfig => ({
    version: "1",
    backupDir: root,
    git: { timeoutSeconds: 0 },
    http: { timeoutSeconds: 10 },
    providers: {},
  });

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "repovault-run-"));
    fake = new FakeGit();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test("fails without providers", async () => {
    await expect(runBackups(config(), { logger: memoryLogger() })).rejects.toBeInstanceOf(ConfigError);
  });

  test("runs every provider in order and clears the scratch area", async () => {
    const github = repository("soba/test");
    const gitlab = repository("group/app", "gitlab.com");
    fake.setRemote(github.httpsUrl, { refs: { "refs/heads/main": "a".repeat(40) }, objects: 2 });
    fake.setRemote(gitlab.httpsUrl, { refs: { "refs/heads/main": "b".repeat(40) }, objects: 2 });
    await mkdir(path.join(root, ".working", "stale"), { recursive: true });

    const logger = memoryLogger();
    const result = await runBackups(config(), {
      logger,
      git: new GitClient({ runner: fake.runner }),
      now: () => new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
      providers: [
        new FakeProvider({ name: "GitHub", repos: [github] }),
        new FakeProvider({ name: "GitLab", repos: [gitlab] }),
        new FakeProvider({ name: "Broken", listError: new Error("boom") }),
      ],
    });

    expect(result.providers.map((p) => p.provider)).toEqual(["GitHub", "GitLab", "Broken"]);
    expect(result.providers[2]?.result).toEqual({ results: [], error: "boom" });
    expect(await readdir(path.join(root, "gitlab.com", "group", "app"))).toEqual(["app.20240102030405.bundle"]);
    expect(existsSync(path.join(root, ".working"))).toBe(false);
    expect(logger.lines.map((l) => l.message)).toContain(
      "Backups finished in 0ms: 2 succeeded, 1 failed, 0 unchanged",
    );
  });

  test("a scratch area that cannot be removed still lets notifications go out", async () => {
    // A file where the backup directory should be makes removing `.working` fail
    const backupDir = path.join(root, "not-a-directory");
    await writeFile(backupDir, "");

    const logger = memoryLogger();
    const { agent, http } = mockHttp(logger);
    agent
      .get("https://hooks.example.com")
      .intercept({ path: "/backup", method: "POST", body: (body) => JSON.parse(body).stats.succeeded === 0 })
      .reply(204, "");

    const result = await runBackups(
      { ...config(), backupDir, notify: { webhook: { url: "https://hooks.example.com/backup", format: "short" } } },
      { logger, http, git: new GitClient({ runner: fake.runner }), providers: [new FakeProvider({ name: "Empty" })] },
    );

    expect(result.providers).toEqual([{ provider: "Empty", result: { results: [] } }]);
    const warnings = logger.lines.filter((l) => l.level === "warn").map((l) => l.message);
    expect(warnings.some((m) => m.startsWith(`Failed to remove ${path.join(backupDir, ".working")}:`))).toBe(true);
    agent.assertNoPendingInterceptors();
    await agent.close();
  });
});
