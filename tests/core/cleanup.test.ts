import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { runCleanup } from "../../src/core/cleanup";
import { GitClient } from "../../src/git/client";
import { seedBundles, validBundle } from "../helpers/backup-tree";
import { FakeGit } from "../helpers/fake-git";
import { memoryLogger } from "../helpers/logger";

describe("runCleanup", () => {
  let root: string;
  const git = new GitClient({ runner: new FakeGit().runner });

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "repovault-cleanup-"));
    await seedBundles(root, "github.com/soba/test", {
      "test.20200101000000.bundle": validBundle("a"),
      "test.20210101000000.bundle": validBundle("b"),
      "test.20220101000000.bundle": validBundle("c"),
    });
    await seedBundles(root, "gitlab.com/group/repo", {
      "repo.20200101000000.bundle": validBundle("d"),
      "repo.20210101000000.bundle": validBundle("e"),
    });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test("rejects retain below 1", async () => {
    await expect(runCleanup({ backupRoot: root, retain: 0, git, logger: memoryLogger() })).rejects.toThrow(
      "retain must be a positive integer",
    );
  });

  test("dry run reports without deleting", async () => {
    const result = await runCleanup({ backupRoot: root, retain: 1, git, logger: memoryLogger(), dryRun: true });

    expect(result.totalRepositories).toBe(2);
    expect(result.totalDeleted).toBe(0);
    expect(result.deletions.map((d) => `${d.repo}/${d.bundle}`)).toEqual([
      "github.com/soba/test/test.20200101000000.bundle",
      "github.com/soba/test/test.20210101000000.bundle",
      "gitlab.com/group/repo/repo.20200101000000.bundle",
    ]);
    expect((await readdir(path.join(root, "github.com", "soba", "test"))).length).toBe(3);
  });

  test("deletes beyond the retained count", async () => {
    const result = await runCleanup({ backupRoot: root, retain: 2, git, logger: memoryLogger() });

    expect(result.totalDeleted).toBe(1);
    expect(await readdir(path.join(root, "github.com", "soba", "test"))).toEqual([
      "test.20210101000000.bundle",
      "test.20220101000000.bundle",
    ]);
    expect((await readdir(path.join(root, "gitlab.com", "group", "repo"))).length).toBe(2);
  });

  test("domain filter", async () => {
    const result = await runCleanup({ backupRoot: root, retain: 1, git, logger: memoryLogger(), domain: "gitlab.com" });

    expect(result.totalRepositories).toBe(1);
    expect(result.deletions).toEqual([
      { repo: "gitlab.com/group/repo", bundle: "repo.20200101000000.bundle", success: true },
    ]);
    expect((await readdir(path.join(root, "github.com", "soba", "test"))).length).toBe(3);
  });
});
