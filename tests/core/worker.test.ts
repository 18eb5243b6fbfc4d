import { existsSync } from "node:fs";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { backupRepository, type WorkerContext } from "../../src/core/backup/worker";
import { GitClient, runGit } from "../../src/git/client";
import { seedBundles, validBundle } from "../helpers/backup-tree";
import { FakeGit, fakeBundleContent } from "../helpers/fake-git";
import { memoryLogger } from "../helpers/logger";
import { FakeProvider, type FakeProviderOptions, repository } from "../helpers/provider";

const MAIN_A = { "refs/heads/main": "a".repeat(40) };
const MAIN_B = { "refs/heads/main": "b".repeat(40) };

describe("backupRepository", () => {
  let root: string;
  let fake: FakeGit;
  let clock: Date;

  const context = (options: FakeProviderOptions = {}): WorkerContext => ({
    backupRoot: root,
    provider: new FakeProvider(options),
    git: new GitClient({ runner: fake.runner }),
    logger: memoryLogger(),
    now: () => clock,
  });

  const bundlesOf = async (key: string) => {
    const dir = path.join(root, ...key.split("/"));
    return existsSync(dir) ? (await readdir(dir)).sort() : [];
  };

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "repovault-worker-"));
    fake = new FakeGit();
    clock = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test("refs mode with no prior bundles clones and writes one bundle", async () => {
    const repo = repository("soba/test");
    fake.setRemote(repo.httpsUrl, { refs: MAIN_A, objects: 5 });

    const result = await backupRepository(repo, context({ compare: "refs" }));

    expect(result).toMatchObject({ repo: "soba/test", status: "ok", bundle: "test.20240102030405.bundle" });
    expect(await bundlesOf("github.com/soba/test")).toEqual(["test.20240102030405.bundle"]);
    expect(fake.callsOf("ls-remote")).toEqual([]);
    expect(existsSync(path.join(root, ".working", "github.com", "soba", "test"))).toBe(false);
  });

  test("cold start in clone mode with an empty remote writes nothing", async () => {
    const repo = repository("soba/empty");
    fake.setRemote(repo.httpsUrl, { refs: {}, objects: 0 });

    const result = await backupRepository(repo, context());

    expect(result).toMatchObject({ status: "ok", empty: true });
    expect(await bundlesOf("github.com/soba/empty")).toEqual([]);
  });

  test("refs mode skips the clone when nothing changed", async () => {
    const repo = repository("soba/test");
    fake.setRemote(repo.httpsUrl, { refs: MAIN_A, objects: 5 });
    await seedBundles(root, "github.com/soba/test", { "test.20200101000000.bundle": fakeBundleContent(MAIN_A) });

    const result = await backupRepository(repo, context({ compare: "refs" }));

    expect(result).toMatchObject({ status: "ok", skipped: true });
    expect(fake.callsOf("clone")).toEqual([]);
    expect(await bundlesOf("github.com/soba/test")).toEqual(["test.20200101000000.bundle"]);
  });

  test("a corrupt latest bundle is set aside before a fresh clone", async () => {
    const repo = repository("soba/repo0");
    fake.setRemote(repo.httpsUrl, { refs: MAIN_B, objects: 5 });
    await seedBundles(root, "github.com/soba/repo0", {
      "repo0.20200101000000.bundle": validBundle("a"),
      "repo0.20200401111111.bundle": "",
    });

    const result = await backupRepository(repo, context({ compare: "refs", retain: 1 }));

    expect(result.status).toBe("ok");
    expect(await bundlesOf("github.com/soba/repo0")).toEqual([
      "repo0.20200401111111.bundle.invalid",
      "repo0.20240102030405.bundle",
    ]);
    const written = await readFile(path.join(root, "github.com", "soba", "repo0", "repo0.20240102030405.bundle"), "utf8");
    expect(written).toBe(fakeBundleContent(MAIN_B));
  });

  test("unchanged remote in clone mode leaves a single bundle", async () => {
    const repo = repository("soba/test");
    fake.setRemote(repo.httpsUrl, { refs: MAIN_A, objects: 5 });
    const ctx = context({ compare: "clone", retain: 0 });

    const first = await backupRepository(repo, ctx);
    clock = new Date(Date.UTC(2024, 0, 3, 3, 4, 5));
    const second = await backupRepository(repo, ctx);

    expect(first.bundle).toBe("test.20240102030405.bundle");
    expect(second.status).toBe("ok");
    expect(second.bundle).toBeUndefined();
    expect(await bundlesOf("github.com/soba/test")).toEqual(["test.20240102030405.bundle"]);
  });

  test("changed remote keeps both bundles without retention", async () => {
    const repo = repository("soba/test");
    fake.setRemote(repo.httpsUrl, { refs: MAIN_A, objects: 5 });
    const ctx = context();

    await backupRepository(repo, ctx);
    fake.setRemote(repo.httpsUrl, { refs: MAIN_B, objects: 6 });
    clock = new Date(Date.UTC(2024, 0, 3, 0, 0, 0));
    await backupRepository(repo, ctx);

    expect(await bundlesOf("github.com/soba/test")).toEqual([
      "test.20240102030405.bundle",
      "test.20240103000000.bundle",
    ]);
  });

  test("retention prunes older bundles", async () => {
    const repo = repository("soba/test");
    fake.setRemote(repo.httpsUrl, { refs: MAIN_B, objects: 5 });
    await seedBundles(root, "github.com/soba/test", {
      "test.20200101000000.bundle": validBundle("c"),
      "test.20210101000000.bundle": validBundle("d"),
    });

    await backupRepository(repo, context({ retain: 2 }));

    expect(await bundlesOf("github.com/soba/test")).toEqual([
      "test.20210101000000.bundle",
      "test.20240102030405.bundle",
    ]);
  });

  test("clone failure is reported with credentials masked", async () => {
    const repo = repository("soba/missing");

    const result = await backupRepository(repo, context());

    expect(result.status).toBe("failed");
    expect(result.error).toBe(
      "Clone failed: git clone -v --mirror https://*****@github.com/soba/missing " +
        `${path.join(root, ".working", "github.com", "soba", "missing")} exited with code 128: ` +
        "fatal: repository 'https://*****@github.com/soba/missing' not found",
    );
    expect(result.error).not.toContain("test-token");
  });

  test("paths escaping the backup directory are refused", async () => {
    const repo = repository("../../etc");
    const result = await backupRepository(repo, context());

    expect(result.status).toBe("failed");
    expect(result.error).toBe("Repository path ../../etc escapes the backup directory");
    expect(fake.calls).toEqual([]);
  });
});

describe("backupRepository with the git binary", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "repovault-worker-git-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const commitTo = async (source: string): Promise<void> => {
    const init = await runGit(["init", "--quiet", source]);
    expect(init.success).toBe(true);
    const commit = await runGit([
      "-C",
      source,
      "-c",
      "user.name=Test",
      "-c",
      "user.email=test@example.com",
      "-c",
      "commit.gpgsign=false",
      "commit",
      "--allow-empty",
      "--quiet",
      "-m",
      "initial",
    ]);
    expect(commit.success).toBe(true);
  };

  test("a relative backup root writes the bundle under the root, not the mirror", async () => {
    const source = path.join(root, "source");
    await commitTo(source);

    const result = await backupRepository(repository("me/src", "local"), {
      backupRoot: path.relative(process.cwd(), path.join(root, "backups")),
      provider: new FakeProvider({ cloneUrl: () => source }),
      git: new GitClient(),
      logger: memoryLogger(),
      now: () => new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
    });

    expect(result).toMatchObject({ repo: "me/src", status: "ok", bundle: "src.20240102030405.bundle" });
    expect(await readdir(path.join(root, "backups", "local", "me", "src"))).toEqual(["src.20240102030405.bundle"]);
    expect(existsSync(path.join(root, "backups", ".working", "local", "me", "src"))).toBe(false);
  });
});
