import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, type MockInstance, test, vi } from "vitest";
import { main } from "../../src/cli/main";
import { VERSION } from "../../src/cli/ui";
import { seedBundles, validBundle } from "../helpers/backup-tree";

describe("main", () => {
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  beforeEach(() => {
    log = vi.spyOn(console, "log").mockImplementation(() => {});
    error = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("no arguments prints help", async () => {
    expect(await main([])).toBe(0);
    expect(String(log.mock.calls[0]?.[0])).toContain("COMMANDS:");
  });

  test("--help lists every command", async () => {
    expect(await main(["--help"])).toBe(0);
    const help = String(log.mock.calls[0]?.[0]);
    for (const command of ["backup", "start", "list", "verify", "cleanup"]) {
      expect(help).toContain(command);
    }
  });

  test("version", async () => {
    expect(await main(["--version"])).toBe(0);
    expect(log).toHaveBeenCalledWith(`repovault v${VERSION}`);
  });

  test("unknown command", async () => {
    expect(await main(["restore"])).toBe(1);
    expect(String(error.mock.calls[0]?.[0])).toContain("Unknown command: restore");
  });

  describe("list", () => {
    let root: string;

    beforeEach(async () => {
      root = await mkdtemp(path.join(tmpdir(), "repovault-cli-"));
    });

    afterEach(async () => {
      await rm(root, { recursive: true, force: true });
    });

    test("json output", async () => {
      const content = validBundle("a");
      await seedBundles(root, "github.com/soba/test", {
        "test.20200101000000.bundle": content,
        "test.20210304050607.bundle": content,
      });

      expect(await main(["list", "--format", "json", "--backup-dir", root])).toBe(0);

      const printed = log.mock.calls.map((call) => String(call[0])).find((line) => line.startsWith("["));
      expect(JSON.parse(printed ?? "null")).toEqual([
        {
          repository: "github.com/soba/test",
          latest: "test.20210304050607.bundle",
          latestCreated: "2021-03-04T05:06:07.000Z",
          bundles: 2,
          sizeBytes: Buffer.byteLength(content) * 2,
        },
      ]);
    });
  });
});
