import { describe, expect, test } from "vitest";
import { computeStats } from "../../src/core/run/stats";
import { buildWebhookPayload } from "../../src/notify/webhook";
import type { RunResult } from "../../src/types";

const run: RunResult = {
  startedAt: new Date(Date.UTC(2024, 0, 2, 3, 0, 0)),
  finishedAt: new Date(Date.UTC(2024, 0, 2, 3, 5, 0, 250)),
  providers: [
    {
      provider: "GitHub",
      result: {
        results: [
          { repo: "soba/a", status: "ok", durationMs: 5 },
          { repo: "soba/b", status: "failed", error: "Clone failed: boom", durationMs: 3 },
        ],
      },
    },
    { provider: "GitLab", result: { results: [], error: "401" } },
  ],
};

const sentAt = new Date(Date.UTC(2024, 0, 2, 3, 5, 1));

describe("buildWebhookPayload", () => {
  test("full format includes per-repository results", () => {
    expect(buildWebhookPayload(run, computeStats(run), "full", sentAt)).toEqual({
      app: "repovault",
      type: "backups.complete",
      stats: { succeeded: 1, failed: 2 },
      timestamp: "2024-01-02T03:05:01Z",
      data: {
        started_at: "2024-01-02T03:00:00Z",
        finished_at: "2024-01-02T03:05:00Z",
        results: [
          {
            provider: "GitHub",
            results: {
              backup_results: [
                { repo: "soba/a", status: "ok" },
                { repo: "soba/b", status: "failed", error: "Clone failed: boom" },
              ],
            },
          },
          { provider: "GitLab", results: { backup_results: [], error: "401" } },
        ],
      },
    });
  });

  test("short format omits results", () => {
    const payload = buildWebhookPayload(run, computeStats(run), "short", sentAt);
    expect(payload.data).toEqual({ started_at: "2024-01-02T03:00:00Z", finished_at: "2024-01-02T03:05:00Z" });
  });
});
