/**
 * Generic JSON webhook
 */

import { assertOk, type HttpClient } from "../providers/http";
import type { BackupStats, RunResult, WebhookFormat } from "../types";
import { rfc3339 } from "./message";

export const WEBHOOK_APP = "repovault";
export const WEBHOOK_EVENT_TYPE = "backups.complete";

export interface WebhookRepoResult {
  repo: string;
  status: string;
  error?: string;
}

export interface WebhookProviderResult {
  provider: string;
  results: {
    backup_results: WebhookRepoResult[];
    error?: string;
  };
}

export interface WebhookPayload {
  app: string;
  type: string;
  stats: { succeeded: number; failed: number };
  timestamp: string;
  data: {
    started_at: string;
    finished_at: string;
    results?: WebhookProviderResult[];
  };
}

export function buildWebhookPayload(
  run: RunResult,
  stats: BackupStats,
  format: WebhookFormat,
  sentAt: Date,
): WebhookPayload {
  const payload: WebhookPayload = {
    app: WEBHOOK_APP,
    type: WEBHOOK_EVENT_TYPE,
    stats: { succeeded: stats.succeeded, failed: stats.failed },
    timestamp: rfc3339(sentAt),
    data: {
      started_at: rfc3339(run.startedAt),
      finished_at: rfc3339(run.finishedAt),
    },
  };

  if (format === "full") {
    payload.data.results = run.providers.map(({ provider, result }) => ({
      provider,
      results: {
        backup_results: result.results.map((r) => ({
          repo: r.repo,
          status: r.status,
          ...(r.error !== undefined && { error: r.error }),
        })),
        ...(result.error !== undefined && { error: result.error }),
      },
    }));
  }

  return payload;
}

export async function sendWebhook(http: HttpClient, url: string, payload: WebhookPayload): Promise<void> {
  const response = await http.send(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(payload),
  });
  assertOk(url, response);
}
