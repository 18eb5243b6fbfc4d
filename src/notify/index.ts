/**
 * Post-run notifications
 */

import { collectErrors, computeStats } from "../core/run/stats";
import { type HttpClient, NOTIFY_RETRY_POLICY } from "../providers/http";
import type { NotifyConfig, RunResult } from "../types";
import type { Logger } from "../utils/logger";
import { maskSecrets } from "../utils/url";
import { sendNtfy } from "./ntfy";
import { sendSlack, slackMessage } from "./slack";
import { sendTelegram, telegramText } from "./telegram";
import { buildWebhookPayload, sendWebhook } from "./webhook";

export { NOTIFICATION_TITLES, notificationTitle, rfc3339 } from "./message";
export { NTFY_TAGS, ntfyMessage, sendNtfy } from "./ntfy";
export { SLACK_POST_MESSAGE_URL, SlackApiError, sendSlack, slackMessage } from "./slack";
export { sendTelegram, TELEGRAM_API_URL, telegramText } from "./telegram";
export { buildWebhookPayload, sendWebhook, type WebhookPayload } from "./webhook";

export interface NotifyDeps {
  http: HttpClient;
  logger: Logger;
  now?: () => Date;
}

function notifySecrets(config: NotifyConfig): string[] {
  return [config.slack?.token, config.telegram?.botToken].filter(
    (secret): secret is string => Boolean(secret),
  );
}

/**
 * Send every configured notification. Failures are logged, never thrown.
 */
export async function notifyAll(run: RunResult, config: NotifyConfig | undefined, deps: NotifyDeps): Promise<void> {
  if (!config) return;

  const log = deps.logger.child("notify");
  const stats = computeStats(run);

  if (config.onFailureOnly && stats.failed === 0) {
    log.info("Skipping notifications (no failures)");
    return;
  }

  const http = deps.http.withPolicy(NOTIFY_RETRY_POLICY);
  const errors = collectErrors(run);
  const secrets = notifySecrets(config);
  const now = deps.now ?? (() => new Date());

  const attempt = async (name: string, send: () => Promise<void>): Promise<void> => {
    try {
      await send();
      log.info(`${name} notification sent`);
    } catch (error) {
      log.error(
        `${name} notification failed: ${maskSecrets(error instanceof Error ? error.message : String(error), secrets)}`,
      );
    }
  };

  const { webhook, ntfy, slack, telegram } = config;

  if (webhook) {
    await attempt("webhook", () =>
      sendWebhook(http, webhook.url, buildWebhookPayload(run, stats, webhook.format ?? "full", now())),
    );
  }

  if (ntfy) {
    await attempt("ntfy", () => sendNtfy(http, ntfy.url, stats, errors));
  }

  if (slack) {
    await attempt("slack", async () => {
      await sendSlack(http, slack.token, slackMessage(slack.channelId, stats, errors));
    });
  }

  if (telegram) {
    await attempt("telegram", () =>
      sendTelegram(http, telegram.botToken, telegram.chatId, telegramText(stats, errors)),
    );
  }
}
