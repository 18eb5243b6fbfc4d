/**
 * Slack chat.postMessage
 */

import type { HttpClient } from "../providers/http";
import type { BackupStats } from "../types";
import { notificationTitle } from "./message";

export const SLACK_POST_MESSAGE_URL = "https://slack.com/api/chat.postMessage";

export interface SlackMessage {
  channel: string;
  text: string;
  attachments: Array<{ pretext: string; text: string }>;
}

interface SlackResponse {
  ok: boolean;
  error?: string;
  channel?: string;
  ts?: string;
}

export class SlackApiError extends Error {
  constructor(code: string) {
    super(`Slack API error: ${code}`);
    this.name = "SlackApiError";
  }
}

export function slackMessage(channel: string, stats: BackupStats, errors: string[]): SlackMessage {
  return {
    channel,
    text: notificationTitle(stats),
    attachments: [
      {
        pretext: `succeeded: ${stats.succeeded}, failed: ${stats.failed}`,
        text: errors.join("\n"),
      },
    ],
  };
}

/**
 * Slack answers 200 with `ok: false` on API errors
 */
export async function sendSlack(
  http: HttpClient,
  token: string,
  message: SlackMessage,
): Promise<{ channel?: string; ts?: string }> {
  const { data } = await http.postJson<SlackResponse>(SLACK_POST_MESSAGE_URL, message, {
    Authorization: `Bearer ${token}`,
  });
  if (!data.ok) {
    throw new SlackApiError(data.error ?? "unknown");
  }
  return { channel: data.channel, ts: data.ts };
}
