/**
 * ntfy.sh topic publishing
 */

import { assertOk, type HttpClient } from "../providers/http";
import type { BackupStats } from "../types";
import { countsLine, notificationTitle } from "./message";

export const NTFY_TAGS = "repovault,backup,git";

export function ntfyMessage(stats: BackupStats, errors: string[]): string {
  const first = errors[0];
  return first ? `${countsLine(stats)}\nerror: ${first}` : countsLine(stats);
}

export async function sendNtfy(
  http: HttpClient,
  topicUrl: string,
  stats: BackupStats,
  errors: string[],
): Promise<void> {
  const response = await http.send(topicUrl, {
    method: "POST",
    headers: {
      Title: notificationTitle(stats),
      Tags: NTFY_TAGS,
      "Content-Type": "text/plain",
    },
    body: ntfyMessage(stats, errors),
  });
  assertOk(topicUrl, response);
}
