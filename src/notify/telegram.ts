/**
 * Telegram Bot API sendMessage
 */

import { assertOk, type HttpClient } from "../providers/http";
import type { BackupStats } from "../types";
import { countsLine, notificationTitle } from "./message";

export const TELEGRAM_API_URL = "https://api.telegram.org";

export function telegramText(stats: BackupStats, errors: string[]): string {
  let text = `${notificationTitle(stats)}\n${countsLine(stats)}`;
  const first = errors[0];
  if (first) {
    text += `\nerror: ${first}`;
  }
  return text;
}

export async function sendTelegram(
  http: HttpClient,
  botToken: string,
  chatId: string,
  text: string,
): Promise<void> {
  const url = `${TELEGRAM_API_URL}/bot${botToken}/sendMessage`;
  const response = await http.send(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ chat_id: chatId, text }),
  });
  assertOk(url, response);
}
