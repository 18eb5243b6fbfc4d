/**
 * Schedule expression parsing
 *
 * Cron uses the cron-parser library with standard 5-field expressions:
 *   "0 * * * *"      - Every hour at minute 0
 *   "0 2 * * *"      - Every day at 2:00 AM
 *   "0 3 * * 0"      - Every Sunday at 3:00 AM
 *
 * Intervals are hours or minutes: "24" and "24h" are a day, "30m" half an hour.
 */

import { CronExpressionParser } from "cron-parser";
import { ConfigError } from "../../config/validator";

export interface ParsedCron {
  expression: string;
  timezone?: string;
}

export interface ParseCronOptions {
  timezone?: string;
}

/** Longest delay setInterval accepts */
export const MAX_INTERVAL_MS = 2 ** 31 - 1;

function cronOptions(cron: ParsedCron, currentDate?: Date): { currentDate?: Date; tz?: string } {
  const options: { currentDate?: Date; tz?: string } = {};
  if (currentDate) options.currentDate = currentDate;
  if (cron.timezone) options.tz = cron.timezone;
  return options;
}

export function parseCron(expression: string, options?: ParseCronOptions): ParsedCron {
  // Validate that we have exactly 5 fields (standard cron format)
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5) {
    throw new ConfigError(`Invalid cron expression: "${expression}". Expected 5 fields, got ${fields.length}.`);
  }

  const cron: ParsedCron = { expression: expression.trim(), timezone: options?.timezone };
  try {
    CronExpressionParser.parse(cron.expression, cronOptions(cron));
  } catch (error) {
    throw new ConfigError(
      `Invalid cron expression: "${expression}". ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return cron;
}

export function matchesCron(cron: ParsedCron, date: Date): boolean {
  const testDate = new Date(date);
  testDate.setSeconds(0, 0);

  // Next fire time after the previous minute
  const checkDate = new Date(testDate.getTime() - 60_000);
  const nextDate = CronExpressionParser.parse(cron.expression, cronOptions(cron, checkDate)).next().toDate();
  nextDate.setSeconds(0, 0);

  return nextDate.getTime() === testDate.getTime();
}

export function getNextRun(cron: ParsedCron, fromDate: Date = new Date()): Date {
  return CronExpressionParser.parse(cron.expression, cronOptions(cron, fromDate)).next().toDate();
}

/**
 * Interval in milliseconds. A bare number is hours.
 */
export function parseInterval(value: string): number {
  const match = value.trim().toLowerCase().match(/^(\d+)([hm]?)$/);
  if (!match?.[1]) {
    throw new ConfigError(`Invalid interval "${value}". Use hours ("24", "24h") or minutes ("30m").`);
  }

  const amount = Number.parseInt(match[1], 10);
  const unitMs = match[2] === "m" ? 60_000 : 3_600_000;
  const ms = amount * unitMs;

  if (ms === 0) {
    throw new ConfigError(`Invalid interval "${value}". It must be greater than zero.`);
  }
  if (ms > MAX_INTERVAL_MS) {
    throw new ConfigError(`Invalid interval "${value}". The longest supported interval is 596h.`);
  }
  return ms;
}
