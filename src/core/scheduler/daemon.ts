/**
 * Scheduler daemon
 */

import type { ScheduleConfig } from "../../types";
import { logger as defaultLogger, type Logger } from "../../utils/logger";
import { ConfigError } from "../../config/validator";
import { getNextRun, matchesCron, type ParsedCron, parseCron, parseInterval } from "./cron-parser";

type Trigger = { kind: "cron"; cron: ParsedCron } | { kind: "interval"; intervalMs: number; expression: string };

export interface SchedulerOptions {
  schedule: ScheduleConfig;
  /** One backup run; errors are logged */
  run: () => Promise<void>;
  logger?: Logger;
  now?: () => Date;
}

export interface SchedulerStatus {
  mode: "cron" | "interval";
  expression: string;
  started: boolean;
  running: boolean;
  lastRun: Date | null;
  nextRun: Date | null;
}

const CRON_CHECK_MS = 60_000;

export class Scheduler {
  private readonly trigger: Trigger;
  private readonly job: () => Promise<void>;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private started = false;
  private active: Promise<void> | null = null;
  private lastRun: Date | null = null;
  private lastCronMinute: number | null = null;
  private checkInterval: NodeJS.Timeout | null = null;

  constructor(options: SchedulerOptions) {
    const { cron, interval } = options.schedule;
    if (cron) {
      this.trigger = { kind: "cron", cron: parseCron(cron) };
    } else if (interval) {
      this.trigger = { kind: "interval", intervalMs: parseInterval(interval), expression: interval };
    } else {
      throw new ConfigError("A schedule needs a cron expression or an interval");
    }

    this.job = options.run;
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.started) {
      this.logger.warn("Scheduler is already running");
      return;
    }

    this.started = true;

    if (this.trigger.kind === "cron") {
      this.logger.info(`Scheduler started (cron "${this.trigger.cron.expression}")`);
      this.checkCron();
      this.checkInterval = setInterval(() => this.checkCron(), CRON_CHECK_MS);
    } else {
      this.logger.info(`Scheduler started (every ${this.trigger.expression})`);
      this.runNow();
      this.checkInterval = setInterval(() => this.runNow(), this.trigger.intervalMs);
    }
  }

  /**
   * Stop scheduling. Resolves once any active run has finished.
   */
  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }

    this.started = false;

    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
    }

    this.logger.info("Scheduler stopped");
    await this.active;
  }

  private checkCron(): void {
    if (this.trigger.kind !== "cron") return;

    const minute = this.now();
    minute.setSeconds(0, 0);

    if (!matchesCron(this.trigger.cron, minute) || this.lastCronMinute === minute.getTime()) {
      return;
    }

    this.lastCronMinute = minute.getTime();
    this.runNow();
  }

  /**
   * Start a run unless one is still going
   */
  private runNow(): void {
    if (this.active) {
      this.logger.warn("Previous backup run still in progress, skipping this one");
      return;
    }

    this.lastRun = this.now();
    this.active = this.execute().finally(() => {
      this.active = null;
    });
  }

  private async execute(): Promise<void> {
    try {
      await this.job();
    } catch (error) {
      this.logger.error(`Scheduled run failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  getNextRun(): Date | null {
    if (!this.started) {
      return null;
    }

    if (this.trigger.kind === "cron") {
      return getNextRun(this.trigger.cron, this.now());
    }

    return this.lastRun ? new Date(this.lastRun.getTime() + this.trigger.intervalMs) : this.now();
  }

  getStatus(): SchedulerStatus {
    return {
      mode: this.trigger.kind,
      expression: this.trigger.kind === "cron" ? this.trigger.cron.expression : this.trigger.expression,
      started: this.started,
      running: this.active !== null,
      lastRun: this.lastRun,
      nextRun: this.getNextRun(),
    };
  }
}
