import { parseArgs } from "node:util";
import { INLINE_CONFIG_OPTIONS } from "../../config";
import { computeStats, runBackups } from "../../core/run";
import { Scheduler } from "../../core/scheduler";
import { logger } from "../../utils/logger";
import { COMMON_OPTIONS, loadCommandConfig } from "../config";
import { color, ui } from "../ui";

export async function startCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      cron: { type: "string" },
      interval: { type: "string" },
      // Inline config options
      ...INLINE_CONFIG_OPTIONS,
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values);

    ui.banner("scheduler");

    const schedule =
      values.cron || values.interval ? { cron: values.cron, interval: values.interval } : config.schedule;
    if (!schedule?.cron && !schedule?.interval) {
      ui.error("No schedule configured");
      ui.info("Set schedule.cron or schedule.interval, GIT_BACKUP_CRON or GIT_BACKUP_INTERVAL, or pass --cron/--interval");
      return 1;
    }

    const scheduler = new Scheduler({
      schedule,
      logger,
      run: async () => {
        const stats = computeStats(await runBackups(config, { logger }));
        logger.info(`Scheduled run done: ${stats.succeeded} succeeded, ${stats.failed} failed`);
      },
    });

    const done = new Promise<void>((resolve) => {
      const shutdown = () => {
        ui.cancel("Shutting down, waiting for the current run to finish...");
        scheduler.stop().then(resolve, resolve);
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

    scheduler.start();

    const status = scheduler.getStatus();
    ui.step(`Schedule: ${color.cyan(status.mode)} ${color.dim(status.expression)}`);
    ui.success("Scheduler is running");
    ui.info("Press Ctrl+C to stop");

    await done;
    return 0;
  } catch (error) {
    ui.error(`Failed to start: ${error instanceof Error ? error.message : String(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("repovault start")} - Start the scheduler daemon

${color.dim("USAGE:")}
  repovault start [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./repovault.config.yaml)
      --cron <expr>       Cron schedule, overrides the configured one
      --interval <value>  Interval schedule: "24", "24h" or "30m"
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
      --backup-dir <path>     Backup root directory
      --retain <n>            Bundles to keep per repository, 0 keeps all
      --compare <mode>        clone or refs

${color.dim("SCHEDULE FORMAT:")}
  Cron schedules use standard cron format: minute hour day-of-month month day-of-week

    "0 * * * *"     - Every hour at minute 0
    "0 2 * * *"     - Every day at 2:00 AM
    "*/15 * * * *"  - Every 15 minutes

  Intervals run once at start and then every interval. A run still in
  progress when the next one is due makes the scheduler skip that one.

${color.dim("EXAMPLES:")}
  repovault start                          # Schedule from config or env
  repovault start --interval 12h           # Every twelve hours
  repovault start --cron "0 3 * * *"       # Every day at 3:00 AM
`);
}
