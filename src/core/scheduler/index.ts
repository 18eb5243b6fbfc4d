export {
  getNextRun,
  MAX_INTERVAL_MS,
  matchesCron,
  type ParseCronOptions,
  type ParsedCron,
  parseCron,
  parseInterval,
} from "./cron-parser";
export { Scheduler, type SchedulerOptions, type SchedulerStatus } from "./daemon";
