export { type RunDeps, runBackups } from "./coordinator";
export { collectErrors, computeStats, type RunOutcome, runOutcome } from "./stats";
