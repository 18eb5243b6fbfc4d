/**
 * Backup pipeline exports
 */

export { backupProvider, type OrchestratorContext } from "./orchestrator";
export { AsyncQueue } from "./queue";
export { latestBundleHeads, type RemoteDiffContext, remoteMatchesLocal } from "./remote-diff";
export { backupRepository, type WorkerContext } from "./worker";
