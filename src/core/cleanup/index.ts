export { type CleanupDeletion, type CleanupOptions, type CleanupResult, runCleanup } from "./orchestrator";
