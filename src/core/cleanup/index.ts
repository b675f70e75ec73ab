/**
 * Cleanup module exports
 */

export { type CleanupOptions, type CleanupResult, runCleanup } from "./orchestrator";
export { expiredLocalBackups, expiredRemoteItems, retentionCutoff } from "./retention";
