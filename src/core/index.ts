/**
 * Core module exports
 */

// Backup
export { type BackupRunOptions, createBackup } from "./backup";

// Cleanup
export { type CleanupOptions, type CleanupResult, runCleanup } from "./cleanup";

// Transfer
export {
  DEFAULT_RESTORE_DIR,
  downloadBackup,
  listRemoteBackups,
  restoreBackup,
  type UploadedBackup,
  uploadBackups,
} from "./transfer";

// Scheduler
export { Daemon, type DaemonTaskName, type DaemonTasks } from "./scheduler/daemon";
