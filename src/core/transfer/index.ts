/**
 * Transfer module exports
 */

export { downloadBackup, listRemoteBackups, type UploadedBackup, uploadBackups } from "./remote";
export { DEFAULT_RESTORE_DIR, restoreBackup } from "./restore";
