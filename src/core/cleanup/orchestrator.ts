/**
 * Cleanup orchestration
 */

import { deleteLocalBackup, listLocalBackups } from "../../storage/local";
import type { BackupDescriptor, IStorageProvider, ResolvedConfig, StorageItem } from "../../types";
import { logger } from "../../utils/logger";
import { REMOTE_PREFIX } from "../../utils/naming";
import { expiredLocalBackups, expiredRemoteItems, retentionCutoff } from "./retention";

export interface CleanupOptions {
  dryRun?: boolean;
  /** Clock override for tests */
  now?: () => Date;
}

export interface CleanupResult {
  dryRun: boolean;
  /** Cutoff applied to the local directory */
  cutoff: Date;
  /** Local backups deleted, or that would be under dry-run */
  local: BackupDescriptor[];
  /** Remote items deleted; always empty under dry-run */
  remote: StorageItem[];
}

export async function runCleanup(
  config: ResolvedConfig,
  provider: IStorageProvider,
  options: CleanupOptions = {},
): Promise<CleanupResult> {
  const dryRun = options.dryRun ?? false;
  const now = options.now ?? (() => new Date());
  const { localBackupDir, retentionDays } = config.backup;

  logger.info(`Cleaning local backups older than ${retentionDays} day(s)...`);
  const cutoff = retentionCutoff(retentionDays, now());
  const local = expiredLocalBackups(await listLocalBackups(localBackupDir), cutoff);

  for (const backup of local) {
    if (dryRun) {
      logger.info(`[DRY RUN] Would delete: ${backup.path}`);
      continue;
    }
    await deleteLocalBackup(backup.path, localBackupDir);
    logger.info(`Deleted: ${backup.path}`);
  }

  const remote: StorageItem[] = [];
  if (!dryRun) {
    logger.info("Cleaning remote backups...");
    const remoteCutoff = retentionCutoff(retentionDays, now());
    for (const item of expiredRemoteItems(await provider.list(REMOTE_PREFIX), remoteCutoff)) {
      await provider.delete(item.key);
      logger.info(`Deleted remote: ${item.key}`);
      remote.push(item);
    }
  }

  return { dryRun, cutoff, local, remote };
}
