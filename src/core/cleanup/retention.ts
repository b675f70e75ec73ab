/**
 * Retention policy: age cutoff in days
 */

import type { BackupDescriptor, StorageItem } from "../../types";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Anything last modified before the returned instant is expired.
 * `retentionDays = 0` expires everything older than now.
 */
export function retentionCutoff(retentionDays: number, now: Date = new Date()): Date {
  return new Date(now.getTime() - retentionDays * DAY_MS);
}

export function expiredLocalBackups(backups: BackupDescriptor[], cutoff: Date): BackupDescriptor[] {
  return backups.filter((backup) => backup.modifiedAt.getTime() < cutoff.getTime());
}

/**
 * Remote items without a modification time are never expired.
 */
export function expiredRemoteItems(items: StorageItem[], cutoff: Date): StorageItem[] {
  return items.filter(
    (item) => item.lastModified !== undefined && item.lastModified.getTime() < cutoff.getTime(),
  );
}
