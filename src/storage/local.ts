/**
 * Local backup directory
 */

import { readdir, rm } from "node:fs/promises";
import * as path from "node:path";
import type { BackupDescriptor } from "../types";
import { logger } from "../utils/logger";
import { ARCHIVE_EXTENSION, parseArchiveName } from "../utils/naming";
import { isPathWithinDir, statOrNull } from "../utils/path";
import { errorCode } from "../utils/errors";

/**
 * Every `.zst` file in dir, sorted by name (which sorts by creation time for
 * generated names). A missing directory has no backups.
 */
export async function listLocalBackups(dir: string): Promise<BackupDescriptor[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    if (errorCode(error) === "ENOENT") return [];
    throw error;
  }

  const backups: BackupDescriptor[] = [];
  for (const name of names.filter((n) => n.endsWith(ARCHIVE_EXTENSION)).sort()) {
    const filePath = path.join(dir, name);
    const stats = await statOrNull(filePath);
    if (!stats?.isFile()) continue;

    const parsed = parseArchiveName(name);
    backups.push({
      path: filePath,
      name,
      kind: parsed?.kind ?? (name.includes("-full-") ? "full" : "incremental"),
      createdAt: parsed?.createdAt ?? stats.mtime,
      sizeBytes: stats.size,
      modifiedAt: stats.mtime,
    });
  }

  return backups;
}

/**
 * Remove a backup file. Refuses paths outside the backup directory; a file
 * that is already gone is only logged.
 */
export async function deleteLocalBackup(filePath: string, backupDir: string): Promise<void> {
  if (!isPathWithinDir(filePath, backupDir)) {
    throw new Error(`Refusing to delete ${filePath}: outside ${backupDir}`);
  }

  if (!(await statOrNull(filePath))) {
    logger.warn(`Local file not found (already deleted?): ${filePath}`);
    return;
  }

  await rm(filePath, { force: true });
  logger.debug(`Deleted local file: ${filePath}`);
}
