/**
 * Moving archives between the local backup directory and remote storage
 */

import { stat } from "node:fs/promises";
import * as path from "node:path";
import { listLocalBackups } from "../../storage/local";
import type { IStorageProvider, ResolvedConfig, StorageItem } from "../../types";
import { formatBytes } from "../../utils/format";
import { logger } from "../../utils/logger";
import { REMOTE_PREFIX, stripRemotePrefix, toRemoteKey } from "../../utils/naming";

export interface UploadedBackup {
  localPath: string;
  key: string;
  sizeBytes: number;
}

/**
 * Upload one file, or every local `.zst` backup in name order. Each lands
 * under `backups/<filename>`; the first failure stops the run.
 */
export async function uploadBackups(
  config: ResolvedConfig,
  provider: IStorageProvider,
  file?: string,
): Promise<UploadedBackup[]> {
  const files = file
    ? [path.resolve(file)]
    : (await listLocalBackups(config.backup.localBackupDir)).map((backup) => backup.path);

  if (files.length === 0) {
    logger.info(`No local backups in ${config.backup.localBackupDir}`);
    return [];
  }

  const uploaded: UploadedBackup[] = [];
  for (const localPath of files) {
    const { size } = await stat(localPath);
    const key = toRemoteKey(path.basename(localPath));

    logger.info(`Uploading ${path.basename(localPath)} (${formatBytes(size)}) to ${provider.name}...`);
    await provider.upload(key, localPath);
    logger.info(`Uploaded ${key}`);

    uploaded.push({ localPath, key, sizeBytes: size });
  }

  return uploaded;
}

export async function listRemoteBackups(provider: IStorageProvider): Promise<StorageItem[]> {
  const items = await provider.list(REMOTE_PREFIX);
  return items.sort((a, b) => a.key.localeCompare(b.key));
}

/**
 * Download `key` (with or without its `backups/` prefix) to
 * `<outputDir>/<name>`. Returns the local path.
 */
export async function downloadBackup(
  provider: IStorageProvider,
  key: string,
  outputDir: string,
): Promise<string> {
  const remoteKey = toRemoteKey(key);
  const localFile = path.join(outputDir, stripRemotePrefix(key));

  logger.info(`Downloading ${remoteKey} from ${provider.name}...`);
  await provider.download(remoteKey, localFile);
  logger.info(`Downloaded to ${localFile}`);

  return localFile;
}
