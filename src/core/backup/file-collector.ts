/**
 * Filesystem collectors: project tree, additional paths, systemd units
 */

import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { CollectorError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { statOrNull, toArchivePath } from "../../utils/path";
import type { ArchiveWriter } from "./archive-writer";
import type { ExclusionSet } from "./exclusion";

export const PROJECT_PREFIX = "project";
export const DEFAULT_SYSTEMD_DIR = "/etc/systemd/system";

/**
 * The primary project tree. Any failure here aborts the backup.
 */
export async function collectProject(
  writer: ArchiveWriter,
  projectPath: string,
  exclusions: ExclusionSet,
): Promise<number> {
  try {
    return await writer.appendTree(projectPath, PROJECT_PREFIX, exclusions);
  } catch (error) {
    throw new CollectorError(`Failed to backup project directory ${projectPath}`, { cause: error });
  }
}

/**
 * Append one file outside of a tree walk. Returns false when the file was
 * excluded or could not be read.
 */
export async function appendSingleFile(
  writer: ArchiveWriter,
  sourcePath: string,
  archivePath: string,
  exclusions?: ExclusionSet,
): Promise<boolean> {
  if (exclusions?.excludesFile(sourcePath)) {
    logger.debug(`Excluded: ${sourcePath}`);
    return false;
  }

  let bytes: Buffer;
  try {
    bytes = await readFile(sourcePath);
  } catch (error) {
    logger.debug(`Skipping unreadable file ${sourcePath}`, error);
    return false;
  }

  await writer.appendEntry(archivePath, bytes);
  return true;
}

/**
 * A path that may be a file or a directory. Missing paths are skipped and
 * reported as 0 entries.
 */
export async function appendPath(
  writer: ArchiveWriter,
  sourcePath: string,
  archivePath: string,
  exclusions: ExclusionSet,
): Promise<number> {
  const stats = await statOrNull(sourcePath);
  if (!stats) {
    logger.debug(`Not found, skipping: ${sourcePath}`);
    return 0;
  }

  if (stats.isDirectory()) {
    return writer.appendTree(sourcePath, archivePath, exclusions);
  }

  return (await appendSingleFile(writer, sourcePath, archivePath, exclusions)) ? 1 : 0;
}

/**
 * Extra paths from `backup.additional_paths`: directories become
 * `system/<basename>/...`, files `system/<filename>`.
 */
export async function collectAdditionalPaths(
  writer: ArchiveWriter,
  paths: readonly string[],
  exclusions: ExclusionSet,
): Promise<number> {
  let added = 0;

  for (const sourcePath of paths) {
    const stats = await statOrNull(sourcePath);
    if (!stats) {
      logger.warn(`Path does not exist, skipping: ${sourcePath}`);
      continue;
    }

    const archivePath = toArchivePath("system", path.basename(sourcePath));
    if (stats.isDirectory()) {
      try {
        added += await writer.appendTree(sourcePath, archivePath, exclusions);
      } catch (error) {
        throw new CollectorError(`Failed to backup directory ${sourcePath}`, { cause: error });
      }
    } else if (await appendSingleFile(writer, sourcePath, archivePath, exclusions)) {
      added++;
    }
  }

  return added;
}

export async function collectSystemdUnits(
  writer: ArchiveWriter,
  services: readonly string[],
  timers: readonly string[],
  systemdDir: string = DEFAULT_SYSTEMD_DIR,
): Promise<number> {
  let added = 0;

  for (const [kind, names] of [
    ["services", services],
    ["timers", timers],
  ] as const) {
    for (const name of names) {
      const unitPath = path.join(systemdDir, name);
      if (await appendSingleFile(writer, unitPath, toArchivePath("systemd", kind, name))) {
        added++;
      } else {
        logger.debug(`Systemd unit not found: ${unitPath}`);
      }
    }
  }

  return added;
}
