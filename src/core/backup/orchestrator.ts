/**
 * Backup orchestration
 *
 * Start -> project -> additional paths -> system artifacts (systemd units,
 * presets, command outputs) -> database -> finish. A fatal stage leaves the
 * partial archive on disk; only a finished archive should be trusted.
 */

import { mkdir, stat } from "node:fs/promises";
import * as path from "node:path";
import type { BackupOptions, BackupResult, ProcessRunner, ResolvedConfig } from "../../types";
import { CollectorError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { formatBytes, formatDuration } from "../../utils/format";
import { generateArchiveName } from "../../utils/naming";
import { isPathWithinDir } from "../../utils/path";
import { defaultProcessRunner } from "../../utils/process";
import { ArchiveWriter } from "./archive-writer";
import { collectCommandOutputs } from "./command-collector";
import { dumpDatabase } from "./database-dumper";
import { ExclusionSet } from "./exclusion";
import { collectAdditionalPaths, collectProject, collectSystemdUnits } from "./file-collector";
import { collectPresets } from "./preset-collector";

export interface BackupRunOptions extends BackupOptions {
  runner?: ProcessRunner;
  /** Timestamp used in the archive name */
  now?: Date;
  /** Stand-ins for /etc and /etc/systemd/system */
  etcDir?: string;
  systemdDir?: string;
  tmpDir?: string;
}

/**
 * Configured exclusions, plus the local backup directory when it sits inside
 * the project so an archive never swallows earlier archives.
 */
export function backupExclusions(config: ResolvedConfig): ExclusionSet {
  const exclusions = new ExclusionSet(config.backup.exclude);
  const { localBackupDir, projectPath } = config.backup;

  if (localBackupDir !== projectPath && isPathWithinDir(localBackupDir, projectPath)) {
    return exclusions.with(localBackupDir + path.sep);
  }
  return exclusions;
}

export async function createBackup(
  config: ResolvedConfig,
  options: BackupRunOptions,
): Promise<BackupResult> {
  const startTime = Date.now();
  const runner = options.runner ?? defaultProcessRunner;
  const kind = options.full ? "full" : "incremental";
  const archiveName = generateArchiveName(kind, options.now);
  const archivePath = path.join(config.backup.localBackupDir, archiveName);

  logger.info(`Starting ${kind} backup: ${archiveName}`);

  await mkdir(config.backup.localBackupDir, { recursive: true });

  const exclusions = backupExclusions(config);
  const writer = await ArchiveWriter.open(archivePath, config.backup.compressionLevel);

  try {
    const projectEntries = await collectProject(writer, config.backup.projectPath, exclusions);
    logger.info(`Project: ${projectEntries} files from ${config.backup.projectPath}`);

    if (config.backup.additionalPaths.length > 0) {
      const added = await collectAdditionalPaths(writer, config.backup.additionalPaths, exclusions);
      logger.info(`Additional paths: ${added} files`);
    }

    const system = config.system;
    if (system) {
      await collectSystemdUnits(writer, system.systemdServices, system.systemdTimers, options.systemdDir);

      if (system.presets) {
        const added = await collectPresets(
          { writer, exclusions, runner, etcDir: options.etcDir },
          system.presets,
        );
        logger.info(`Presets: ${added} files`);
      }

      await collectCommandOutputs(writer, system.commandOutputs, runner);
    }

    if (config.database) {
      let entry: string;
      try {
        entry = await dumpDatabase(writer, config.database, runner, {
          tmpDir: options.tmpDir,
          now: options.now,
        });
      } catch (error) {
        throw new CollectorError(`Failed to backup ${config.database.type} database`, { cause: error });
      }
      logger.info(`Database dump stored as ${entry}`);
    }

    await writer.finish();
  } catch (error) {
    await writer.abort();
    throw error;
  }

  const { size } = await stat(archivePath);
  const durationMs = Date.now() - startTime;

  logger.info(
    `Backup created: ${archiveName} (${writer.entryCount} entries, ${formatBytes(size)}, ${formatDuration(durationMs)})`,
  );

  return {
    archivePath,
    archiveName,
    kind,
    sizeBytes: size,
    entriesCount: writer.entryCount,
    durationMs,
  };
}
