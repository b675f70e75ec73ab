/**
 * Backup module exports
 */

export { ArchiveWriter, assertCompressionLevel, DEFAULT_COMPRESSION_LEVEL } from "./archive-writer";
export { collectCommandOutputs } from "./command-collector";
export type { ConnectionFields, DatabaseType, DumpOptions, DumpPlan } from "./database-dumper";
export {
  buildDumpPlan,
  dumpDatabase,
  isSupportedDatabaseType,
  requireConnectionFields,
  SUPPORTED_DATABASE_TYPES,
} from "./database-dumper";
export { ExclusionSet } from "./exclusion";
export {
  appendPath,
  appendSingleFile,
  collectAdditionalPaths,
  collectProject,
  collectSystemdUnits,
  DEFAULT_SYSTEMD_DIR,
  PROJECT_PREFIX,
} from "./file-collector";
export type { BackupRunOptions } from "./orchestrator";
export { backupExclusions, createBackup } from "./orchestrator";
export type { PresetContext } from "./preset-collector";
export { collectPresets, crontabArgs, DEFAULT_ETC_DIR } from "./preset-collector";
