/**
 * Centralized type exports for packrat
 */

// Backup types
export type {
  BackupDescriptor,
  BackupKind,
  BackupOptions,
  BackupResult,
  ProcessResult,
  ProcessRunner,
  RunOptions,
} from "./backup";
// Config types
export type {
  BackupSettings,
  CommandOutputSettings,
  DaemonSettings,
  DatabaseSettings,
  LoggingSettings,
  PresetSettings,
  ProviderConfig,
  RawBackupConfig,
  RawCommandOutput,
  RawConfig,
  RawDatabaseConfig,
  RawPresetsConfig,
  RawStorageConfig,
  RawSystemConfig,
  ResolvedConfig,
  SystemSettings,
} from "./config";
// Storage types
export type { HttpClient, IStorageProvider, ProviderName, StorageItem } from "./storage";
