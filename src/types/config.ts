/**
 * Configuration type definitions for packrat
 *
 * `RawConfig` mirrors the config file (snake_case keys); `ResolvedConfig` is
 * what the rest of the program sees after defaults, env fallbacks and path
 * resolution have been applied once at startup.
 */

import type { LogLevel } from "../utils/logger";

export interface RawStorageConfig {
  provider: string;
  endpoint?: string;
  region?: string;
  bucket?: string;
  access_key?: string;
  secret_key?: string;
  account_id?: string;
  account_name?: string;
  account_key?: string;
  application_key?: string;
  bucket_id?: string;
  credentials_path?: string;
  tenant_id?: string;
}

export interface RawBackupConfig {
  local_backup_dir: string;
  project_path: string;
  additional_paths?: string[];
  retention_days?: number;
  compression_level?: number;
  exclude?: string[];
}

export interface RawDatabaseConfig {
  enabled?: boolean;
  type?: string;
  host?: string;
  port?: number;
  database?: string;
  username?: string;
  password?: string;
}

export interface RawCommandOutput {
  command: string;
  args?: string[];
  output_file: string;
  enabled?: boolean;
}

export interface RawPresetsConfig {
  nginx_enabled?: boolean;
  nginx_sites?: string[];
  crontab_enabled?: boolean;
  crontab_user?: string;
  user_configs?: string[];
  user_configs_home?: string;
  etc_files?: string[];
  etc_dirs?: string[];
}

export interface RawSystemConfig {
  systemd_services?: string[];
  systemd_timers?: string[];
  command_outputs?: RawCommandOutput[];
  presets?: RawPresetsConfig;
}

export interface RawLoggingConfig {
  level?: LogLevel;
  log_dir?: string;
}

export interface RawDaemonConfig {
  backup_interval_hours?: number;
  upload_interval_hours?: number;
}

export interface RawConfig {
  storage: RawStorageConfig;
  backup: RawBackupConfig;
  database?: RawDatabaseConfig;
  system?: RawSystemConfig;
  logging?: RawLoggingConfig;
  daemon?: RawDaemonConfig;
}

/**
 * Superset of every backend's settings. Each adapter reads the fields it
 * needs and rejects the config when one of them is missing.
 */
export interface ProviderConfig {
  readonly provider: string;
  readonly endpoint?: string;
  readonly region: string;
  readonly bucket: string;
  readonly accessKey?: string;
  readonly secretKey?: string;
  readonly accountId?: string;
  readonly accountName?: string;
  readonly accountKey?: string;
  readonly applicationKey?: string;
  readonly bucketId?: string;
  readonly credentialsPath?: string;
  readonly tenantId?: string;
}

export interface BackupSettings {
  readonly localBackupDir: string;
  readonly projectPath: string;
  readonly additionalPaths: readonly string[];
  readonly retentionDays: number;
  readonly compressionLevel: number;
  readonly exclude: readonly string[];
}

export interface DatabaseSettings {
  readonly type: string;
  readonly host?: string;
  readonly port?: number;
  readonly database?: string;
  readonly username?: string;
  /** Config value, then DB_PASSWORD, then the project's .env DATABASE_URL */
  readonly password?: string;
}

export interface CommandOutputSettings {
  readonly command: string;
  readonly args: readonly string[];
  readonly outputFile: string;
  readonly enabled: boolean;
}

export interface PresetSettings {
  readonly nginxEnabled: boolean;
  readonly nginxSites: readonly string[];
  readonly crontabEnabled: boolean;
  /** crontab_user, else $USER, else root */
  readonly crontabUser: string;
  /** $USER at resolution time, used to decide between `crontab -l` and `-u` */
  readonly currentUser?: string;
  readonly userConfigs: readonly string[];
  readonly userConfigsHome: string;
  readonly etcFiles: readonly string[];
  readonly etcDirs: readonly string[];
}

export interface SystemSettings {
  readonly systemdServices: readonly string[];
  readonly systemdTimers: readonly string[];
  readonly commandOutputs: readonly CommandOutputSettings[];
  readonly presets?: PresetSettings;
}

export interface LoggingSettings {
  readonly level: LogLevel;
  readonly logDir: string;
}

export interface DaemonSettings {
  readonly backupIntervalHours: number;
  readonly uploadIntervalHours: number;
}

export interface ResolvedConfig {
  /** Absolute path of the file this config was loaded from, if any */
  readonly sourcePath?: string;
  readonly storage: ProviderConfig;
  readonly backup: BackupSettings;
  /** Present only when database backup is enabled */
  readonly database?: DatabaseSettings;
  readonly system?: SystemSettings;
  readonly logging: LoggingSettings;
  readonly daemon: DaemonSettings;
}
