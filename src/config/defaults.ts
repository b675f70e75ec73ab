/**
 * Default configuration values
 */

export type PlainObject = Record<string, unknown>;

export const DEFAULT_REGION = "us-east-1";
export const DEFAULT_RETENTION_DAYS = 7;
export const DEFAULT_COMPRESSION_LEVEL = 3;
export const DEFAULT_DATABASE_TYPE = "postgres";
export const DEFAULT_LOG_DIR = "./logs";
export const DEFAULT_BACKUP_INTERVAL_HOURS = 6;
export const DEFAULT_UPLOAD_INTERVAL_HOURS = 24;
/** Longest interval a Node timer can hold (2^31 - 1 ms), in whole hours */
export const MAX_INTERVAL_HOURS = Math.floor((2 ** 31 - 1) / (60 * 60 * 1000));

export const DEFAULT_CONFIG = {
  storage: {
    region: DEFAULT_REGION,
  },
  backup: {
    additional_paths: [],
    retention_days: DEFAULT_RETENTION_DAYS,
    compression_level: DEFAULT_COMPRESSION_LEVEL,
    exclude: [],
  },
  logging: {
    level: "info",
    log_dir: DEFAULT_LOG_DIR,
  },
  daemon: {
    backup_interval_hours: DEFAULT_BACKUP_INTERVAL_HOURS,
    upload_interval_hours: DEFAULT_UPLOAD_INTERVAL_HOURS,
  },
};

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target. Arrays are
 * replaced, not concatenated.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
