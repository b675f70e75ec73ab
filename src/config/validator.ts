/**
 * Configuration validation
 */

import type { RawConfig } from "../types";
import { isLogLevel } from "../utils/logger";
import { isPlainObject, MAX_INTERVAL_HOURS, type PlainObject } from "./defaults";

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export const MIN_COMPRESSION_LEVEL = 0;
export const MAX_COMPRESSION_LEVEL = 22;

type Validator = (config: PlainObject) => void;

function optionalSection(c: PlainObject, name: string): PlainObject | undefined {
  const value = c[name];
  if (value === undefined || value === null) return undefined;
  if (!isPlainObject(value)) {
    throw new ConfigError(`${name} must be an object`);
  }
  return value;
}

function requiredSection(c: PlainObject, name: string): PlainObject {
  const value = optionalSection(c, name);
  if (!value) {
    throw new ConfigError(`Config must have a '${name}' section`);
  }
  return value;
}

function requireString(section: PlainObject, key: string, label: string): void {
  const value = section[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(`${label}.${key} must be a non-empty string`);
  }
}

function optionalString(section: PlainObject, key: string, label: string): void {
  const value = section[key];
  if (value !== undefined && value !== null && typeof value !== "string") {
    throw new ConfigError(`${label}.${key} must be a string`);
  }
}

function optionalBoolean(section: PlainObject, key: string, label: string): void {
  const value = section[key];
  if (value !== undefined && typeof value !== "boolean") {
    throw new ConfigError(`${label}.${key} must be a boolean`);
  }
}

function optionalStringArray(section: PlainObject, key: string, label: string): void {
  const value = section[key];
  if (value === undefined) return;
  if (!Array.isArray(value) || value.some((item) => typeof item !== "string")) {
    throw new ConfigError(`${label}.${key} must be an array of strings`);
  }
}

function optionalInteger(
  section: PlainObject,
  key: string,
  label: string,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER,
): void {
  const value = section[key];
  if (value === undefined) return;
  if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${label}.${key} must be an integer between ${min} and ${max}`);
  }
}

function optionalPositiveNumber(section: PlainObject, key: string, label: string): void {
  const value = section[key];
  if (value === undefined) return;
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${label}.${key} must be a positive number`);
  }
}

const STORAGE_STRING_FIELDS = [
  "endpoint",
  "region",
  "bucket",
  "access_key",
  "secret_key",
  "account_id",
  "account_name",
  "account_key",
  "application_key",
  "bucket_id",
  "credentials_path",
  "tenant_id",
] as const;

const validators: Record<string, Validator> = {
  storage: (c) => {
    const storage = requiredSection(c, "storage");
    requireString(storage, "provider", "storage");
    for (const field of STORAGE_STRING_FIELDS) {
      optionalString(storage, field, "storage");
    }
  },

  backup: (c) => {
    const backup = requiredSection(c, "backup");
    requireString(backup, "local_backup_dir", "backup");
    requireString(backup, "project_path", "backup");
    optionalStringArray(backup, "additional_paths", "backup");
    optionalStringArray(backup, "exclude", "backup");
    optionalInteger(backup, "retention_days", "backup", 0);
    optionalInteger(
      backup,
      "compression_level",
      "backup",
      MIN_COMPRESSION_LEVEL,
      MAX_COMPRESSION_LEVEL,
    );
  },

  database: (c) => {
    const database = optionalSection(c, "database");
    if (!database) return;
    optionalBoolean(database, "enabled", "database");
    for (const field of ["type", "host", "database", "username", "password"]) {
      optionalString(database, field, "database");
    }
    optionalInteger(database, "port", "database", 1, 65535);
  },

  system: (c) => {
    const system = optionalSection(c, "system");
    if (!system) return;
    optionalStringArray(system, "systemd_services", "system");
    optionalStringArray(system, "systemd_timers", "system");

    const outputs = system.command_outputs;
    if (outputs !== undefined) {
      if (!Array.isArray(outputs)) {
        throw new ConfigError("system.command_outputs must be an array");
      }
      outputs.forEach((output: unknown, i) => validateCommandOutput(output, i));
    }

    const presets = optionalSection(system, "presets");
    if (presets) {
      const label = "system.presets";
      optionalBoolean(presets, "nginx_enabled", label);
      optionalBoolean(presets, "crontab_enabled", label);
      optionalString(presets, "crontab_user", label);
      optionalString(presets, "user_configs_home", label);
      for (const field of ["nginx_sites", "user_configs", "etc_files", "etc_dirs"]) {
        optionalStringArray(presets, field, label);
      }
    }
  },

  logging: (c) => {
    const logging = optionalSection(c, "logging");
    if (!logging) return;
    if (logging.level !== undefined && !isLogLevel(logging.level)) {
      throw new ConfigError("logging.level must be one of debug, info, warn, error");
    }
    optionalString(logging, "log_dir", "logging");
  },

  daemon: (c) => {
    const daemon = optionalSection(c, "daemon");
    if (!daemon) return;
    for (const key of ["backup_interval_hours", "upload_interval_hours"]) {
      optionalPositiveNumber(daemon, key, "daemon");
      const hours = daemon[key];
      if (typeof hours === "number" && hours > MAX_INTERVAL_HOURS) {
        throw new ConfigError(`daemon.${key} must be at most ${MAX_INTERVAL_HOURS} hours`);
      }
    }
  },
};

function validateCommandOutput(output: unknown, index: number): void {
  const label = `system.command_outputs[${index}]`;
  if (!isPlainObject(output)) {
    throw new ConfigError(`${label} must be an object`);
  }
  requireString(output, "command", label);
  requireString(output, "output_file", label);
  optionalStringArray(output, "args", label);
  optionalBoolean(output, "enabled", label);

  const outputFile = output.output_file;
  if (typeof outputFile === "string" && (outputFile.startsWith("/") || outputFile.split("/").includes(".."))) {
    throw new ConfigError(`${label}.output_file must be a relative path inside commands/`);
  }
}

export function validateConfig(config: unknown): asserts config is RawConfig {
  if (!isPlainObject(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
