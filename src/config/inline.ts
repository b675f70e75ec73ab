/**
 * Storage settings given as CLI flags, for the config-free `client` command
 */

import type { ProviderConfig, RawStorageConfig } from "../types";
import { type Environment, resolveProviderConfig } from "./resolver";
import { ConfigError } from "./validator";

/**
 * parseArgs option descriptors; flag names follow the config file keys
 */
export const PROVIDER_FLAG_OPTIONS = {
  provider: { type: "string" },
  endpoint: { type: "string" },
  region: { type: "string" },
  bucket: { type: "string" },
  "access-key": { type: "string" },
  "secret-key": { type: "string" },
  "account-id": { type: "string" },
  "account-name": { type: "string" },
  "account-key": { type: "string" },
  "application-key": { type: "string" },
  "bucket-id": { type: "string" },
  "credentials-path": { type: "string" },
} as const;

function stringFlag(values: Record<string, unknown>, name: string): string | undefined {
  const value = values[name];
  return typeof value === "string" ? value : undefined;
}

export function hasProviderFlags(values: Record<string, unknown>): boolean {
  return stringFlag(values, "provider") !== undefined;
}

/**
 * Build a provider config from `--provider`, `--bucket`, `--access-key`, ...
 */
export function providerConfigFromFlags(
  values: Record<string, unknown>,
  env: Environment = {},
): ProviderConfig {
  const provider = stringFlag(values, "provider");
  if (!provider) {
    throw new ConfigError("--provider is required when no config file is used");
  }

  const raw: RawStorageConfig = {
    provider,
    endpoint: stringFlag(values, "endpoint"),
    region: stringFlag(values, "region"),
    bucket: stringFlag(values, "bucket"),
    access_key: stringFlag(values, "access-key"),
    secret_key: stringFlag(values, "secret-key"),
    account_id: stringFlag(values, "account-id"),
    account_name: stringFlag(values, "account-name"),
    account_key: stringFlag(values, "account-key"),
    application_key: stringFlag(values, "application-key"),
    bucket_id: stringFlag(values, "bucket-id"),
    credentials_path: stringFlag(values, "credentials-path"),
  };

  return resolveProviderConfig(raw, env, process.cwd());
}
