/**
 * Storage module exports and the provider factory
 */

import { ConfigError } from "../config/validator";
import type { HttpClient, IStorageProvider, ProcessRunner, ProviderConfig, ProviderName } from "../types";
import { defaultProcessRunner } from "../utils/process";
import { AzureStorageProvider } from "./azure";
import { B2StorageProvider } from "./b2";
import { BoxStorageProvider } from "./box";
import { DropboxStorageProvider } from "./dropbox";
import { GcsStorageProvider } from "./gcs";
import { GoogleDriveStorageProvider } from "./google-drive";
import { MegaStorageProvider } from "./mega";
import { OneDriveStorageProvider } from "./onedrive";
import { PCloudStorageProvider } from "./pcloud";
import { S3StorageProvider } from "./s3";

export { AzureStorageProvider } from "./azure";
export { B2StorageProvider, encodeB2FileName } from "./b2";
export { BoxStorageProvider } from "./box";
export { DropboxStorageProvider } from "./dropbox";
export { GcsStorageProvider } from "./gcs";
export { GoogleDriveStorageProvider } from "./google-drive";
export { deleteLocalBackup, listLocalBackups } from "./local";
export { MegaStorageProvider, parseMegaListing } from "./mega";
export { OneDriveStorageProvider } from "./onedrive";
export { PCloudStorageProvider, pcloudHost } from "./pcloud";
export { S3StorageProvider } from "./s3";

const PROVIDER_ALIASES: Record<string, ProviderName> = {
  s3: "s3",
  aws: "s3",
  contabo: "s3",
  digitalocean: "s3",
  wasabi: "s3",
  minio: "s3",
  r2: "s3",
  gcs: "gcs",
  google: "gcs",
  azure: "azure",
  b2: "b2",
  backblaze: "b2",
  googledrive: "googledrive",
  gdrive: "googledrive",
  onedrive: "onedrive",
  dropbox: "dropbox",
  box: "box",
  mega: "mega",
  pcloud: "pcloud",
};

/** S3-compatible services that need path-style addressing */
const PATH_STYLE_ALIASES = new Set(["minio", "contabo"]);

export interface StorageDeps {
  http?: HttpClient;
  runner?: ProcessRunner;
}

export function resolveProviderName(alias: string): ProviderName {
  const name = PROVIDER_ALIASES[alias.trim().toLowerCase()];
  if (!name) {
    throw new ConfigError(
      `Unknown storage provider: ${alias}. Supported: ${Object.keys(PROVIDER_ALIASES).join(", ")}`,
    );
  }
  return name;
}

/**
 * Endpoint for an S3-compatible alias. Undefined means the SDK default.
 */
export function resolveS3Endpoint(alias: string, config: ProviderConfig): string | undefined {
  switch (alias.trim().toLowerCase()) {
    case "aws":
      return `https://s3.${config.region}.amazonaws.com`;
    case "digitalocean":
      return `https://${config.region}.digitaloceanspaces.com`;
    case "wasabi":
      return `https://s3.${config.region}.wasabisys.com`;
    case "r2":
      return `https://${requireField(config.accountId, "r2", "account_id")}.r2.cloudflarestorage.com`;
    default:
      return config.endpoint;
  }
}

function requireField(value: string | undefined, provider: string, field: string): string {
  if (!value) {
    throw new ConfigError(`storage.${field} is required for provider ${provider}`);
  }
  return value;
}

/**
 * Build the adapter for config.provider. Required fields are checked here,
 * before any network or process activity.
 */
export function createStorageProvider(config: ProviderConfig, deps: StorageDeps = {}): IStorageProvider {
  const alias = config.provider;
  const name = resolveProviderName(alias);
  const { http } = deps;

  switch (name) {
    case "s3":
      return new S3StorageProvider({
        bucket: requireField(config.bucket, alias, "bucket"),
        accessKeyId: requireField(config.accessKey, alias, "access_key"),
        secretAccessKey: requireField(config.secretKey, alias, "secret_key"),
        region: config.region,
        endpoint: resolveS3Endpoint(alias, config),
        forcePathStyle: PATH_STYLE_ALIASES.has(alias.trim().toLowerCase()),
      });
    case "gcs":
      return new GcsStorageProvider({
        bucket: requireField(config.bucket, alias, "bucket"),
        credentialsPath: config.credentialsPath,
      });
    case "azure":
      return new AzureStorageProvider({
        container: requireField(config.bucket, alias, "bucket"),
        accountName: requireField(config.accountName, alias, "account_name"),
        accountKey: requireField(config.accountKey, alias, "account_key"),
        endpoint: config.endpoint,
      });
    case "b2":
      return new B2StorageProvider({
        accountId: requireField(config.accountId, alias, "account_id"),
        applicationKey: requireField(config.applicationKey, alias, "application_key"),
        bucketId: requireField(config.bucketId, alias, "bucket_id"),
        bucketName: requireField(config.bucket, alias, "bucket"),
        http,
      });
    case "googledrive":
      return new GoogleDriveStorageProvider({
        accessToken: requireField(config.accessKey, alias, "access_key"),
        folderId: config.bucketId,
        http,
      });
    case "onedrive":
      return new OneDriveStorageProvider({
        accessToken: requireField(config.accessKey, alias, "access_key"),
        folderPath: config.bucketId,
        http,
      });
    case "dropbox":
      return new DropboxStorageProvider({
        accessToken: requireField(config.accessKey, alias, "access_key"),
        rootPath: config.bucketId,
        http,
      });
    case "box":
      return new BoxStorageProvider({
        accessToken: requireField(config.accessKey, alias, "access_key"),
        folderId: config.bucketId,
        http,
      });
    case "pcloud":
      return new PCloudStorageProvider({
        accessToken: requireField(config.accessKey, alias, "access_key"),
        region: config.region,
        rootPath: config.bucketId,
        http,
      });
    case "mega":
      return new MegaStorageProvider({
        email: requireField(config.accountName, alias, "account_name"),
        password: requireField(config.accountKey, alias, "account_key"),
        rootPath: config.bucketId,
        runner: deps.runner ?? defaultProcessRunner,
      });
    default: {
      const unreachable: never = name;
      throw new ConfigError(`Unsupported storage provider: ${String(unreachable)}`);
    }
  }
}
