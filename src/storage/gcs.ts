/**
 * Google Cloud Storage provider
 */

import { mkdir } from "node:fs/promises";
import * as path from "node:path";
import { type Bucket, Storage } from "@google-cloud/storage";
import type { IStorageProvider, StorageItem } from "../types";
import { RemoteProtocolError } from "../utils/errors";

export interface GcsProviderOptions {
  bucket: string;
  /** Service-account key file; without it the library's default credentials apply */
  credentialsPath?: string;
}

export class GcsStorageProvider implements IStorageProvider {
  readonly name = "gcs" as const;
  private readonly bucket: Bucket;

  constructor(options: GcsProviderOptions) {
    const storage = new Storage(options.credentialsPath ? { keyFilename: options.credentialsPath } : {});
    this.bucket = storage.bucket(options.bucket);
  }

  private async call<T>(operation: string, key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new RemoteProtocolError(this.name, `${operation} gs://${this.bucket.name}/${key} failed`, {
        cause: error,
      });
    }
  }

  async upload(key: string, localFile: string): Promise<void> {
    await this.call("upload", key, () => this.bucket.upload(localFile, { destination: key }));
  }

  async download(key: string, localFile: string): Promise<void> {
    await mkdir(path.dirname(localFile), { recursive: true });
    await this.call("download", key, () => this.bucket.file(key).download({ destination: localFile }));
  }

  async list(prefix: string): Promise<StorageItem[]> {
    const [files] = await this.call("list", prefix, () =>
      this.bucket.getFiles({ prefix, autoPaginate: true }),
    );

    return files.map((file) => {
      const { size, updated } = file.metadata;
      return {
        key: file.name,
        size: Number(size ?? 0),
        lastModified: updated ? new Date(updated) : undefined,
      };
    });
  }

  async delete(key: string): Promise<void> {
    await this.call("delete", key, () => this.bucket.file(key).delete());
  }
}
