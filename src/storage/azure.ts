/**
 * Azure Blob Storage provider
 */

import { mkdir } from "node:fs/promises";
import * as path from "node:path";
import {
  BlobServiceClient,
  type ContainerClient,
  StorageSharedKeyCredential,
} from "@azure/storage-blob";
import type { IStorageProvider, StorageItem } from "../types";
import { RemoteProtocolError } from "../utils/errors";

export interface AzureProviderOptions {
  accountName: string;
  accountKey: string;
  container: string;
  /** Defaults to https://<account>.blob.core.windows.net */
  endpoint?: string;
}

export class AzureStorageProvider implements IStorageProvider {
  readonly name = "azure" as const;
  private readonly container: ContainerClient;

  constructor(options: AzureProviderOptions) {
    const credential = new StorageSharedKeyCredential(options.accountName, options.accountKey);
    const serviceUrl = options.endpoint ?? `https://${options.accountName}.blob.core.windows.net`;
    this.container = new BlobServiceClient(serviceUrl, credential).getContainerClient(options.container);
  }

  private async call<T>(operation: string, key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const status =
        error instanceof Error && "statusCode" in error && typeof error.statusCode === "number"
          ? error.statusCode
          : undefined;
      throw new RemoteProtocolError(
        this.name,
        `${operation} ${this.container.containerName}/${key} failed`,
        { cause: error, status },
      );
    }
  }

  async upload(key: string, localFile: string): Promise<void> {
    await this.call("upload", key, () => this.container.getBlockBlobClient(key).uploadFile(localFile));
  }

  async download(key: string, localFile: string): Promise<void> {
    await mkdir(path.dirname(localFile), { recursive: true });
    await this.call("download", key, () => this.container.getBlobClient(key).downloadToFile(localFile));
  }

  async list(prefix: string): Promise<StorageItem[]> {
    return this.call("list", prefix, async () => {
      const items: StorageItem[] = [];
      for await (const blob of this.container.listBlobsFlat({ prefix })) {
        items.push({
          key: blob.name,
          size: blob.properties.contentLength ?? 0,
          lastModified: blob.properties.lastModified,
        });
      }
      return items;
    });
  }

  async delete(key: string): Promise<void> {
    await this.call("delete", key, () => this.container.deleteBlob(key));
  }
}
