/**
 * S3-compatible storage provider (AWS, DigitalOcean Spaces, Wasabi, R2,
 * MinIO, Contabo, ...)
 */

import { createReadStream, createWriteStream } from "node:fs";
import { mkdir, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import {
  DeleteObjectCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import type { IStorageProvider, StorageItem } from "../types";
import { RemoteProtocolError } from "../utils/errors";
import { logger } from "../utils/logger";

export interface S3ProviderOptions {
  bucket: string;
  region: string;
  endpoint?: string;
  accessKeyId: string;
  secretAccessKey: string;
  forcePathStyle?: boolean;
}

export class S3StorageProvider implements IStorageProvider {
  readonly name = "s3" as const;
  private readonly client: S3Client;
  private readonly bucket: string;

  constructor(options: S3ProviderOptions) {
    this.bucket = options.bucket;
    this.client = new S3Client({
      region: options.region,
      endpoint: options.endpoint,
      forcePathStyle: options.forcePathStyle,
      credentials: {
        accessKeyId: options.accessKeyId,
        secretAccessKey: options.secretAccessKey,
      },
    });
  }

  private async call<T>(operation: string, key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const status = error instanceof S3ServiceException ? error.$metadata.httpStatusCode : undefined;
      throw new RemoteProtocolError(this.name, `${operation} s3://${this.bucket}/${key} failed`, {
        cause: error,
        status,
      });
    }
  }

  async upload(key: string, localFile: string): Promise<void> {
    const { size } = await stat(localFile);
    logger.debug(`Uploading to S3: s3://${this.bucket}/${key}`);

    await this.call("PutObject", key, () =>
      this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: createReadStream(localFile),
          ContentLength: size,
        }),
      ),
    );
  }

  async download(key: string, localFile: string): Promise<void> {
    const response = await this.call("GetObject", key, () =>
      this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key })),
    );

    const body = response.Body;
    if (!body) {
      throw new RemoteProtocolError(this.name, `GetObject s3://${this.bucket}/${key} returned no body`);
    }

    await mkdir(path.dirname(localFile), { recursive: true });
    if (body instanceof Readable) {
      await pipeline(body, createWriteStream(localFile));
    } else {
      await writeFile(localFile, await body.transformToByteArray());
    }
  }

  async list(prefix: string): Promise<StorageItem[]> {
    const items: StorageItem[] = [];
    let continuationToken: string | undefined;

    do {
      const page = await this.call("ListObjectsV2", prefix, () =>
        this.client.send(
          new ListObjectsV2Command({
            Bucket: this.bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken,
          }),
        ),
      );

      for (const object of page.Contents ?? []) {
        if (!object.Key) continue;
        items.push({ key: object.Key, size: object.Size ?? 0, lastModified: object.LastModified });
      }

      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);

    return items;
  }

  async delete(key: string): Promise<void> {
    await this.call("DeleteObject", key, () =>
      this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key })),
    );
  }
}
