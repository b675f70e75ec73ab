/**
 * Backblaze B2 native API provider
 */

import { stat } from "node:fs/promises";
import type { HttpClient, IStorageProvider, StorageItem } from "../types";
import { computeFileChecksum } from "../utils/crypto";
import { logger } from "../utils/logger";
import {
  fileBody,
  type JsonObject,
  objectArray,
  optionalNumber,
  optionalString,
  requireString,
  saveResponseBody,
  send,
  sendJson,
} from "./http";

export const B2_AUTHORIZE_URL = "https://api.backblazeb2.com/b2api/v2/b2_authorize_account";
const LIST_PAGE_SIZE = 1000;

export interface B2ProviderOptions {
  accountId: string;
  applicationKey: string;
  bucketId: string;
  bucketName: string;
  http?: HttpClient;
}

interface B2Session {
  apiUrl: string;
  downloadUrl: string;
  authorizationToken: string;
}

/**
 * B2 file names travel percent-encoded in headers and download URLs, with
 * "/" left as is.
 */
export function encodeB2FileName(name: string): string {
  return encodeURIComponent(name).replace(/%2F/g, "/");
}

export class B2StorageProvider implements IStorageProvider {
  readonly name = "b2" as const;
  private readonly http: HttpClient;
  private session?: Promise<B2Session>;

  constructor(private readonly options: B2ProviderOptions) {
    this.http = options.http ?? fetch;
  }

  /**
   * Authorize once; a failed attempt is forgotten so the next call retries.
   */
  private authorize(): Promise<B2Session> {
    if (!this.session) {
      this.session = this.requestSession().catch((error: unknown) => {
        this.session = undefined;
        throw error;
      });
    }
    return this.session;
  }

  private async requestSession(): Promise<B2Session> {
    const credentials = Buffer.from(`${this.options.accountId}:${this.options.applicationKey}`).toString(
      "base64",
    );
    const json = await sendJson(this.http, this.name, B2_AUTHORIZE_URL, {
      headers: { Authorization: `Basic ${credentials}` },
    });

    return {
      apiUrl: requireString(json, "apiUrl", this.name),
      downloadUrl: requireString(json, "downloadUrl", this.name),
      authorizationToken: requireString(json, "authorizationToken", this.name),
    };
  }

  private async api(operation: string, body: JsonObject): Promise<JsonObject> {
    const session = await this.authorize();
    return sendJson(this.http, this.name, `${session.apiUrl}/b2api/v2/${operation}`, {
      method: "POST",
      headers: { Authorization: session.authorizationToken, "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  async upload(key: string, localFile: string): Promise<void> {
    const [{ size }, sha1] = await Promise.all([stat(localFile), computeFileChecksum(localFile, "sha1")]);

    const target = await this.api("b2_get_upload_url", { bucketId: this.options.bucketId });
    const uploadUrl = requireString(target, "uploadUrl", this.name);
    const uploadToken = requireString(target, "authorizationToken", this.name);

    logger.debug(`Uploading to B2: ${this.options.bucketName}/${key}`);
    await send(this.http, this.name, uploadUrl, {
      method: "POST",
      headers: {
        Authorization: uploadToken,
        "X-Bz-File-Name": encodeB2FileName(key),
        "Content-Type": "b2/x-auto",
        "Content-Length": String(size),
        "X-Bz-Content-Sha1": sha1,
      },
      ...fileBody(localFile),
    });
  }

  async download(key: string, localFile: string): Promise<void> {
    const session = await this.authorize();
    const url = `${session.downloadUrl}/file/${this.options.bucketName}/${encodeB2FileName(key)}`;
    const response = await send(this.http, this.name, url, {
      headers: { Authorization: session.authorizationToken },
    });
    await saveResponseBody(response, localFile, this.name);
  }

  async list(prefix: string): Promise<StorageItem[]> {
    const items: StorageItem[] = [];
    let startFileName: string | undefined;

    do {
      const page = await this.api("b2_list_file_names", {
        bucketId: this.options.bucketId,
        prefix,
        maxFileCount: LIST_PAGE_SIZE,
        ...(startFileName ? { startFileName } : {}),
      });

      for (const file of objectArray(page, "files", this.name)) {
        const timestamp = optionalNumber(file, "uploadTimestamp");
        items.push({
          key: requireString(file, "fileName", this.name),
          size: optionalNumber(file, "contentLength") ?? 0,
          lastModified: timestamp !== undefined ? new Date(timestamp) : undefined,
        });
      }

      startFileName = optionalString(page, "nextFileName");
    } while (startFileName);

    return items;
  }

  async delete(key: string): Promise<void> {
    const versions = await this.api("b2_list_file_versions", {
      bucketId: this.options.bucketId,
      startFileName: key,
      maxFileCount: 1,
    });

    const [file] = objectArray(versions, "files", this.name);
    if (!file || optionalString(file, "fileName") !== key) {
      logger.warn(`B2: no file named ${key}, nothing to delete`);
      return;
    }

    await this.api("b2_delete_file_version", {
      fileId: requireString(file, "fileId", this.name),
      fileName: key,
    });
  }
}
