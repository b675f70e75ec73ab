/**
 * Google Drive provider (Drive API v3, OAuth access token)
 *
 * Files live directly inside one folder; keys are rebuilt from the listing
 * prefix.
 */

import { openAsBlob } from "node:fs";
import type { HttpClient, IStorageProvider, StorageItem } from "../types";
import { RemoteProtocolError } from "../utils/errors";
import { logger } from "../utils/logger";
import {
  bearer,
  type JsonObject,
  objectArray,
  optionalNumber,
  optionalString,
  parseDate,
  requireString,
  saveResponseBody,
  send,
  sendJson,
} from "./http";
import { keyName, splitPrefix } from "./keys";

export const DRIVE_API = "https://www.googleapis.com/drive/v3";
export const DRIVE_UPLOAD_API = "https://www.googleapis.com/upload/drive/v3";
const FILE_FIELDS = "nextPageToken,files(id,name,size,modifiedTime)";
const BOUNDARY = "packrat-drive-boundary";

export interface GoogleDriveProviderOptions {
  accessToken: string;
  /** Parent folder id; "root" when not set */
  folderId?: string;
  http?: HttpClient;
}

/**
 * Quote a value for a Drive `q` expression
 */
function quote(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

export class GoogleDriveStorageProvider implements IStorageProvider {
  readonly name = "googledrive" as const;
  private readonly http: HttpClient;
  private readonly folderId: string;
  private readonly headers: Record<string, string>;

  constructor(options: GoogleDriveProviderOptions) {
    this.http = options.http ?? fetch;
    this.folderId = options.folderId ?? "root";
    this.headers = bearer(options.accessToken);
  }

  private async query(q: string): Promise<JsonObject[]> {
    const files: JsonObject[] = [];
    let pageToken: string | undefined;

    do {
      const url = new URL(`${DRIVE_API}/files`);
      url.searchParams.set("q", q);
      url.searchParams.set("fields", FILE_FIELDS);
      url.searchParams.set("pageSize", "1000");
      if (pageToken) url.searchParams.set("pageToken", pageToken);

      const page = await sendJson(this.http, this.name, url, { headers: this.headers });
      files.push(...objectArray(page, "files", this.name));
      pageToken = optionalString(page, "nextPageToken");
    } while (pageToken);

    return files;
  }

  private async findFileId(key: string): Promise<string | undefined> {
    const name = keyName(key);
    const [file] = await this.query(
      `name = ${quote(name)} and ${quote(this.folderId)} in parents and trashed = false`,
    );
    return file ? requireString(file, "id", this.name) : undefined;
  }

  async upload(key: string, localFile: string): Promise<void> {
    const metadata = JSON.stringify({ name: keyName(key), parents: [this.folderId] });
    const body = new Blob([
      `--${BOUNDARY}\r\nContent-Type: application/json; charset=UTF-8\r\n\r\n${metadata}\r\n`,
      `--${BOUNDARY}\r\nContent-Type: application/octet-stream\r\n\r\n`,
      await openAsBlob(localFile),
      `\r\n--${BOUNDARY}--\r\n`,
    ]);

    logger.debug(`Uploading to Google Drive folder ${this.folderId}: ${keyName(key)}`);
    await send(this.http, this.name, `${DRIVE_UPLOAD_API}/files?uploadType=multipart`, {
      method: "POST",
      headers: { ...this.headers, "Content-Type": `multipart/related; boundary=${BOUNDARY}` },
      body,
    });
  }

  async download(key: string, localFile: string): Promise<void> {
    const id = await this.findFileId(key);
    if (!id) {
      throw new RemoteProtocolError(this.name, `File not found: ${key}`, { status: 404 });
    }
    const response = await send(this.http, this.name, `${DRIVE_API}/files/${id}?alt=media`, {
      headers: this.headers,
    });
    await saveResponseBody(response, localFile, this.name);
  }

  async list(prefix: string): Promise<StorageItem[]> {
    const { dir, namePrefix } = splitPrefix(prefix);
    const files = await this.query(`${quote(this.folderId)} in parents and trashed = false`);

    return files.flatMap((file) => {
      const name = requireString(file, "name", this.name);
      if (!name.startsWith(namePrefix)) return [];
      return [
        {
          key: `${dir}${name}`,
          size: optionalNumber(file, "size") ?? 0,
          lastModified: parseDate(optionalString(file, "modifiedTime")),
        },
      ];
    });
  }

  async delete(key: string): Promise<void> {
    const id = await this.findFileId(key);
    if (!id) {
      logger.warn(`Google Drive: ${key} not found, nothing to delete`);
      return;
    }
    await send(this.http, this.name, `${DRIVE_API}/files/${id}`, {
      method: "DELETE",
      headers: this.headers,
    });
  }
}
