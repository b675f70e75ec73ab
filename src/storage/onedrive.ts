/**
 * OneDrive provider (Microsoft Graph, OAuth access token)
 */

import { stat } from "node:fs/promises";
import type { HttpClient, IStorageProvider, StorageItem } from "../types";
import { RemoteProtocolError } from "../utils/errors";
import { logger } from "../utils/logger";
import {
  bearer,
  fileBody,
  type JsonObject,
  objectArray,
  optionalNumber,
  optionalString,
  parseDate,
  readChunks,
  requireString,
  saveResponseBody,
  send,
  sendJson,
} from "./http";
import { keyName, splitPrefix } from "./keys";

export const GRAPH_API = "https://graph.microsoft.com/v1.0/me";
export const DEFAULT_ONEDRIVE_FOLDER = "/drive/root:";

/** Largest file sent with a single PUT */
export const SIMPLE_UPLOAD_LIMIT = 4 * 1024 * 1024;
/** Upload session chunk; Graph wants multiples of 320 KiB */
export const SESSION_CHUNK_SIZE = 10 * 1024 * 1024;

export interface OneDriveProviderOptions {
  accessToken: string;
  /** Graph path of the target folder, e.g. "/drive/root:/backups" */
  folderPath?: string;
  http?: HttpClient;
}

export class OneDriveStorageProvider implements IStorageProvider {
  readonly name = "onedrive" as const;
  private readonly http: HttpClient;
  private readonly folderPath: string;
  private readonly headers: Record<string, string>;
  private folderId?: Promise<string>;

  constructor(options: OneDriveProviderOptions) {
    this.http = options.http ?? fetch;
    this.folderPath = options.folderPath ?? DEFAULT_ONEDRIVE_FOLDER;
    this.headers = bearer(options.accessToken);
  }

  private resolveFolderId(): Promise<string> {
    if (!this.folderId) {
      this.folderId = sendJson(this.http, this.name, `${GRAPH_API}${this.folderPath}`, {
        headers: this.headers,
      })
        .then((item) => requireString(item, "id", this.name))
        .catch((error: unknown) => {
          this.folderId = undefined;
          throw error;
        });
    }
    return this.folderId;
  }

  private async children(): Promise<JsonObject[]> {
    const folderId = await this.resolveFolderId();
    const items: JsonObject[] = [];
    let next: string | undefined =
      `${GRAPH_API}/drive/items/${folderId}/children?$select=id,name,size,lastModifiedDateTime,file`;

    while (next) {
      const page = await sendJson(this.http, this.name, next, { headers: this.headers });
      items.push(...objectArray(page, "value", this.name));
      next = optionalString(page, "@odata.nextLink");
    }

    return items.filter((item) => item.file !== undefined);
  }

  private async findItemId(key: string): Promise<string | undefined> {
    const name = keyName(key);
    const item = (await this.children()).find((child) => child.name === name);
    return item ? requireString(item, "id", this.name) : undefined;
  }

  async upload(key: string, localFile: string): Promise<void> {
    const folderId = await this.resolveFolderId();
    const name = encodeURIComponent(keyName(key));
    const { size } = await stat(localFile);

    if (size <= SIMPLE_UPLOAD_LIMIT) {
      await send(this.http, this.name, `${GRAPH_API}/drive/items/${folderId}:/${name}:/content`, {
        method: "PUT",
        headers: { ...this.headers, "Content-Type": "application/octet-stream" },
        ...fileBody(localFile),
      });
      return;
    }

    const session = await sendJson(
      this.http,
      this.name,
      `${GRAPH_API}/drive/items/${folderId}:/${name}:/createUploadSession`,
      {
        method: "POST",
        headers: { ...this.headers, "Content-Type": "application/json" },
        body: JSON.stringify({ item: { "@microsoft.graph.conflictBehavior": "replace" } }),
      },
    );
    const uploadUrl = requireString(session, "uploadUrl", this.name);

    logger.debug(`OneDrive upload session for ${key} (${size} bytes)`);
    // The pre-authenticated session URL must not carry the bearer token
    for await (const chunk of readChunks(localFile, SESSION_CHUNK_SIZE)) {
      const end = chunk.offset + chunk.bytes.length - 1;
      await send(this.http, this.name, uploadUrl, {
        method: "PUT",
        headers: {
          "Content-Length": String(chunk.bytes.length),
          "Content-Range": `bytes ${chunk.offset}-${end}/${chunk.total}`,
        },
        body: chunk.bytes,
      });
    }
  }

  async download(key: string, localFile: string): Promise<void> {
    const id = await this.findItemId(key);
    if (!id) {
      throw new RemoteProtocolError(this.name, `File not found: ${key}`, { status: 404 });
    }
    const response = await send(this.http, this.name, `${GRAPH_API}/drive/items/${id}/content`, {
      headers: this.headers,
    });
    await saveResponseBody(response, localFile, this.name);
  }

  async list(prefix: string): Promise<StorageItem[]> {
    const { dir, namePrefix } = splitPrefix(prefix);
    return (await this.children()).flatMap((item) => {
      const name = requireString(item, "name", this.name);
      if (!name.startsWith(namePrefix)) return [];
      return [
        {
          key: `${dir}${name}`,
          size: optionalNumber(item, "size") ?? 0,
          lastModified: parseDate(optionalString(item, "lastModifiedDateTime")),
        },
      ];
    });
  }

  async delete(key: string): Promise<void> {
    const id = await this.findItemId(key);
    if (!id) {
      logger.warn(`OneDrive: ${key} not found, nothing to delete`);
      return;
    }
    await send(this.http, this.name, `${GRAPH_API}/drive/items/${id}`, {
      method: "DELETE",
      headers: this.headers,
    });
  }
}
