/**
 * Box provider (Content API 2.0, OAuth access token)
 */

import { openAsBlob } from "node:fs";
import type { HttpClient, IStorageProvider, StorageItem } from "../types";
import { RemoteProtocolError } from "../utils/errors";
import { logger } from "../utils/logger";
import {
  bearer,
  isJsonObject,
  type JsonObject,
  objectArray,
  optionalNumber,
  optionalString,
  parseDate,
  readJson,
  requireString,
  saveResponseBody,
  send,
  sendJson,
} from "./http";
import { keyName, splitPrefix } from "./keys";

export const BOX_API = "https://api.box.com/2.0";
export const BOX_UPLOAD_API = "https://upload.box.com/api/2.0";
const PAGE_SIZE = 1000;

export interface BoxProviderOptions {
  accessToken: string;
  /** Folder id; "0" is the account root */
  folderId?: string;
  http?: HttpClient;
}

export class BoxStorageProvider implements IStorageProvider {
  readonly name = "box" as const;
  private readonly http: HttpClient;
  private readonly folderId: string;
  private readonly headers: Record<string, string>;

  constructor(options: BoxProviderOptions) {
    this.http = options.http ?? fetch;
    this.folderId = options.folderId ?? "0";
    this.headers = bearer(options.accessToken);
  }

  private async files(): Promise<JsonObject[]> {
    const entries: JsonObject[] = [];
    let offset = 0;

    for (;;) {
      const url = new URL(`${BOX_API}/folders/${this.folderId}/items`);
      url.searchParams.set("fields", "id,type,name,size,modified_at");
      url.searchParams.set("limit", String(PAGE_SIZE));
      url.searchParams.set("offset", String(offset));

      const page = await sendJson(this.http, this.name, url, { headers: this.headers });
      const batch = objectArray(page, "entries", this.name);
      entries.push(...batch);
      offset += batch.length;

      const total = optionalNumber(page, "total_count") ?? offset;
      if (batch.length === 0 || offset >= total) break;
    }

    return entries.filter((entry) => entry.type === "file");
  }

  private async findFileId(key: string): Promise<string | undefined> {
    const name = keyName(key);
    const file = (await this.files()).find((entry) => entry.name === name);
    return file ? requireString(file, "id", this.name) : undefined;
  }

  async upload(key: string, localFile: string): Promise<void> {
    const name = keyName(key);
    const form = new FormData();
    form.append("attributes", JSON.stringify({ name, parent: { id: this.folderId } }));
    form.append("file", await openAsBlob(localFile), name);

    const response = await send(this.http, this.name, `${BOX_UPLOAD_API}/files/content`, {
      method: "POST",
      headers: this.headers,
      body: form,
      allowStatus: [409],
    });
    if (response.status !== 409) return;

    // Same name already in the folder: upload a new version of that file
    const conflict = await readJson(response, this.name);
    const info = conflict.context_info;
    const existing = isJsonObject(info) && isJsonObject(info.conflicts) ? info.conflicts : undefined;
    const existingId = existing ? optionalString(existing, "id") : undefined;
    if (!existingId) {
      throw new RemoteProtocolError(this.name, `Upload of ${name} conflicted with an unknown item`, {
        status: 409,
      });
    }

    logger.debug(`Box: uploading new version of ${name} (${existingId})`);
    const version = new FormData();
    version.append("attributes", JSON.stringify({ name }));
    version.append("file", await openAsBlob(localFile), name);
    await send(this.http, this.name, `${BOX_UPLOAD_API}/files/${existingId}/content`, {
      method: "POST",
      headers: this.headers,
      body: version,
    });
  }

  async download(key: string, localFile: string): Promise<void> {
    const id = await this.findFileId(key);
    if (!id) {
      throw new RemoteProtocolError(this.name, `File not found: ${key}`, { status: 404 });
    }
    const response = await send(this.http, this.name, `${BOX_API}/files/${id}/content`, {
      headers: this.headers,
    });
    await saveResponseBody(response, localFile, this.name);
  }

  async list(prefix: string): Promise<StorageItem[]> {
    const { dir, namePrefix } = splitPrefix(prefix);
    return (await this.files()).flatMap((file) => {
      const name = requireString(file, "name", this.name);
      if (!name.startsWith(namePrefix)) return [];
      return [
        {
          key: `${dir}${name}`,
          size: optionalNumber(file, "size") ?? 0,
          lastModified: parseDate(optionalString(file, "modified_at")),
        },
      ];
    });
  }

  async delete(key: string): Promise<void> {
    const id = await this.findFileId(key);
    if (!id) {
      logger.warn(`Box: ${key} not found, nothing to delete`);
      return;
    }
    await send(this.http, this.name, `${BOX_API}/files/${id}`, {
      method: "DELETE",
      headers: this.headers,
    });
  }
}
