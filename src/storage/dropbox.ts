/**
 * Dropbox provider (API v2, OAuth access token)
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
  readJson,
  requireString,
  saveResponseBody,
  send,
  sendJson,
} from "./http";
import { joinRemotePath, splitPrefix } from "./keys";

export const DROPBOX_API = "https://api.dropboxapi.com/2";
export const DROPBOX_CONTENT_API = "https://content.dropboxapi.com/2";

/** Largest file sent with a single files/upload call */
export const SINGLE_UPLOAD_LIMIT = 150 * 1024 * 1024;
export const SESSION_CHUNK_SIZE = 64 * 1024 * 1024;

export interface DropboxProviderOptions {
  accessToken: string;
  /** Folder every key is stored under; the app root when not set */
  rootPath?: string;
  http?: HttpClient;
}

/**
 * Dropbox-API-Arg must be ASCII; escape everything else as \uXXXX.
 */
export function dropboxApiArg(arg: JsonObject): string {
  return JSON.stringify(arg).replace(
    /[\u007f-\uffff]/g,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`,
  );
}

export class DropboxStorageProvider implements IStorageProvider {
  readonly name = "dropbox" as const;
  private readonly http: HttpClient;
  private readonly rootPath: string;
  private readonly headers: Record<string, string>;

  constructor(options: DropboxProviderOptions) {
    this.http = options.http ?? fetch;
    this.rootPath = options.rootPath ?? "";
    this.headers = bearer(options.accessToken);
  }

  /**
   * Dropbox names its root "" rather than "/"
   */
  private remotePath(...parts: string[]): string {
    const joined = joinRemotePath(this.rootPath, ...parts);
    return joined === "/" ? "" : joined;
  }

  private rpc(endpoint: string, body: JsonObject, allowStatus: readonly number[] = []): Promise<Response> {
    return send(this.http, this.name, `${DROPBOX_API}/${endpoint}`, {
      method: "POST",
      headers: { ...this.headers, "Content-Type": "application/json" },
      body: JSON.stringify(body),
      allowStatus,
    });
  }

  private content(endpoint: string, arg: JsonObject, init: RequestInit = {}): Promise<Response> {
    return send(this.http, this.name, `${DROPBOX_CONTENT_API}/${endpoint}`, {
      method: "POST",
      ...init,
      headers: {
        ...this.headers,
        "Content-Type": "application/octet-stream",
        "Dropbox-API-Arg": dropboxApiArg(arg),
      },
    });
  }

  async upload(key: string, localFile: string): Promise<void> {
    const path = this.remotePath(key);
    const commit = { path, mode: "overwrite", autorename: false, mute: true };
    const { size } = await stat(localFile);

    if (size <= SINGLE_UPLOAD_LIMIT) {
      await this.content("files/upload", commit, fileBody(localFile));
      return;
    }

    logger.debug(`Dropbox upload session for ${key} (${size} bytes)`);
    let sessionId: string | undefined;
    for await (const chunk of readChunks(localFile, SESSION_CHUNK_SIZE)) {
      if (sessionId === undefined) {
        const started = await readJson(
          await this.content("files/upload_session/start", { close: false }, { body: chunk.bytes }),
          this.name,
        );
        sessionId = requireString(started, "session_id", this.name);
      } else {
        await this.content(
          "files/upload_session/append_v2",
          { cursor: { session_id: sessionId, offset: chunk.offset }, close: false },
          { body: chunk.bytes },
        );
      }
    }

    if (sessionId === undefined) return;
    await this.content(
      "files/upload_session/finish",
      { cursor: { session_id: sessionId, offset: size }, commit },
      { body: new Uint8Array(0) },
    );
  }

  async download(key: string, localFile: string): Promise<void> {
    const response = await this.content("files/download", { path: this.remotePath(key) });
    await saveResponseBody(response, localFile, this.name);
  }

  async list(prefix: string): Promise<StorageItem[]> {
    const { dir, namePrefix } = splitPrefix(prefix);
    const first = await this.rpc(
      "files/list_folder",
      { path: this.remotePath(dir), recursive: false },
      [409],
    );

    if (first.status === 409) {
      const error = await readJson(first, this.name);
      const summary = optionalString(error, "error_summary") ?? "conflict";
      if (summary.includes("not_found")) return [];
      throw new RemoteProtocolError(this.name, `list_folder ${dir || "/"} failed: ${summary}`, {
        status: 409,
      });
    }

    const entries: JsonObject[] = [];
    let page = await readJson(first, this.name);
    for (;;) {
      entries.push(...objectArray(page, "entries", this.name));
      if (page.has_more !== true) break;
      page = await sendJson(this.http, this.name, `${DROPBOX_API}/files/list_folder/continue`, {
        method: "POST",
        headers: { ...this.headers, "Content-Type": "application/json" },
        body: JSON.stringify({ cursor: requireString(page, "cursor", this.name) }),
      });
    }

    return entries.flatMap((entry) => {
      if (entry[".tag"] !== "file") return [];
      const name = requireString(entry, "name", this.name);
      if (!name.startsWith(namePrefix)) return [];
      return [
        {
          key: `${dir}${name}`,
          size: optionalNumber(entry, "size") ?? 0,
          lastModified: parseDate(optionalString(entry, "server_modified")),
        },
      ];
    });
  }

  async delete(key: string): Promise<void> {
    await this.rpc("files/delete_v2", { path: this.remotePath(key) });
  }
}
