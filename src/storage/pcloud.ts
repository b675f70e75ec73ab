/**
 * pCloud provider (HTTP JSON API, OAuth access token)
 */

import { openAsBlob } from "node:fs";
import * as path from "node:path";
import type { HttpClient, IStorageProvider, StorageItem } from "../types";
import { RemoteProtocolError } from "../utils/errors";
import {
  bearer,
  isJsonObject,
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
import { joinRemotePath, splitPrefix } from "./keys";

export const PCLOUD_US_HOST = "https://api.pcloud.com";
export const PCLOUD_EU_HOST = "https://eapi.pcloud.com";

/** listfolder result for a folder that does not exist */
const DIRECTORY_NOT_FOUND = 2005;

export interface PCloudProviderOptions {
  accessToken: string;
  /** "eu" or "europe" selects the European API host */
  region?: string;
  /** Folder every key is stored under; "/" when not set */
  rootPath?: string;
  http?: HttpClient;
}

export function pcloudHost(region: string | undefined): string {
  const normalized = region?.toLowerCase();
  return normalized === "eu" || normalized === "europe" ? PCLOUD_EU_HOST : PCLOUD_US_HOST;
}

export class PCloudStorageProvider implements IStorageProvider {
  readonly name = "pcloud" as const;
  private readonly http: HttpClient;
  private readonly host: string;
  private readonly rootPath: string;
  private readonly headers: Record<string, string>;

  constructor(options: PCloudProviderOptions) {
    this.http = options.http ?? fetch;
    this.host = pcloudHost(options.region);
    this.rootPath = options.rootPath ?? "/";
    this.headers = bearer(options.accessToken);
  }

  private async digest(): Promise<string> {
    const json = await sendJson(this.http, this.name, `${this.host}/getdigest`);
    this.checkResult("getdigest", json);
    return requireString(json, "digest", this.name);
  }

  private checkResult(method: string, json: JsonObject): void {
    const result = optionalNumber(json, "result");
    if (result === 0) return;
    const error = optionalString(json, "error") ?? "unknown error";
    throw new RemoteProtocolError(this.name, `${method} returned result ${result ?? "?"}: ${error}`);
  }

  /**
   * Call an API method with a fresh digest. Results listed in allowResult
   * are handed back instead of thrown.
   */
  private async call(
    method: string,
    params: Record<string, string>,
    init: RequestInit = {},
    allowResult: readonly number[] = [],
  ): Promise<JsonObject> {
    const url = new URL(`${this.host}/${method}`);
    url.searchParams.set("digest", await this.digest());
    for (const [name, value] of Object.entries(params)) {
      url.searchParams.set(name, value);
    }

    const json = await sendJson(this.http, this.name, url, { ...init, headers: this.headers });
    const result = optionalNumber(json, "result");
    if (result !== undefined && allowResult.includes(result)) return json;
    this.checkResult(method, json);
    return json;
  }

  private async ensureFolder(folder: string): Promise<void> {
    let current = "";
    for (const segment of folder.split("/").filter(Boolean)) {
      current = `${current}/${segment}`;
      await this.call("createfolderifnotexists", { path: current });
    }
  }

  async upload(key: string, localFile: string): Promise<void> {
    const fullPath = joinRemotePath(this.rootPath, key);
    const folder = path.posix.dirname(fullPath);
    const filename = path.posix.basename(fullPath);
    await this.ensureFolder(folder);

    const form = new FormData();
    form.append("file", await openAsBlob(localFile), filename);
    await this.call(
      "uploadfile",
      { path: folder, filename, nopartial: "1" },
      { method: "POST", body: form },
    );
  }

  async download(key: string, localFile: string): Promise<void> {
    const link = await this.call("getfilelink", { path: joinRemotePath(this.rootPath, key) });
    const host: unknown = Array.isArray(link.hosts) ? link.hosts[0] : undefined;
    if (typeof host !== "string") {
      throw new RemoteProtocolError(this.name, "getfilelink returned no hosts");
    }

    const response = await send(
      this.http,
      this.name,
      `https://${host}${requireString(link, "path", this.name)}`,
    );
    await saveResponseBody(response, localFile, this.name);
  }

  async list(prefix: string): Promise<StorageItem[]> {
    const { dir, namePrefix } = splitPrefix(prefix);
    const listing = await this.call(
      "listfolder",
      { path: joinRemotePath(this.rootPath, dir) },
      {},
      [DIRECTORY_NOT_FOUND],
    );
    if (optionalNumber(listing, "result") === DIRECTORY_NOT_FOUND) return [];

    const metadata = listing.metadata;
    if (!isJsonObject(metadata)) {
      throw new RemoteProtocolError(this.name, 'listfolder response is missing "metadata"');
    }

    return objectArray(metadata, "contents", this.name).flatMap((entry) => {
      if (entry.isfolder === true) return [];
      const name = requireString(entry, "name", this.name);
      if (!name.startsWith(namePrefix)) return [];
      return [
        {
          key: `${dir}${name}`,
          size: optionalNumber(entry, "size") ?? 0,
          lastModified: parseDate(optionalString(entry, "modified")),
        },
      ];
    });
  }

  async delete(key: string): Promise<void> {
    await this.call("deletefile", { path: joinRemotePath(this.rootPath, key) });
  }
}
