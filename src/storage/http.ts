/**
 * Shared plumbing for the HTTP-based storage adapters
 */

import { createReadStream, createWriteStream } from "node:fs";
import { mkdir, open } from "node:fs/promises";
import * as path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { HttpClient } from "../types";
import { RemoteProtocolError } from "../utils/errors";
import { logger } from "../utils/logger";

export type JsonObject = Record<string, unknown>;

export interface SendOptions extends RequestInit {
  /** Non-2xx statuses the caller handles itself */
  allowStatus?: readonly number[];
}

const MAX_ERROR_BODY = 300;

function describeUrl(url: string | URL): string {
  const parsed = typeof url === "string" ? new URL(url) : url;
  return `${parsed.host}${parsed.pathname}`;
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text.length > MAX_ERROR_BODY ? `${text.slice(0, MAX_ERROR_BODY)}...` : text;
  } catch (error) {
    logger.debug("Could not read error response body", error);
    return "";
  }
}

/**
 * Perform a request; network failures and unexpected statuses become
 * RemoteProtocolError.
 */
export async function send(
  http: HttpClient,
  provider: string,
  url: string | URL,
  options: SendOptions = {},
): Promise<Response> {
  const { allowStatus = [], ...init } = options;
  const method = init.method ?? "GET";

  let response: Response;
  try {
    response = await http(url, init);
  } catch (error) {
    throw new RemoteProtocolError(provider, `${method} ${describeUrl(url)} failed`, { cause: error });
  }

  if (!response.ok && !allowStatus.includes(response.status)) {
    const body = await readErrorBody(response);
    throw new RemoteProtocolError(
      provider,
      `${method} ${describeUrl(url)} returned ${response.status}${body ? `: ${body}` : ""}`,
      { status: response.status },
    );
  }

  return response;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function readJson(response: Response, provider: string): Promise<JsonObject> {
  let parsed: unknown;
  try {
    parsed = await response.json();
  } catch (error) {
    throw new RemoteProtocolError(provider, "Malformed JSON response", { cause: error });
  }
  if (!isJsonObject(parsed)) {
    throw new RemoteProtocolError(provider, "Expected a JSON object in response");
  }
  return parsed;
}

export async function sendJson(
  http: HttpClient,
  provider: string,
  url: string | URL,
  options: SendOptions = {},
): Promise<JsonObject> {
  return readJson(await send(http, provider, url, options), provider);
}

export function requireString(obj: JsonObject, key: string, provider: string): string {
  const value = obj[key];
  if (typeof value !== "string") {
    throw new RemoteProtocolError(provider, `Response is missing "${key}"`);
  }
  return value;
}

export function optionalString(obj: JsonObject, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

/**
 * Numeric field; some APIs send sizes as strings
 */
export function optionalNumber(obj: JsonObject, key: string): number | undefined {
  const value = obj[key];
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "" && !Number.isNaN(Number(value))) {
    return Number(value);
  }
  return undefined;
}

/**
 * Array field filtered down to its object elements
 */
export function objectArray(obj: JsonObject, key: string, provider: string): JsonObject[] {
  const value = obj[key];
  if (!Array.isArray(value)) {
    throw new RemoteProtocolError(provider, `Response is missing array "${key}"`);
  }
  return value.filter(isJsonObject);
}

export function parseDate(value: string | undefined): Date | undefined {
  if (value === undefined) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

export function bearer(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}` };
}

/**
 * Stream a response body into a local file
 */
export async function saveResponseBody(
  response: Response,
  localFile: string,
  provider: string,
): Promise<void> {
  if (!response.body) {
    throw new RemoteProtocolError(provider, "Download response has no body");
  }
  await mkdir(path.dirname(localFile), { recursive: true });
  await pipeline(Readable.fromWeb(response.body), createWriteStream(localFile));
}

/**
 * Read a file in fixed-size chunks for chunked upload sessions
 */
export async function* readChunks(
  localFile: string,
  chunkSize: number,
): AsyncGenerator<{ offset: number; bytes: Buffer; total: number }> {
  const handle = await open(localFile, "r");
  try {
    const { size } = await handle.stat();
    let offset = 0;
    while (offset < size) {
      const length = Math.min(chunkSize, size - offset);
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, offset);
      if (bytesRead === 0) break;
      yield { offset, bytes: buffer.subarray(0, bytesRead), total: size };
      offset += bytesRead;
    }
  } finally {
    await handle.close();
  }
}

/**
 * Request body streamed from a local file
 */
export function fileBody(localFile: string): Pick<RequestInit, "body" | "duplex"> {
  return { body: createReadStream(localFile), duplex: "half" };
}
