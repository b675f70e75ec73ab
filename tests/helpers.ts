import { createReadStream } from "node:fs";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { buffer } from "node:stream/consumers";
import * as tar from "tar-stream";
import { DecompressStream } from "zstd-napi";
import type {
  BackupSettings,
  IStorageProvider,
  ProcessResult,
  ProcessRunner,
  ResolvedConfig,
  RunOptions,
  StorageItem,
} from "../src/types";

export async function makeTempDir(label: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `packrat-${label}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

export function testConfig(
  root: string,
  backup: Partial<BackupSettings> = {},
  extra: Partial<Omit<ResolvedConfig, "backup">> = {},
): ResolvedConfig {
  return {
    storage: { provider: "s3", region: "us-east-1", bucket: "test-bucket" },
    backup: {
      localBackupDir: path.join(root, "backups"),
      projectPath: path.join(root, "project"),
      additionalPaths: [],
      retentionDays: 7,
      compressionLevel: 3,
      exclude: [],
      ...backup,
    },
    logging: { level: "error", logDir: path.join(root, "logs") },
    daemon: { backupIntervalHours: 6, uploadIntervalHours: 24 },
    ...extra,
  };
}

interface StoredObject {
  content: Buffer;
  lastModified?: Date;
}

/**
 * Provider that keeps objects in a Map
 */
export class MemoryStorageProvider implements IStorageProvider {
  readonly name = "s3" as const;
  readonly objects = new Map<string, StoredObject>();
  readonly deleted: string[] = [];

  put(key: string, content: string, lastModified?: Date): void {
    this.objects.set(key, { content: Buffer.from(content), lastModified });
  }

  async upload(key: string, localFile: string): Promise<void> {
    this.objects.set(key, { content: await readFile(localFile), lastModified: new Date() });
  }

  async download(key: string, localFile: string): Promise<void> {
    const object = this.objects.get(key);
    if (!object) throw new Error(`No such key: ${key}`);
    await mkdir(path.dirname(localFile), { recursive: true });
    await writeFile(localFile, object.content);
  }

  async list(prefix: string): Promise<StorageItem[]> {
    return [...this.objects.entries()]
      .filter(([key]) => key.startsWith(prefix))
      .map(([key, object]) => ({ key, size: object.content.length, lastModified: object.lastModified }));
  }

  async delete(key: string): Promise<void> {
    this.objects.delete(key);
    this.deleted.push(key);
  }
}

export interface RecordedRun {
  command: string;
  args: string[];
  options?: RunOptions;
}

type RunHandler = (command: string, args: readonly string[]) => ProcessResult | Promise<ProcessResult>;

export function ok(stdout = ""): ProcessResult {
  return { exitCode: 0, stdout: Buffer.from(stdout), stderr: "" };
}

export function failed(exitCode: number, stderr: string): ProcessResult {
  return { exitCode, stdout: new Uint8Array(0), stderr };
}

/**
 * ProcessRunner that records every call and answers through a handler
 */
export class FakeRunner implements ProcessRunner {
  readonly calls: RecordedRun[] = [];

  constructor(private readonly handler: RunHandler = () => ok()) {}

  async run(command: string, args: readonly string[], options?: RunOptions): Promise<ProcessResult> {
    this.calls.push({ command, args: [...args], options });
    return this.handler(command, args);
  }
}

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body?: string;
}

type FetchHandler = (request: RecordedRequest) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * fetch stand-in: records requests and answers in process
 */
export class FakeHttp {
  readonly requests: RecordedRequest[] = [];

  constructor(private readonly handler: FetchHandler) {}

  readonly fetch = async (input: string | URL, init: RequestInit = {}): Promise<Response> => {
    const request: RecordedRequest = {
      url: input.toString(),
      method: init.method ?? "GET",
      headers: new Headers(init.headers),
      body: typeof init.body === "string" ? init.body : undefined,
    };
    this.requests.push(request);
    return this.handler(request);
  };
}

export interface ArchivedEntry {
  name: string;
  mode?: number;
  mtime?: Date;
  content: string;
}

/**
 * Decompress and untar an archive into memory, entries in archive order
 */
export async function readArchive(file: string): Promise<ArchivedEntry[]> {
  const tarBytes = await buffer(createReadStream(file).pipe(new DecompressStream()));
  const entries: ArchivedEntry[] = [];
  const extract = tar.extract();

  extract.on("entry", (header, stream, next) => {
    const chunks: Uint8Array[] = [];
    stream.on("data", (chunk: unknown) => {
      if (chunk instanceof Uint8Array) chunks.push(chunk);
    });
    stream.on("end", () => {
      entries.push({
        name: header.name,
        mode: header.mode,
        mtime: header.mtime,
        content: Buffer.concat(chunks).toString("utf8"),
      });
      next();
    });
  });

  await new Promise<void>((resolve, reject) => {
    extract.on("finish", () => resolve());
    extract.on("error", reject);
    extract.end(tarBytes);
  });

  return entries;
}

export async function archiveNames(file: string): Promise<string[]> {
  return (await readArchive(file)).map((entry) => entry.name);
}
