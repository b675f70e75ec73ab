/**
 * Streaming tar-inside-zstd archive writer
 *
 * Entries flow tar-stream pack -> zstd compress stream -> file as they are
 * appended; nothing is read back and the archive is never held in memory.
 */

import type { Dirent } from "node:fs";
import { mkdir, open, readdir, readFile, stat } from "node:fs/promises";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import * as tar from "tar-stream";
import { CompressStream } from "zstd-napi";
import { MAX_COMPRESSION_LEVEL, MIN_COMPRESSION_LEVEL } from "../../config/validator";
import { ArchiveFormatError, CollectorError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { toArchivePath } from "../../utils/path";
import type { ExclusionSet } from "./exclusion";

export const DEFAULT_COMPRESSION_LEVEL = 3;

// Ownership, permissions and mtime are fixed; original metadata is not kept
const ENTRY_MODE = 0o644;
const ENTRY_MTIME = new Date(0);

export function assertCompressionLevel(level: number): void {
  if (!Number.isInteger(level) || level < MIN_COMPRESSION_LEVEL || level > MAX_COMPRESSION_LEVEL) {
    throw new ArchiveFormatError(
      `Invalid compression level ${level}: expected an integer between ${MIN_COMPRESSION_LEVEL} and ${MAX_COMPRESSION_LEVEL}`,
    );
  }
}

type EntryHeader = Parameters<tar.Pack["entry"]>[0];

function entryHeader(archivePath: string, size: number): EntryHeader {
  if (archivePath === "" || archivePath.startsWith("/")) {
    throw new ArchiveFormatError(`Invalid archive path: "${archivePath}"`);
  }
  return {
    name: archivePath,
    size,
    type: "file",
    mode: ENTRY_MODE,
    mtime: ENTRY_MTIME,
    uid: 0,
    gid: 0,
  };
}

export class ArchiveWriter {
  readonly destination: string;
  private readonly pack: tar.Pack;
  private readonly done: Promise<void>;
  private failure: unknown = null;
  private finished = false;
  private entries = 0;

  private constructor(destination: string, pack: tar.Pack, done: Promise<void>) {
    this.destination = destination;
    this.pack = pack;
    this.done = done;
    this.done.catch((error: unknown) => {
      this.failure = error;
      logger.debug(`Archive stream for ${destination} failed`, error);
    });
  }

  /**
   * Create the destination file and start the compression pipeline. The
   * level is checked before anything is created.
   */
  static async open(
    destinationFile: string,
    compressionLevel: number = DEFAULT_COMPRESSION_LEVEL,
  ): Promise<ArchiveWriter> {
    assertCompressionLevel(compressionLevel);

    await mkdir(path.dirname(destinationFile), { recursive: true });

    let compressor: CompressStream;
    try {
      compressor = new CompressStream({ compressionLevel });
    } catch (error) {
      throw new ArchiveFormatError("Failed to initialise zstd compressor", { cause: error });
    }

    const handle = await open(destinationFile, "w");
    const pack = tar.pack();
    const done = pipeline(pack, compressor, handle.createWriteStream());

    return new ArchiveWriter(destinationFile, pack, done);
  }

  get entryCount(): number {
    return this.entries;
  }

  private assertWritable(): void {
    if (this.finished) {
      throw new ArchiveFormatError(`Archive ${this.destination} is already finished`);
    }
    if (this.failure !== null) {
      throw new ArchiveFormatError(`Archive ${this.destination} is unusable`, {
        cause: this.failure,
      });
    }
  }

  /**
   * Append one regular-file entry. Entries with the same path are all kept.
   */
  async appendEntry(archivePath: string, bytes: Uint8Array): Promise<void> {
    this.assertWritable();
    const header = entryHeader(archivePath, bytes.byteLength);

    await new Promise<void>((resolve, reject) => {
      try {
        this.pack.entry(header, Buffer.from(bytes), (error) => {
          if (error) {
            reject(new ArchiveFormatError(`Failed to write entry ${archivePath}`, { cause: error }));
          } else {
            resolve();
          }
        });
      } catch (error) {
        reject(new ArchiveFormatError(`Failed to write entry ${archivePath}`, { cause: error }));
      }
    });

    this.entries++;
  }

  /**
   * Stream a file into the archive without reading it into memory
   */
  async appendFile(sourcePath: string, archivePath: string): Promise<void> {
    this.assertWritable();

    const handle = await open(sourcePath, "r");
    try {
      const { size } = await handle.stat();
      const entry = this.pack.entry(entryHeader(archivePath, size));
      await pipeline(handle.createReadStream({ autoClose: false }), entry);
    } finally {
      await handle.close();
    }

    this.entries++;
  }

  /**
   * Append every regular file below sourceRoot as `<prefix>/<relative path>`.
   * Directories are walked but never emitted, links are not followed into
   * directories, excluded paths are pruned. Returns the number of entries.
   */
  async appendTree(sourceRoot: string, prefix: string, exclusions: ExclusionSet): Promise<number> {
    const root = path.resolve(sourceRoot);
    if (exclusions.excludes(root)) {
      logger.debug(`Skipping excluded tree ${root}`);
      return 0;
    }

    let rootEntries: Dirent[];
    try {
      rootEntries = await readdir(root, { withFileTypes: true });
    } catch (error) {
      throw new CollectorError(`Failed to read directory ${root}`, { cause: error });
    }

    let added = 0;
    const pending: { dir: string; entries: Dirent[] }[] = [
      { dir: root, entries: rootEntries },
    ];

    while (pending.length > 0) {
      const current = pending.pop();
      if (!current) break;

      const sorted = [...current.entries].sort((a, b) => a.name.localeCompare(b.name));
      for (const entry of sorted) {
        const fullPath = path.join(current.dir, entry.name);
        if (exclusions.excludes(fullPath)) continue;

        if (entry.isDirectory()) {
          try {
            pending.push({ dir: fullPath, entries: await readdir(fullPath, { withFileTypes: true }) });
          } catch (error) {
            logger.warn(`Skipping unreadable directory ${fullPath}`, error);
          }
          continue;
        }

        if (!(await this.isRegularFile(fullPath))) continue;

        const relative = path.relative(root, fullPath).split(path.sep);
        await this.appendWalkedFile(fullPath, toArchivePath(prefix, ...relative));
        added++;
      }
    }

    return added;
  }

  // Follows links: a link to a file is archived with the target's content,
  // a link to a directory or a broken link is skipped
  private async isRegularFile(fullPath: string): Promise<boolean> {
    try {
      return (await stat(fullPath)).isFile();
    } catch (error) {
      logger.debug(`Skipping ${fullPath}`, error);
      return false;
    }
  }

  private async appendWalkedFile(fullPath: string, archivePath: string): Promise<void> {
    try {
      await this.appendEntry(archivePath, await readFile(fullPath));
      return;
    } catch (error) {
      logger.debug(`Direct read of ${fullPath} failed, retrying as a streamed copy`, error);
    }

    try {
      await this.appendFile(fullPath, archivePath);
    } catch (error) {
      throw new CollectorError(`Failed to add file to archive: ${fullPath}`, { cause: error });
    }
  }

  /**
   * Write the tar trailer, flush the compressor and close the file
   */
  async finish(): Promise<void> {
    this.assertWritable();
    this.finished = true;
    this.pack.finalize();

    try {
      await this.done;
    } catch (error) {
      throw new ArchiveFormatError(`Failed to finish archive ${this.destination}`, { cause: error });
    }
  }

  /**
   * Tear the pipeline down after a fatal error. The partial file stays on disk.
   */
  async abort(): Promise<void> {
    if (this.finished) return;
    this.finished = true;
    this.pack.destroy();

    try {
      await this.done;
    } catch (error) {
      logger.debug(`Archive ${this.destination} aborted`, error);
    }
  }
}
