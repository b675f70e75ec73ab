/**
 * MEGA provider driven through the MEGAcmd command-line tools
 * (mega-login, mega-put, mega-ls, ...). MEGAcmd handles the client-side
 * encryption.
 */

import { mkdir } from "node:fs/promises";
import * as path from "node:path";
import type { IStorageProvider, ProcessResult, ProcessRunner, StorageItem } from "../types";
import { RemoteProtocolError } from "../utils/errors";
import { logger } from "../utils/logger";
import { decodeOutput } from "../utils/process";
import { joinRemotePath, splitPrefix } from "./keys";

export interface MegaProviderOptions {
  email: string;
  password: string;
  /** Folder every key is stored under; "/" when not set */
  rootPath?: string;
  runner: ProcessRunner;
}

const MONTHS: Record<string, number> = {
  Jan: 0,
  Feb: 1,
  Mar: 2,
  Apr: 3,
  May: 4,
  Jun: 5,
  Jul: 6,
  Aug: 7,
  Sep: 8,
  Oct: 9,
  Nov: 10,
  Dec: 11,
};

// FLAGS VERS SIZE DDMonYYYY HH:MM:SS NAME
const LS_LINE = /^(\S{4})\s+(\S+)\s+(\S+)\s+(\d{2})([A-Za-z]{3})(\d{4})\s+(\d{2}):(\d{2}):(\d{2})\s+(.+)$/;

// What mega-ls prints for a folder that was never created
const MISSING_FOLDER = /Couldn't find /;

export interface MegaListing {
  name: string;
  isDirectory: boolean;
  size: number;
  modified?: Date;
}

/**
 * Parse `mega-ls -l` output. The header and lines that do not look like
 * entries are ignored.
 */
export function parseMegaListing(output: string): MegaListing[] {
  const entries: MegaListing[] = [];

  for (const line of output.split("\n")) {
    const match = LS_LINE.exec(line.trimEnd());
    if (!match) continue;
    const [, flags = "", , size = "", day, month = "", year, hours, minutes, seconds, name = ""] = match;

    const monthIndex = MONTHS[month];
    const modified =
      monthIndex === undefined
        ? undefined
        : new Date(Number(year), monthIndex, Number(day), Number(hours), Number(minutes), Number(seconds));

    entries.push({
      name,
      isDirectory: flags.startsWith("d"),
      size: /^\d+$/.test(size) ? Number(size) : 0,
      modified,
    });
  }

  return entries;
}

export class MegaStorageProvider implements IStorageProvider {
  readonly name = "mega" as const;
  private readonly rootPath: string;
  private readonly runner: ProcessRunner;

  constructor(private readonly options: MegaProviderOptions) {
    this.rootPath = options.rootPath ?? "/";
    this.runner = options.runner;
  }

  private exec(tool: string, args: string[]): Promise<ProcessResult> {
    return this.runner.run(`mega-${tool}`, args);
  }

  private failure(tool: string, result: ProcessResult): RemoteProtocolError {
    const detail = result.stderr.trim() || decodeOutput(result.stdout).trim();
    return new RemoteProtocolError(this.name, `mega-${tool} exited with ${result.exitCode}: ${detail}`);
  }

  private async execChecked(tool: string, args: string[]): Promise<ProcessResult> {
    const result = await this.exec(tool, args);
    if (result.exitCode !== 0) {
      throw this.failure(tool, result);
    }
    return result;
  }

  private async ensureLoggedIn(): Promise<void> {
    const whoami = await this.exec("whoami", []);
    if (whoami.exitCode === 0) return;

    logger.debug("Logging into MEGA");
    await this.execChecked("login", [this.options.email, this.options.password]);
  }

  async upload(key: string, localFile: string): Promise<void> {
    await this.ensureLoggedIn();
    const remotePath = joinRemotePath(this.rootPath, key);
    await this.execChecked("mkdir", ["-p", path.posix.dirname(remotePath)]);
    await this.execChecked("put", [localFile, remotePath]);
  }

  async download(key: string, localFile: string): Promise<void> {
    await this.ensureLoggedIn();
    await mkdir(path.dirname(localFile), { recursive: true });
    await this.execChecked("get", [joinRemotePath(this.rootPath, key), localFile]);
  }

  async list(prefix: string): Promise<StorageItem[]> {
    await this.ensureLoggedIn();
    const { dir, namePrefix } = splitPrefix(prefix);
    const folder = joinRemotePath(this.rootPath, dir);

    const result = await this.exec("ls", ["-l", folder]);
    if (result.exitCode !== 0 && MISSING_FOLDER.test(result.stderr)) {
      logger.debug(`MEGA: ${folder} does not exist yet`);
      return [];
    }
    if (result.exitCode !== 0) {
      throw this.failure("ls", result);
    }

    return parseMegaListing(decodeOutput(result.stdout))
      .filter((entry) => !entry.isDirectory && entry.name.startsWith(namePrefix))
      .map((entry) => ({ key: `${dir}${entry.name}`, size: entry.size, lastModified: entry.modified }));
  }

  async delete(key: string): Promise<void> {
    await this.ensureLoggedIn();
    await this.execChecked("rm", [joinRemotePath(this.rootPath, key)]);
  }
}
