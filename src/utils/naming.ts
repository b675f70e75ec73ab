/**
 * Backup file naming
 */

import type { BackupKind } from "../types";

// Pattern: backup-(full|incr)-YYYYMMDD-HHMMSS.tar.zst
export const ARCHIVE_NAME_PATTERN = /^backup-(full|incr)-(\d{8})-(\d{6})\.tar\.zst$/;

export const ARCHIVE_EXTENSION = ".zst";

/** Remote namespace every backup lives under */
export const REMOTE_PREFIX = "backups/";

export interface ParsedArchiveName {
  kind: BackupKind;
  date: string;
  time: string;
  createdAt: Date;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Local-time timestamp in YYYYMMDD-HHMMSS form
 */
export function formatTimestamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}-${time}`;
}

export function generateArchiveName(kind: BackupKind, date: Date = new Date()): string {
  const tag = kind === "full" ? "full" : "incr";
  return `backup-${tag}-${formatTimestamp(date)}.tar.zst`;
}

export function parseArchiveName(archiveName: string): ParsedArchiveName | null {
  const match = archiveName.match(ARCHIVE_NAME_PATTERN);
  if (!match) return null;

  const [, tag, date, time] = match;
  if (tag === undefined || date === undefined || time === undefined) return null;

  const createdAt = new Date(
    Number(date.slice(0, 4)),
    Number(date.slice(4, 6)) - 1,
    Number(date.slice(6, 8)),
    Number(time.slice(0, 2)),
    Number(time.slice(2, 4)),
    Number(time.slice(4, 6)),
  );

  return {
    kind: tag === "full" ? "full" : "incremental",
    date,
    time,
    createdAt,
  };
}

export function isValidArchiveName(archiveName: string): boolean {
  return parseArchiveName(archiveName) !== null;
}

/**
 * `backups/<name>` for a bare name; keys that already carry the prefix are
 * returned as they are.
 */
export function toRemoteKey(name: string): string {
  return name.startsWith(REMOTE_PREFIX) ? name : `${REMOTE_PREFIX}${name}`;
}

export function stripRemotePrefix(key: string): string {
  return key.startsWith(REMOTE_PREFIX) ? key.slice(REMOTE_PREFIX.length) : key;
}
