/**
 * Path helpers
 */

import { stat } from "node:fs/promises";
import * as path from "node:path";
import type { Stats } from "node:fs";
import { errorCode } from "./errors";

/**
 * Check if a file path is within an allowed directory.
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return normalizedPath.startsWith(normalizedDir + path.sep) || normalizedPath === normalizedDir;
}

/**
 * Join archive path segments with forward slashes. A backslash is an
 * ordinary filename character here; callers holding host paths split them
 * on path.sep first.
 */
export function toArchivePath(...segments: string[]): string {
  return segments
    .flatMap((segment) => segment.split("/"))
    .filter((segment) => segment.length > 0)
    .join("/");
}

/**
 * stat() that reports a missing path as null instead of throwing
 */
export async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await stat(target);
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT" || code === "ENOTDIR" || code === "ELOOP") {
      return null;
    }
    throw error;
  }
}
