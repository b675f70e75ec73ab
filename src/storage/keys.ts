/**
 * Mapping between storage keys and backend paths
 *
 * Path-addressed backends (Dropbox, pCloud, MEGA) store `backups/x.tar.zst`
 * as `<root>/backups/x.tar.zst`. Folder-id backends (Google Drive,
 * OneDrive, Box) store it as `x.tar.zst` inside the configured folder and
 * rebuild the key from the listing prefix.
 */

import * as path from "node:path";

export interface SplitPrefix {
  /** Directory part including its trailing slash, or "" */
  dir: string;
  /** What remaining file names must start with */
  namePrefix: string;
}

export function splitPrefix(prefix: string): SplitPrefix {
  const slash = prefix.lastIndexOf("/");
  if (slash === -1) return { dir: "", namePrefix: prefix };
  return { dir: prefix.slice(0, slash + 1), namePrefix: prefix.slice(slash + 1) };
}

export function keyName(key: string): string {
  return path.posix.basename(key);
}

/**
 * Absolute POSIX path under root; root "" or "/" means the backend root.
 */
export function joinRemotePath(root: string, ...parts: string[]): string {
  const joined = path.posix.join("/", root, ...parts);
  return joined.length > 1 && joined.endsWith("/") ? joined.slice(0, -1) : joined;
}
