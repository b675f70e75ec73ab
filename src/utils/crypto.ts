import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

/**
 * Hex digest of a file, read as a stream
 */
export async function computeFileChecksum(
  filePath: string,
  algorithm: "sha1" | "sha256" = "sha256",
): Promise<string> {
  const hash = createHash(algorithm);
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}
