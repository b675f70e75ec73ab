/**
 * Restore an archive with the system tar and zstd
 */

import { mkdir } from "node:fs/promises";
import type { ProcessRunner } from "../../types";
import { logger } from "../../utils/logger";
import { defaultProcessRunner } from "../../utils/process";

export const DEFAULT_RESTORE_DIR = "./restored";

export async function restoreBackup(
  file: string,
  targetDir: string = DEFAULT_RESTORE_DIR,
  runner: ProcessRunner = defaultProcessRunner,
): Promise<void> {
  logger.info(`Restoring ${file} to ${targetDir}`);
  await mkdir(targetDir, { recursive: true });

  const result = await runner.run("tar", ["-I", "zstd -d", "-xf", file, "-C", targetDir]);
  if (result.exitCode !== 0) {
    throw new Error(`Restore failed: ${result.stderr.trim() || `tar exited with ${result.exitCode}`}`);
  }

  logger.info("Restore completed");
}
