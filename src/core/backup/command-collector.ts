/**
 * Captured command output
 */

import type { CommandOutputSettings, ProcessResult, ProcessRunner } from "../../types";
import { logger } from "../../utils/logger";
import { toArchivePath } from "../../utils/path";
import type { ArchiveWriter } from "./archive-writer";

/**
 * Run each enabled command (no shell) and store its stdout under
 * `commands/<outputFile>`. Failures never abort the backup.
 */
export async function collectCommandOutputs(
  writer: ArchiveWriter,
  outputs: readonly CommandOutputSettings[],
  runner: ProcessRunner,
): Promise<number> {
  let added = 0;

  for (const output of outputs) {
    if (!output.enabled) continue;

    const commandLine = [output.command, ...output.args].join(" ");
    let result: ProcessResult;
    try {
      result = await runner.run(output.command, output.args);
    } catch (error) {
      logger.warn(`Failed to run command, skipping: ${commandLine}`, error);
      continue;
    }

    if (result.exitCode !== 0) {
      logger.warn(`Command failed (exit ${result.exitCode}): ${commandLine}`, result.stderr.trim() || undefined);
      continue;
    }

    await writer.appendEntry(toArchivePath("commands", output.outputFile), result.stdout);
    logger.debug(`Captured ${commandLine} -> commands/${output.outputFile}`);
    added++;
  }

  return added;
}
