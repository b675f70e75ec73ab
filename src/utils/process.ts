/**
 * External process execution
 */

import { execa } from "execa";
import type { ProcessResult, ProcessRunner, RunOptions } from "../types";
import { logger } from "./logger";

function toBytes(value: unknown): Uint8Array {
  if (value instanceof Uint8Array) return value;
  if (typeof value === "string") return Buffer.from(value);
  return new Uint8Array(0);
}

function toText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Uint8Array) return Buffer.from(value).toString("utf8");
  return "";
}

/**
 * ProcessRunner backed by execa. Arguments are passed straight to the
 * program, never through a shell.
 */
export class ExecaProcessRunner implements ProcessRunner {
  async run(
    command: string,
    args: readonly string[],
    options: RunOptions = {},
  ): Promise<ProcessResult> {
    logger.debug(`Running: ${command} ${args.join(" ")}`);

    const result = await execa(command, [...args], {
      reject: false,
      encoding: "buffer",
      stdin: "ignore",
      env: options.env,
      cwd: options.cwd,
    });

    if (result.failed && result.exitCode === undefined && result.signal === undefined) {
      throw new Error(`Failed to start ${command}: ${toText(result.stderr) || "command not found"}`);
    }

    return {
      // Killed by a signal: no exit status, report a failure code
      exitCode: result.exitCode ?? 1,
      stdout: toBytes(result.stdout),
      stderr: toText(result.stderr),
    };
  }
}

export const defaultProcessRunner: ProcessRunner = new ExecaProcessRunner();

export function decodeOutput(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("utf8");
}
