/**
 * Plumbing shared by the commands: common flags, config and provider
 * set-up, failure reporting
 */

import { findAndLoadConfig } from "../config/loader";
import { createStorageProvider } from "../storage";
import type { IStorageProvider, ResolvedConfig } from "../types";
import { formatErrorChain } from "../utils/errors";
import { setLogDirectory, setLogLevel } from "../utils/logger";
import { ui } from "./ui";

export const COMMON_OPTIONS = {
  config: { type: "string", short: "c" },
  verbose: { type: "boolean", short: "v", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const;

export interface CommandContext {
  config: ResolvedConfig;
  provider: IStorageProvider;
}

export function applyVerbosity(verbose: boolean | undefined): void {
  if (verbose) {
    setLogLevel("debug");
  }
}

/**
 * Load the config file and point the logger at it. --verbose wins over the
 * configured level.
 */
export async function loadCommandConfig(
  configPath: string | undefined,
  verbose: boolean | undefined,
): Promise<ResolvedConfig> {
  const config = await findAndLoadConfig(configPath);
  setLogLevel(verbose ? "debug" : config.logging.level);
  setLogDirectory(config.logging.logDir);
  return config;
}

export async function loadCommandContext(
  configPath: string | undefined,
  verbose: boolean | undefined,
): Promise<CommandContext> {
  const config = await loadCommandConfig(configPath, verbose);
  return { config, provider: createStorageProvider(config.storage) };
}

/**
 * Print "<Action> failed: <cause chain>" and return the exit code
 */
export function reportFailure(action: string, error: unknown, verbose: boolean | undefined): number {
  ui.error(`${action} failed: ${formatErrorChain(error)}`);
  if (verbose) {
    console.error(error);
  }
  return 1;
}
