/**
 * Configuration file loading
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { ResolvedConfig } from "../types";
import { errorCode } from "../utils/errors";
import { DEFAULT_CONFIG, deepMerge, isPlainObject } from "./defaults";
import { type Environment, resolveConfig } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = [
  "packrat.config.yaml",
  "packrat.config.yml",
  "packrat.config.json",
];

export function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Load, validate and resolve a config file
 */
export async function loadConfig(
  configPath: string,
  env: Environment = process.env,
): Promise<ResolvedConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      throw new ConfigError(`Config file not found: ${absolutePath}`);
    }
    throw new ConfigError(`Failed to read config file: ${absolutePath}`, { cause: error });
  }

  const parsed = parseConfigContent(content, path.extname(absolutePath).toLowerCase());
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file is empty or not a mapping: ${absolutePath}`);
  }

  const merged = deepMerge(DEFAULT_CONFIG, parsed);
  validateConfig(merged);

  return resolveConfig(merged, { configPath: absolutePath, env });
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    if (existsSync(configPath)) {
      return configPath;
    }
  }

  return null;
}

/**
 * Find and load a config file
 */
export async function findAndLoadConfig(configPath?: string): Promise<ResolvedConfig> {
  if (configPath) {
    return loadConfig(configPath);
  }

  const found = findConfigFile();
  if (!found) {
    throw new ConfigError(
      "No config file found. Create packrat.config.yaml (see `packrat generate-config`) or specify --config path",
    );
  }

  return loadConfig(found);
}
