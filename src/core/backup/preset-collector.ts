/**
 * System presets: nginx, crontab, home dotfiles and /etc paths
 */

import * as path from "node:path";
import type { PresetSettings, ProcessResult, ProcessRunner } from "../../types";
import { logger } from "../../utils/logger";
import { statOrNull, toArchivePath } from "../../utils/path";
import type { ArchiveWriter } from "./archive-writer";
import type { ExclusionSet } from "./exclusion";
import { appendPath, appendSingleFile } from "./file-collector";

export const DEFAULT_ETC_DIR = "/etc";

const NGINX_SITE_DIRS = ["sites-available", "sites-enabled"] as const;

export interface PresetContext {
  writer: ArchiveWriter;
  exclusions: ExclusionSet;
  runner: ProcessRunner;
  /** Root standing in for /etc */
  etcDir?: string;
}

async function appendDirectory(
  ctx: PresetContext,
  sourcePath: string,
  archivePath: string,
): Promise<number> {
  if (!(await statOrNull(sourcePath))?.isDirectory()) {
    logger.debug(`Not a directory, skipping: ${sourcePath}`);
    return 0;
  }
  return ctx.writer.appendTree(sourcePath, archivePath, ctx.exclusions);
}

async function collectNginx(ctx: PresetContext, presets: PresetSettings, nginxDir: string): Promise<number> {
  let added = 0;

  if (presets.nginxEnabled) {
    const mainConfig = path.join(nginxDir, "nginx.conf");
    if (await appendSingleFile(ctx.writer, mainConfig, "system/nginx/nginx.conf", ctx.exclusions)) {
      added++;
    }
    for (const dir of NGINX_SITE_DIRS) {
      added += await appendDirectory(ctx, path.join(nginxDir, dir), toArchivePath("system/nginx", dir));
    }
  }

  for (const site of presets.nginxSites) {
    for (const dir of NGINX_SITE_DIRS) {
      const sitePath = path.join(nginxDir, dir, site);
      if (await appendSingleFile(ctx.writer, sitePath, toArchivePath("system/nginx", dir, site), ctx.exclusions)) {
        added++;
      }
    }
  }

  return added;
}

export function crontabArgs(user: string, currentUser: string | undefined): string[] {
  return user === "root" || user === currentUser ? ["-l"] : ["-u", user, "-l"];
}

async function collectCrontab(ctx: PresetContext, presets: PresetSettings): Promise<number> {
  const user = presets.crontabUser;

  let result: ProcessResult;
  try {
    result = await ctx.runner.run("crontab", crontabArgs(user, presets.currentUser));
  } catch (error) {
    logger.warn("Failed to run crontab, skipping", error);
    return 0;
  }

  if (result.exitCode !== 0) {
    logger.debug(`No crontab for ${user}`, result.stderr.trim() || undefined);
    return 0;
  }

  await ctx.writer.appendEntry(`system/crontab-${user}.txt`, result.stdout);
  return 1;
}

/**
 * Resolve presets to paths and append whatever exists
 */
export async function collectPresets(ctx: PresetContext, presets: PresetSettings): Promise<number> {
  const etcDir = ctx.etcDir ?? DEFAULT_ETC_DIR;
  let added = 0;

  added += await collectNginx(ctx, presets, path.join(etcDir, "nginx"));

  if (presets.crontabEnabled) {
    added += await collectCrontab(ctx, presets);
  }

  for (const name of presets.userConfigs) {
    added += await appendPath(
      ctx.writer,
      path.join(presets.userConfigsHome, name),
      toArchivePath("user-configs", name),
      ctx.exclusions,
    );
  }

  for (const name of presets.etcFiles) {
    added += await appendPath(ctx.writer, path.join(etcDir, name), toArchivePath("etc", name), ctx.exclusions);
  }

  for (const name of presets.etcDirs) {
    added += await appendDirectory(ctx, path.join(etcDir, name), toArchivePath("etc", name));
  }

  return added;
}
