import { existsSync } from "node:fs";
import { readdir, utimes } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { runCleanup } from "../../src/core/cleanup/orchestrator";
import { expiredRemoteItems, retentionCutoff } from "../../src/core/cleanup/retention";
import type { ResolvedConfig } from "../../src/types";
import { makeTempDir, MemoryStorageProvider, removeTempDir, testConfig, writeFiles } from "../helpers";

const DAY_MS = 24 * 60 * 60 * 1000;

describe("retention", () => {
  test("retentionCutoff subtracts whole days", () => {
    const now = new Date("2024-03-10T12:00:00Z");
    expect(retentionCutoff(7, now)).toEqual(new Date("2024-03-03T12:00:00Z"));
    expect(retentionCutoff(0, now)).toEqual(now);
  });

  test("remote items without a timestamp never expire", () => {
    const cutoff = new Date("2024-03-03T00:00:00Z");
    const items = [
      { key: "backups/old.tar.zst", size: 1, lastModified: new Date("2024-03-01T00:00:00Z") },
      { key: "backups/new.tar.zst", size: 1, lastModified: new Date("2024-03-05T00:00:00Z") },
      { key: "backups/unknown.tar.zst", size: 1 },
    ];
    expect(expiredRemoteItems(items, cutoff).map((i) => i.key)).toEqual(["backups/old.tar.zst"]);
  });
});

describe("runCleanup", () => {
  let root: string;
  let config: ResolvedConfig;
  let backupDir: string;

  async function writeBackup(name: string, ageDays: number): Promise<string> {
    const file = path.join(backupDir, name);
    await writeFiles(backupDir, { [name]: "archive" });
    const mtime = new Date(Date.now() - ageDays * DAY_MS);
    await utimes(file, mtime, mtime);
    return file;
  }

  beforeEach(async () => {
    root = await makeTempDir("cleanup");
    config = testConfig(root, { retentionDays: 7 });
    backupDir = config.backup.localBackupDir;
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  test("keeps only backups inside the retention window", async () => {
    const old = await writeBackup("backup-full-20240101-000000.tar.zst", 10);
    const recent = await writeBackup("backup-incr-20240108-000000.tar.zst", 3);
    const provider = new MemoryStorageProvider();
    provider.put("backups/old.tar.zst", "x", new Date(Date.now() - 10 * DAY_MS));
    provider.put("backups/recent.tar.zst", "x", new Date(Date.now() - 3 * DAY_MS));
    provider.put("other/old.tar.zst", "x", new Date(Date.now() - 10 * DAY_MS));

    const result = await runCleanup(config, provider);

    expect(result.local.map((b) => b.path)).toEqual([old]);
    expect(result.remote.map((i) => i.key)).toEqual(["backups/old.tar.zst"]);
    expect(await readdir(backupDir)).toEqual([path.basename(recent)]);
    expect([...provider.objects.keys()].sort()).toEqual(["backups/recent.tar.zst", "other/old.tar.zst"]);
  });

  test("dry run deletes nothing and skips the remote", async () => {
    const old = await writeBackup("backup-full-20240101-000000.tar.zst", 10);
    const provider = new MemoryStorageProvider();
    provider.put("backups/old.tar.zst", "x", new Date(Date.now() - 10 * DAY_MS));

    const result = await runCleanup(config, provider, { dryRun: true });

    expect(result.dryRun).toBe(true);
    expect(result.local.map((b) => b.path)).toEqual([old]);
    expect(result.remote).toEqual([]);
    expect(existsSync(old)).toBe(true);
    expect(provider.deleted).toEqual([]);
  });

  test("retention of zero removes everything older than now", async () => {
    await writeBackup("backup-full-20240101-000000.tar.zst", 1 / 24);
    const provider = new MemoryStorageProvider();
    provider.put("backups/a.tar.zst", "x", new Date(Date.now() - 60_000));

    const zero = testConfig(root, { retentionDays: 0 });
    const result = await runCleanup(zero, provider);

    expect(result.local).toHaveLength(1);
    expect(result.remote.map((i) => i.key)).toEqual(["backups/a.tar.zst"]);
    expect(await readdir(backupDir)).toEqual([]);
  });

  test("a second run finds nothing to delete", async () => {
    await writeBackup("backup-full-20240101-000000.tar.zst", 10);
    const provider = new MemoryStorageProvider();
    provider.put("backups/old.tar.zst", "x", new Date(Date.now() - 10 * DAY_MS));

    await runCleanup(config, provider);
    const second = await runCleanup(config, provider);

    expect(second.local).toEqual([]);
    expect(second.remote).toEqual([]);
    expect(provider.deleted).toEqual(["backups/old.tar.zst"]);
  });

  test("a missing backup directory is not an error", async () => {
    const result = await runCleanup(config, new MemoryStorageProvider());
    expect(result.local).toEqual([]);
  });

  test("uses the injected clock for the cutoff", async () => {
    const now = new Date("2030-01-01T00:00:00Z");
    const result = await runCleanup(config, new MemoryStorageProvider(), { now: () => now });
    expect(result.cutoff).toEqual(new Date("2029-12-25T00:00:00Z"));
  });
});
