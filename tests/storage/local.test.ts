import { existsSync } from "node:fs";
import { mkdir, utimes } from "node:fs/promises";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { deleteLocalBackup, listLocalBackups } from "../../src/storage/local";
import { makeTempDir, removeTempDir, writeFiles } from "../helpers";

describe("local backups", () => {
  let tempDir: string;
  let backupDir: string;
  const customMtime = new Date("2024-02-01T12:00:00Z");

  beforeAll(async () => {
    tempDir = await makeTempDir("local");
    backupDir = path.join(tempDir, "backups");
    await writeFiles(backupDir, {
      "backup-incr-20240102-030405.tar.zst": "incr",
      "backup-full-20240101-000000.tar.zst": "full!",
      "manual-full-copy.zst": "custom",
      "notes.txt": "not a backup",
    });
    await utimes(path.join(backupDir, "manual-full-copy.zst"), customMtime, customMtime);
    await mkdir(path.join(backupDir, "folder.zst"));
  });

  afterAll(async () => {
    await removeTempDir(tempDir);
  });

  describe("listLocalBackups", () => {
    test("lists .zst files in name order", async () => {
      const backups = await listLocalBackups(backupDir);

      expect(backups.map((b) => [b.name, b.kind, b.sizeBytes])).toEqual([
        ["backup-full-20240101-000000.tar.zst", "full", 5],
        ["backup-incr-20240102-030405.tar.zst", "incremental", 4],
        ["manual-full-copy.zst", "full", 6],
      ]);
    });

    test("takes the creation time from the name, else the mtime", async () => {
      const [full, incr, custom] = await listLocalBackups(backupDir);

      expect(full?.createdAt).toEqual(new Date(2024, 0, 1, 0, 0, 0));
      expect(incr?.createdAt).toEqual(new Date(2024, 0, 2, 3, 4, 5));
      expect(custom?.createdAt).toEqual(customMtime);
      expect(custom?.path).toBe(path.join(backupDir, "manual-full-copy.zst"));
    });

    test("treats a missing directory as empty", async () => {
      expect(await listLocalBackups(path.join(tempDir, "nowhere"))).toEqual([]);
    });
  });

  describe("deleteLocalBackup", () => {
    test("removes a file inside the backup directory", async () => {
      const file = path.join(backupDir, "to-delete.tar.zst");
      await writeFiles(backupDir, { "to-delete.tar.zst": "x" });

      await deleteLocalBackup(file, backupDir);
      expect(existsSync(file)).toBe(false);
    });

    test("tolerates a file that is already gone", async () => {
      await expect(
        deleteLocalBackup(path.join(backupDir, "gone.tar.zst"), backupDir),
      ).resolves.toBeUndefined();
    });

    test("refuses paths outside the backup directory", async () => {
      const outside = path.join(tempDir, "elsewhere.tar.zst");
      await expect(deleteLocalBackup(outside, backupDir)).rejects.toThrow(
        `Refusing to delete ${outside}: outside ${backupDir}`,
      );
    });
  });
});
