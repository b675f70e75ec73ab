import { open, readFile, symlink } from "node:fs/promises";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test, vi } from "vitest";
import { ArchiveWriter } from "../../src/core/backup/archive-writer";
import { ExclusionSet } from "../../src/core/backup/exclusion";
import { CollectorError } from "../../src/utils/errors";
import { makeTempDir, readArchive, removeTempDir, writeFiles } from "../helpers";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, readFile: vi.fn(actual.readFile), open: vi.fn(actual.open) };
});

describe("ArchiveWriter.appendTree file handling", () => {
  let tempDir: string;
  let counter = 0;

  beforeAll(async () => {
    tempDir = await makeTempDir("archive-tree");
  });

  afterAll(async () => {
    await removeTempDir(tempDir);
  });

  async function tree(files: Record<string, string>): Promise<{ root: string; archivePath: string }> {
    counter++;
    const root = path.join(tempDir, `tree-${counter}`);
    await writeFiles(root, files);
    return { root, archivePath: path.join(tempDir, "out", `archive-${counter}.tar.zst`) };
  }

  test("streams a file whose direct read fails", async () => {
    const { root, archivePath } = await tree({ "data.bin": "streamed content" });
    const writer = await ArchiveWriter.open(archivePath);
    vi.mocked(readFile).mockRejectedValueOnce(new Error("EIO: i/o error, read"));

    expect(await writer.appendTree(root, "project", new ExclusionSet())).toBe(1);
    await writer.finish();

    expect((await readArchive(archivePath)).map((e) => [e.name, e.content])).toEqual([
      ["project/data.bin", "streamed content"],
    ]);
  });

  test("fails naming the file when the streamed copy fails too", async () => {
    const { root, archivePath } = await tree({ "data.bin": "unreadable" });
    const writer = await ArchiveWriter.open(archivePath);
    vi.mocked(readFile).mockRejectedValueOnce(new Error("EIO: i/o error, read"));
    vi.mocked(open).mockRejectedValueOnce(new Error("EIO: i/o error, open"));

    const error = await writer.appendTree(root, "project", new ExclusionSet()).catch((e: unknown) => e);
    await writer.abort();

    expect(error).toBeInstanceOf(CollectorError);
    expect(error).toHaveProperty("message", `Failed to add file to archive: ${path.join(root, "data.bin")}`);
  });

  test("archives a linked file with the target's content and skips linked directories", async () => {
    const outside = path.join(tempDir, "outside");
    await writeFiles(outside, { "target.txt": "target content", "dir/secret.txt": "not followed" });
    const { root, archivePath } = await tree({ "real/x.txt": "x" });
    await symlink(path.join(outside, "target.txt"), path.join(root, "linkfile"));
    await symlink(path.join(outside, "dir"), path.join(root, "linkdir"));
    await symlink(path.join(outside, "missing.txt"), path.join(root, "broken"));

    const writer = await ArchiveWriter.open(archivePath);
    expect(await writer.appendTree(root, "project", new ExclusionSet())).toBe(2);
    await writer.finish();

    expect((await readArchive(archivePath)).map((e) => [e.name, e.content])).toEqual([
      ["project/linkfile", "target content"],
      ["project/real/x.txt", "x"],
    ]);
  });

  test("keeps backslashes in file names", async () => {
    const { root, archivePath } = await tree({ "we\\ird.txt": "odd", "we/ird.txt": "nested" });

    const writer = await ArchiveWriter.open(archivePath);
    await writer.appendTree(root, "project", new ExclusionSet());
    await writer.finish();

    expect((await readArchive(archivePath)).map((e) => e.name).sort()).toEqual([
      "project/we/ird.txt",
      "project/we\\ird.txt",
    ]);
  });
});
