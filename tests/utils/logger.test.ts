import { readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, test, vi } from "vitest";
import {
  getLogFile,
  getLogLevel,
  info,
  isLogLevel,
  LOG_FILE_NAME,
  readLogTail,
  setLogDirectory,
  setLogLevel,
  warn,
} from "../../src/utils/logger";
import { makeTempDir, removeTempDir } from "../helpers";

describe("logger", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await makeTempDir("logger");
  });

  afterAll(async () => {
    await removeTempDir(tempDir);
  });

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setLogDirectory(null);
    setLogLevel("info");
  });

  describe("isLogLevel", () => {
    test("accepts the four levels only", () => {
      expect(isLogLevel("debug")).toBe(true);
      expect(isLogLevel("error")).toBe(true);
      expect(isLogLevel("trace")).toBe(false);
      expect(isLogLevel(1)).toBe(false);
    });
  });

  describe("level filtering", () => {
    test("drops messages below the current level", () => {
      setLogLevel("warn");
      expect(getLogLevel()).toBe("warn");

      info("hidden");
      warn("shown");

      expect(console.log).not.toHaveBeenCalled();
      expect(console.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe("log file", () => {
    test("mirrors lines without colour codes", async () => {
      const logDir = path.join(tempDir, "mirror");
      setLogDirectory(logDir);
      expect(getLogFile()).toBe(path.join(logDir, LOG_FILE_NAME));

      info("first line");
      warn("second line");

      const lines = (await readFile(path.join(logDir, LOG_FILE_NAME), "utf8")).trimEnd().split("\n");
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] INFO  first line$/);
      expect(lines[1]).toMatch(/^\[[^\]]+\] WARN  second line$/);
    });
  });

  describe("readLogTail", () => {
    test("returns the last lines", async () => {
      const logDir = path.join(tempDir, "tail");
      setLogDirectory(logDir);
      await writeFile(path.join(logDir, LOG_FILE_NAME), "one\ntwo\nthree\n");

      expect(await readLogTail(logDir, 2)).toEqual(["two", "three"]);
      expect(await readLogTail(logDir, 10)).toEqual(["one", "two", "three"]);
      expect(await readLogTail(logDir, 0)).toEqual([]);
    });

    test("returns null when no log file exists", async () => {
      expect(await readLogTail(path.join(tempDir, "nothing-here"), 5)).toBeNull();
    });
  });
});
