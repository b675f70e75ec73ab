import { mkdir, readdir, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { ArchiveWriter } from "../../src/core/backup/archive-writer";
import { collectCommandOutputs } from "../../src/core/backup/command-collector";
import { buildDumpPlan, dumpDatabase } from "../../src/core/backup/database-dumper";
import { ExclusionSet } from "../../src/core/backup/exclusion";
import { collectAdditionalPaths, collectSystemdUnits } from "../../src/core/backup/file-collector";
import { collectPresets, crontabArgs } from "../../src/core/backup/preset-collector";
import type { DatabaseSettings, PresetSettings } from "../../src/types";
import { CollectorError } from "../../src/utils/errors";
import { failed, FakeRunner, makeTempDir, ok, readArchive, removeTempDir, writeFiles } from "../helpers";

describe("collectors", () => {
  let tempDir: string;
  let counter = 0;

  beforeAll(async () => {
    tempDir = await makeTempDir("collectors");
  });

  afterAll(async () => {
    await removeTempDir(tempDir);
  });

  async function openWriter(): Promise<{ writer: ArchiveWriter; archivePath: string }> {
    counter++;
    const archivePath = path.join(tempDir, "archives", `archive-${counter}.tar.zst`);
    return { writer: await ArchiveWriter.open(archivePath), archivePath };
  }

  describe("collectAdditionalPaths", () => {
    test("maps directories and files under system/ and skips missing paths", async () => {
      const extra = path.join(tempDir, "extra");
      await writeFiles(extra, { "conf/app.conf": "port=80", "single.txt": "one", "conf/cache/tmp.bin": "x" });

      const { writer, archivePath } = await openWriter();
      const added = await collectAdditionalPaths(
        writer,
        [path.join(extra, "conf"), path.join(extra, "single.txt"), path.join(extra, "missing")],
        new ExclusionSet(["cache"]),
      );
      await writer.finish();

      expect(added).toBe(2);
      expect((await readArchive(archivePath)).map((e) => [e.name, e.content])).toEqual([
        ["system/conf/app.conf", "port=80"],
        ["system/single.txt", "one"],
      ]);
    });

    test("applies the suffix rule to single files", async () => {
      const file = path.join(tempDir, "extra-log", "app.log");
      await writeFiles(path.dirname(file), { "app.log": "log" });

      const { writer } = await openWriter();
      expect(await collectAdditionalPaths(writer, [file], new ExclusionSet(["*.log"]))).toBe(0);
      await writer.finish();
    });
  });

  describe("collectSystemdUnits", () => {
    test("adds the unit files that exist", async () => {
      const systemdDir = path.join(tempDir, "systemd");
      await writeFiles(systemdDir, { "app.service": "[Unit]", "nightly.timer": "[Timer]" });

      const { writer, archivePath } = await openWriter();
      const added = await collectSystemdUnits(
        writer,
        ["app.service", "gone.service"],
        ["nightly.timer"],
        systemdDir,
      );
      await writer.finish();

      expect(added).toBe(2);
      expect((await readArchive(archivePath)).map((e) => e.name)).toEqual([
        "systemd/services/app.service",
        "systemd/timers/nightly.timer",
      ]);
    });
  });

  describe("collectCommandOutputs", () => {
    test("stores stdout of successful enabled commands only", async () => {
      const runner = new FakeRunner((command) => (command === "uname" ? ok("Linux\n") : failed(2, "boom")));

      const { writer, archivePath } = await openWriter();
      const added = await collectCommandOutputs(
        writer,
        [
          { command: "uname", args: ["-a"], outputFile: "uname.txt", enabled: true },
          { command: "docker", args: ["ps"], outputFile: "docker.txt", enabled: false },
          { command: "false", args: [], outputFile: "false.txt", enabled: true },
        ],
        runner,
      );
      await writer.finish();

      expect(added).toBe(1);
      expect(runner.calls.map((c) => [c.command, c.args])).toEqual([
        ["uname", ["-a"]],
        ["false", []],
      ]);
      expect((await readArchive(archivePath)).map((e) => [e.name, e.content])).toEqual([
        ["commands/uname.txt", "Linux\n"],
      ]);
    });

    test("skips commands that cannot be started", async () => {
      const runner = new FakeRunner(() => {
        throw new Error("spawn ENOENT");
      });

      const { writer } = await openWriter();
      const added = await collectCommandOutputs(
        writer,
        [{ command: "missing-tool", args: [], outputFile: "x.txt", enabled: true }],
        runner,
      );
      await writer.finish();

      expect(added).toBe(0);
    });
  });

  describe("collectPresets", () => {
    test("resolves nginx, crontab, home and /etc presets", async () => {
      const etcDir = path.join(tempDir, "etc");
      const home = path.join(tempDir, "home");
      await writeFiles(etcDir, {
        "nginx/nginx.conf": "worker_processes 1;",
        "nginx/sites-available/app": "server {}",
        hosts: "127.0.0.1 localhost",
      });
      await writeFiles(home, { ".bashrc": "alias ll='ls -l'" });

      const presets: PresetSettings = {
        nginxEnabled: true,
        nginxSites: [],
        crontabEnabled: true,
        crontabUser: "root",
        currentUser: "deploy",
        userConfigs: [".bashrc", ".vimrc"],
        userConfigsHome: home,
        etcFiles: ["hosts", "fstab"],
        etcDirs: ["ssh"],
      };
      const runner = new FakeRunner(() => ok("0 3 * * * /usr/local/bin/job\n"));

      const { writer, archivePath } = await openWriter();
      const added = await collectPresets({ writer, exclusions: new ExclusionSet(), runner, etcDir }, presets);
      await writer.finish();

      expect(added).toBe(5);
      expect(runner.calls).toEqual([{ command: "crontab", args: ["-l"], options: undefined }]);
      expect((await readArchive(archivePath)).map((e) => e.name)).toEqual([
        "system/nginx/nginx.conf",
        "system/nginx/sites-available/app",
        "system/crontab-root.txt",
        "user-configs/.bashrc",
        "etc/hosts",
      ]);
    });

    test("crontabArgs uses -u only for another user", () => {
      expect(crontabArgs("root", "deploy")).toEqual(["-l"]);
      expect(crontabArgs("deploy", "deploy")).toEqual(["-l"]);
      expect(crontabArgs("www-data", "deploy")).toEqual(["-u", "www-data", "-l"]);
    });
  });

  describe("database dumps", () => {
    const postgres: DatabaseSettings = {
      type: "postgres",
      host: "localhost",
      port: 5432,
      database: "app",
      username: "app",
      password: "test-password",
    };

    test("buildDumpPlan for mysql passes credentials as flags", () => {
      const plan = buildDumpPlan(
        "mysql",
        { host: "db", port: 3306, database: "shop", username: "root", password: "test-password" },
        "/tmp/unused",
      );
      expect(plan).toEqual({
        command: "mysqldump",
        args: ["-hdb", "-P3306", "-uroot", "-ptest-password", "shop"],
        extension: "sql",
        writesDumpFile: false,
      });
    });

    test("stores pg_dump output and removes the temporary file", async () => {
      const tmpDir = path.join(tempDir, "tmp-pg");
      await mkdir(tmpDir, { recursive: true });
      const runner = new FakeRunner(() => ok("CREATE TABLE users ();\n"));

      const { writer, archivePath } = await openWriter();
      const entry = await dumpDatabase(writer, postgres, runner, { tmpDir });
      await writer.finish();

      expect(entry).toBe("database/app.sql");
      expect(runner.calls).toEqual([
        {
          command: "pg_dump",
          args: ["-h", "localhost", "-p", "5432", "-U", "app", "-d", "app", "-F", "plain"],
          options: { env: { PGPASSWORD: "test-password" } },
        },
      ]);
      expect((await readArchive(archivePath)).map((e) => [e.name, e.content])).toEqual([
        ["database/app.sql", "CREATE TABLE users ();\n"],
      ]);
      expect(await readdir(tmpDir)).toEqual([]);
    });

    test("reads the file redis-cli writes", async () => {
      const tmpDir = path.join(tempDir, "tmp-redis");
      await mkdir(tmpDir, { recursive: true });
      const runner = new FakeRunner(async (_command, args) => {
        const dumpFile = args.at(-1);
        if (dumpFile) await writeFile(dumpFile, "REDIS0009");
        return ok();
      });

      const { writer, archivePath } = await openWriter();
      const entry = await dumpDatabase(
        writer,
        { ...postgres, type: "redis", port: 6379, database: "cache" },
        runner,
        { tmpDir },
      );
      await writer.finish();

      expect(entry).toBe("database/cache.rdb");
      expect((await readArchive(archivePath)).map((e) => e.content)).toEqual(["REDIS0009"]);
    });

    test("copies sqlite files", async () => {
      const dbFile = path.join(tempDir, "data", "app.db");
      await writeFiles(path.dirname(dbFile), { "app.db": "SQLite format 3" });

      const { writer, archivePath } = await openWriter();
      const entry = await dumpDatabase(writer, { type: "sqlite", database: dbFile }, new FakeRunner(), {
        tmpDir: path.join(tempDir, "archives"),
      });
      await writer.finish();

      expect(entry).toBe("database/app.db.sqlite");
      expect((await readArchive(archivePath)).map((e) => e.content)).toEqual(["SQLite format 3"]);
    });

    test("fails when the dump tool exits non-zero", async () => {
      const runner = new FakeRunner(() => failed(1, "connection refused\n"));

      const { writer } = await openWriter();
      await expect(
        dumpDatabase(writer, postgres, runner, { tmpDir: path.join(tempDir, "archives") }),
      ).rejects.toThrow("Database dump failed: connection refused");
      await writer.abort();
    });

    test("requires a password", async () => {
      const { writer } = await openWriter();
      const { password: _password, ...withoutPassword } = postgres;
      await expect(dumpDatabase(writer, withoutPassword, new FakeRunner())).rejects.toThrow(
        /^Database password required/,
      );
      await writer.abort();
    });

    test("rejects unsupported types", async () => {
      const { writer } = await openWriter();
      const attempt = dumpDatabase(writer, { ...postgres, type: "oracle" }, new FakeRunner());
      await expect(attempt).rejects.toBeInstanceOf(CollectorError);
      await expect(attempt).rejects.toThrow(
        "Unsupported database type: oracle. Supported: postgres, postgresql, mariadb, mysql, mongodb, cassandra, scylla, redis, sqlite",
      );
      await writer.abort();
    });
  });
});
