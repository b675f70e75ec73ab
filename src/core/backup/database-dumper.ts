/**
 * Database dumps through the vendor dump utilities
 */

import { copyFile, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { DatabaseSettings, ProcessResult, ProcessRunner } from "../../types";
import { CollectorError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { formatTimestamp } from "../../utils/naming";
import { statOrNull, toArchivePath } from "../../utils/path";
import type { ArchiveWriter } from "./archive-writer";

export const SUPPORTED_DATABASE_TYPES = [
  "postgres",
  "postgresql",
  "mariadb",
  "mysql",
  "mongodb",
  "cassandra",
  "scylla",
  "redis",
  "sqlite",
] as const;

export type DatabaseType = (typeof SUPPORTED_DATABASE_TYPES)[number];

export interface ConnectionFields {
  host: string;
  port: number;
  database: string;
  username: string;
  password: string;
}

export interface DumpPlan {
  command: string;
  args: string[];
  env?: Record<string, string>;
  extension: "sql" | "cql" | "rdb" | "dump";
  /** The tool writes the dump file itself instead of printing it */
  writesDumpFile: boolean;
}

export interface DumpOptions {
  tmpDir?: string;
  now?: Date;
}

export function isSupportedDatabaseType(type: string): type is DatabaseType {
  return SUPPORTED_DATABASE_TYPES.some((supported) => supported === type);
}

function unsupported(type: string): CollectorError {
  return new CollectorError(
    `Unsupported database type: ${type}. Supported: ${SUPPORTED_DATABASE_TYPES.join(", ")}`,
  );
}

export function requireConnectionFields(settings: DatabaseSettings): ConnectionFields {
  const { host, port, database, username, password } = settings;
  if (!host) throw new CollectorError("Database host is required");
  if (port === undefined) throw new CollectorError("Database port is required");
  if (!database) throw new CollectorError("Database name is required");
  if (!username) throw new CollectorError("Database username is required");
  if (password === undefined) {
    throw new CollectorError(
      "Database password required (set database.password, DB_PASSWORD, or DATABASE_URL in the project .env)",
    );
  }
  return { host, port, database, username, password };
}

export function buildDumpPlan(type: DatabaseType, fields: ConnectionFields, dumpFile: string): DumpPlan {
  const { host, database, username, password } = fields;
  const port = String(fields.port);

  switch (type) {
    case "postgres":
    case "postgresql":
      return {
        command: "pg_dump",
        args: ["-h", host, "-p", port, "-U", username, "-d", database, "-F", "plain"],
        env: { PGPASSWORD: password },
        extension: "sql",
        writesDumpFile: false,
      };
    case "mariadb":
    case "mysql":
      return {
        command: "mysqldump",
        args: [`-h${host}`, `-P${port}`, `-u${username}`, `-p${password}`, database],
        extension: "sql",
        writesDumpFile: false,
      };
    case "mongodb":
      return {
        command: "mongodump",
        args: [
          `--host=${host}:${port}`,
          `--username=${username}`,
          `--password=${password}`,
          `--db=${database}`,
          "--archive",
        ],
        extension: "dump",
        writesDumpFile: false,
      };
    case "cassandra":
    case "scylla":
      return {
        command: "cqlsh",
        args: [host, port, "-u", username, "-p", password, "-e", `DESCRIBE KEYSPACE ${database};`],
        extension: "cql",
        writesDumpFile: false,
      };
    case "redis":
      return {
        command: "redis-cli",
        args: ["-h", host, "-p", port, "-a", password, "--rdb", dumpFile],
        extension: "rdb",
        writesDumpFile: true,
      };
    case "sqlite":
      throw new CollectorError("SQLite databases are copied, not dumped");
  }
}

function tempDumpPath(database: string, options: DumpOptions): string {
  const safeName = database.replace(/[\\/]/g, "_");
  return path.join(
    options.tmpDir ?? os.tmpdir(),
    `backup_db_${safeName}_${formatTimestamp(options.now)}.dump`,
  );
}

async function removeTempFile(file: string): Promise<void> {
  await rm(file, { force: true }).catch((error: unknown) => {
    logger.debug(`Could not remove temporary dump ${file}`, error);
  });
}

async function copySqlite(
  writer: ArchiveWriter,
  settings: DatabaseSettings,
  options: DumpOptions,
): Promise<string> {
  const source = settings.database;
  if (!source) throw new CollectorError("Database name is required");

  if (!(await statOrNull(source))?.isFile()) {
    throw new CollectorError(`SQLite database file not found: ${source}`);
  }

  const tempFile = tempDumpPath(path.basename(source), options);
  const archivePath = toArchivePath("database", `${path.basename(source)}.sqlite`);
  try {
    await copyFile(source, tempFile);
    await writer.appendFile(tempFile, archivePath);
  } finally {
    await removeTempFile(tempFile);
  }
  return archivePath;
}

/**
 * Dump the configured database into `database/<name>.<ext>`. Every failure
 * is fatal to the backup. Returns the archive path written.
 */
export async function dumpDatabase(
  writer: ArchiveWriter,
  settings: DatabaseSettings,
  runner: ProcessRunner,
  options: DumpOptions = {},
): Promise<string> {
  const type = settings.type;
  if (!isSupportedDatabaseType(type)) throw unsupported(type);

  if (type === "sqlite") {
    return copySqlite(writer, settings, options);
  }

  const fields = requireConnectionFields(settings);
  const dumpFile = tempDumpPath(fields.database, options);
  const plan = buildDumpPlan(type, fields, dumpFile);

  logger.info(`Dumping ${type} database ${fields.database} with ${plan.command}`);

  let result: ProcessResult;
  try {
    result = await runner.run(plan.command, plan.args, { env: plan.env });
  } catch (error) {
    throw new CollectorError(`Failed to run ${plan.command}`, { cause: error });
  }

  if (result.exitCode !== 0) {
    await removeTempFile(dumpFile);
    throw new CollectorError(`Database dump failed: ${result.stderr.trim()}`);
  }

  const archivePath = toArchivePath("database", `${fields.database}.${plan.extension}`);
  try {
    if (!plan.writesDumpFile) {
      await writeFile(dumpFile, result.stdout);
    }
    await writer.appendFile(dumpFile, archivePath);
  } finally {
    await removeTempFile(dumpFile);
  }

  return archivePath;
}
