import { rm, writeFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { MAX_INTERVAL_HOURS } from "../../config/defaults";
import { createBackup, Daemon, uploadBackups } from "../../core";
import type { DaemonSettings } from "../../types";
import { logger } from "../../utils/logger";
import { COMMON_OPTIONS, loadCommandContext, reportFailure } from "../context";
import { color, formatSummary, ui } from "../ui";

function parseHours(value: string | undefined, flag: string, fallback: number): number {
  if (value === undefined) return fallback;
  const hours = Number(value);
  if (!Number.isFinite(hours) || hours <= 0) {
    throw new Error(`${flag} must be a positive number of hours, got "${value}"`);
  }
  if (hours > MAX_INTERVAL_HOURS) {
    throw new Error(`${flag} must be at most ${MAX_INTERVAL_HOURS} hours, got "${value}"`);
  }
  return hours;
}

function waitForShutdown(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    process.once("SIGINT", () => resolve("SIGINT"));
    process.once("SIGTERM", () => resolve("SIGTERM"));
  });
}

export async function daemonCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      "backup-interval": { type: "string", short: "b" },
      "upload-interval": { type: "string", short: "u" },
      "pid-file": { type: "string", short: "p" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const { config, provider } = await loadCommandContext(values.config, values.verbose);
    const settings: DaemonSettings = {
      backupIntervalHours: parseHours(
        values["backup-interval"],
        "--backup-interval",
        config.daemon.backupIntervalHours,
      ),
      uploadIntervalHours: parseHours(
        values["upload-interval"],
        "--upload-interval",
        config.daemon.uploadIntervalHours,
      ),
    };

    const pidFile = values["pid-file"];
    if (pidFile) {
      await writeFile(pidFile, `${process.pid}\n`);
    }

    ui.intro("packrat daemon");
    ui.note(
      formatSummary([
        { label: "PID", value: process.pid },
        { label: "PID file", value: pidFile },
        { label: "Backup every", value: `${settings.backupIntervalHours}h` },
        { label: "Upload every", value: `${settings.uploadIntervalHours}h` },
        { label: "Provider", value: config.storage.provider },
      ]),
      "Daemon",
    );

    const daemon = new Daemon(settings, {
      backup: () => createBackup(config, { full: false }),
      upload: () => uploadBackups(config, provider),
    });

    const shutdown = waitForShutdown();
    daemon.start();
    ui.success("Daemon is running");
    ui.info("Press Ctrl+C to stop");

    const signal = await shutdown;
    logger.info(`Received ${signal}, shutting down`);
    await daemon.stop();

    if (pidFile) {
      await rm(pidFile, { force: true });
    }

    ui.outro("Daemon stopped");
    return 0;
  } catch (error) {
    return reportFailure("Daemon", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("packrat daemon")} - Run periodic backups and uploads

${color.dim("USAGE:")}
  packrat daemon [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>            Path to config file (default: ./packrat.config.yaml)
  -b, --backup-interval <hours>  Hours between backups (default: daemon.backup_interval_hours, 6)
  -u, --upload-interval <hours>  Hours between uploads (default: daemon.upload_interval_hours, 24)
  -p, --pid-file <path>          Write the process id to this file
  -v, --verbose                  Verbose output
  -h, --help                     Show this help message

${color.dim("DESCRIPTION:")}
  Uploads existing local backups right away, then creates a backup every
  backup interval and uploads every upload interval. Jobs run one at a time;
  a failed job is logged and the daemon carries on.

${color.dim("EXAMPLES:")}
  packrat daemon
  packrat daemon -b 12 -u 24 -p /run/packrat.pid
`);
}
