import { parseArgs } from "node:util";
import { createBackup } from "../../core";
import type { BackupResult } from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";
import { COMMON_OPTIONS, loadCommandConfig, reportFailure } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function backupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      full: { type: "boolean", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values.config, values.verbose);

    ui.intro("packrat backup");

    const s = ui.spinner();
    s.start(values.full ? "Creating full backup..." : "Creating backup...");

    let result: BackupResult;
    try {
      result = await createBackup(config, { full: values.full });
    } catch (error) {
      s.stop("Backup aborted");
      throw error;
    }

    s.stop("Archive created");

    ui.note(
      formatSummary([
        { label: "Archive", value: result.archiveName },
        { label: "Kind", value: result.kind },
        { label: "Entries", value: result.entriesCount },
        { label: "Size", value: formatBytes(result.sizeBytes) },
        { label: "Duration", value: formatDuration(result.durationMs) },
        { label: "Path", value: result.archivePath },
      ]),
      "Backup Summary",
    );

    ui.outro("Backup complete!");
    return 0;
  } catch (error) {
    return reportFailure("Backup", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("packrat backup")} - Create a backup archive

${color.dim("USAGE:")}
  packrat backup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./packrat.config.yaml)
      --full              Name the archive as a full backup
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Writes backup-(full|incr)-<timestamp>.tar.zst into the local backup
  directory with the project tree, additional paths, systemd units, presets,
  command outputs and (when enabled) a database dump.

${color.dim("EXAMPLES:")}
  packrat backup                   # Incremental-named backup
  packrat backup --full            # Full backup
  packrat backup -c /etc/packrat.yaml
`);
}
