import { parseArgs } from "node:util";
import { listRemoteBackups } from "../../core";
import { listLocalBackups } from "../../storage/local";
import type { BackupDescriptor, StorageItem } from "../../types";
import { formatBytes } from "../../utils/format";
import { stripRemotePrefix } from "../../utils/naming";
import { COMMON_OPTIONS, loadCommandConfig, loadCommandContext, reportFailure } from "../context";
import { color, formatDateTime, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";

const LOCAL_WIDTHS = [TABLE_WIDTHS.archiveName, TABLE_WIDTHS.kind, TABLE_WIDTHS.created, TABLE_WIDTHS.size];
const REMOTE_WIDTHS = [TABLE_WIDTHS.archiveName, TABLE_WIDTHS.size, TABLE_WIDTHS.created];

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      remote: { type: "boolean", short: "r", default: false },
      json: { type: "boolean", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    if (values.remote) {
      const { provider } = await loadCommandContext(values.config, values.verbose);
      const items = await listRemoteBackups(provider);

      if (values.json) {
        console.log(JSON.stringify(items, null, 2));
        return 0;
      }

      ui.intro("packrat list --remote");
      printRemote(items);
      ui.outro(`${items.length} remote backup(s) on ${provider.name}`);
      return 0;
    }

    const config = await loadCommandConfig(values.config, values.verbose);
    // Newest first
    const backups = (await listLocalBackups(config.backup.localBackupDir)).reverse();

    if (values.json) {
      console.log(JSON.stringify(backups, null, 2));
      return 0;
    }

    ui.intro("packrat list");
    printLocal(backups);
    ui.outro(`${backups.length} local backup(s) in ${config.backup.localBackupDir}`);
    return 0;
  } catch (error) {
    return reportFailure("List", error, values.verbose);
  }
}

function printLocal(backups: BackupDescriptor[]): void {
  if (backups.length === 0) {
    ui.info("No local backups found");
    return;
  }

  ui.step("Local backups:");
  console.log(formatTableRow(["Archive", "Kind", "Created", "Size"], LOCAL_WIDTHS));
  console.log(formatTableSeparator(LOCAL_WIDTHS));
  for (const backup of backups) {
    const kind = backup.kind === "full" ? color.cyan("full") : "incremental";
    console.log(
      formatTableRow(
        [backup.name, kind, formatDateTime(backup.createdAt), formatBytes(backup.sizeBytes)],
        LOCAL_WIDTHS,
      ),
    );
  }
}

function printRemote(items: StorageItem[]): void {
  if (items.length === 0) {
    ui.info("No remote backups found");
    return;
  }

  ui.step("Remote backups:");
  console.log(formatTableRow(["Archive", "Size", "Modified"], REMOTE_WIDTHS));
  console.log(formatTableSeparator(REMOTE_WIDTHS));
  for (const item of items) {
    console.log(
      formatTableRow(
        [
          stripRemotePrefix(item.key),
          formatBytes(item.size),
          item.lastModified ? formatDateTime(item.lastModified) : color.dim("unknown"),
        ],
        REMOTE_WIDTHS,
      ),
    );
  }
}

function printHelp(): void {
  console.log(`
${color.bold("packrat list")} - List backups

${color.dim("USAGE:")}
  packrat list [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./packrat.config.yaml)
  -r, --remote            List backups in remote storage instead of locally
      --json              Output as JSON (for scripting)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  packrat list                     # Local backups, newest first
  packrat list --remote            # Remote backups under backups/
  packrat list --remote --json
`);
}
