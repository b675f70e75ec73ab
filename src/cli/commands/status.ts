import { parseArgs } from "node:util";
import { listRemoteBackups } from "../../core";
import { listLocalBackups } from "../../storage/local";
import { formatBytes } from "../../utils/format";
import { formatErrorChain } from "../../utils/errors";
import { COMMON_OPTIONS, loadCommandContext, reportFailure } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function statusCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: COMMON_OPTIONS,
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const { config, provider } = await loadCommandContext(values.config, values.verbose);
    const local = await listLocalBackups(config.backup.localBackupDir);
    const localBytes = local.reduce((sum, backup) => sum + backup.sizeBytes, 0);

    ui.intro("packrat status");

    ui.note(
      formatSummary([
        { label: "Provider", value: config.storage.provider },
        { label: "Bucket", value: config.storage.bucket || null },
        { label: "Endpoint", value: config.storage.endpoint },
        { label: "Region", value: config.storage.region },
      ]),
      "Storage",
    );

    ui.note(
      formatSummary([
        { label: "Backup directory", value: config.backup.localBackupDir },
        { label: "Project path", value: config.backup.projectPath },
        { label: "Retention", value: `${config.backup.retentionDays} day(s)` },
        { label: "Compression", value: `zstd level ${config.backup.compressionLevel}` },
        { label: "Database", value: config.database ? config.database.type : "disabled" },
      ]),
      "Backup",
    );

    ui.info(`Local backups: ${local.length} (${formatBytes(localBytes)})`);

    // Remote storage being unreachable does not make the status fail
    try {
      const remote = await listRemoteBackups(provider);
      ui.info(`Remote backups: ${remote.length}`);
    } catch (error) {
      ui.warn(`Remote backups: unavailable (${formatErrorChain(error)})`);
    }

    ui.outro("Done");
    return 0;
  } catch (error) {
    return reportFailure("Status", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("packrat status")} - Show configuration and backup counts

${color.dim("USAGE:")}
  packrat status [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./packrat.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message
`);
}
