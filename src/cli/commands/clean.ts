import { parseArgs } from "node:util";
import { runCleanup } from "../../core";
import { COMMON_OPTIONS, loadCommandContext, reportFailure } from "../context";
import { color, formatDateTime, formatSummary, ui } from "../ui";

export async function cleanCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      "dry-run": { type: "boolean", default: false },
      yes: { type: "boolean", short: "y", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const { config, provider } = await loadCommandContext(values.config, values.verbose);
    const dryRun = values["dry-run"];

    ui.intro("packrat clean");

    // Ask before deleting when someone is at the terminal
    if (!dryRun && !values.yes && process.stdin.isTTY) {
      const confirmed = await ui.confirm({
        message: `Delete local and remote backups older than ${config.backup.retentionDays} day(s)?`,
        initialValue: false,
      });

      if (ui.isCancel(confirmed) || !confirmed) {
        ui.cancel("Cleanup cancelled");
        return 1;
      }
    }

    const result = await runCleanup(config, provider, { dryRun });

    for (const backup of result.local) {
      ui.message(`  ${color.dim("•")} ${backup.name} ${color.dim(dryRun ? "(would delete)" : "(deleted)")}`);
    }
    for (const item of result.remote) {
      ui.message(`  ${color.dim("•")} ${item.key} ${color.dim("(deleted remote)")}`);
    }

    ui.note(
      formatSummary([
        { label: "Cutoff", value: formatDateTime(result.cutoff) },
        { label: dryRun ? "Local (would delete)" : "Local deleted", value: result.local.length },
        { label: "Remote deleted", value: dryRun ? null : result.remote.length },
      ]),
      "Cleanup Summary",
    );

    if (dryRun) {
      ui.warn("[DRY RUN] No changes were made. Remote backups were not checked.");
    }

    ui.outro("Cleanup complete!");
    return 0;
  } catch (error) {
    return reportFailure("Cleanup", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("packrat clean")} - Delete backups older than the retention period

${color.dim("USAGE:")}
  packrat clean [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./packrat.config.yaml)
      --dry-run           Only report local backups that would be deleted
  -y, --yes               Do not ask for confirmation
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Local .zst files modified more than backup.retention_days ago are deleted,
  then remote items under backups/ whose modification time is older than the
  same cutoff. Remote items without a modification time are kept.

${color.dim("EXAMPLES:")}
  packrat clean --dry-run          # Preview
  packrat clean -y                 # Non-interactive (cron)
`);
}
