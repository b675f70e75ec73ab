import { parseArgs } from "node:util";
import { DEFAULT_RESTORE_DIR, restoreBackup } from "../../core";
import { applyVerbosity, COMMON_OPTIONS, reportFailure } from "../context";
import { color, ui } from "../ui";

export async function restoreCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      target: { type: "string", short: "t", default: DEFAULT_RESTORE_DIR },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const [file] = positionals;
  if (!file) {
    ui.error("Missing backup file");
    printHelp();
    return 1;
  }

  applyVerbosity(values.verbose);

  try {
    ui.intro("packrat restore");
    await restoreBackup(file, values.target);
    ui.outro(`Restored into ${values.target}`);
    return 0;
  } catch (error) {
    return reportFailure("Restore", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("packrat restore")} - Extract a backup archive

${color.dim("USAGE:")}
  packrat restore <file> [OPTIONS]

${color.dim("OPTIONS:")}
  -t, --target <dir>      Directory to extract into (default: ${DEFAULT_RESTORE_DIR})
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Runs tar -I "zstd -d" -xf <file> -C <dir>; tar and zstd must be installed.
  No config file is needed.

${color.dim("EXAMPLES:")}
  packrat restore backups/backup-full-20240101-020000.tar.zst
  packrat restore backup-incr-20240102-020000.tar.zst -t /srv/restore
`);
}
