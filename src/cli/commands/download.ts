import { parseArgs } from "node:util";
import { downloadBackup } from "../../core";
import { COMMON_OPTIONS, loadCommandContext, reportFailure } from "../context";
import { color, ui } from "../ui";

export const DEFAULT_DOWNLOAD_DIR = "./restored";

export async function downloadCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      output: { type: "string", short: "o", default: DEFAULT_DOWNLOAD_DIR },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const [key] = positionals;
  if (!key) {
    ui.error("Missing backup key");
    printHelp();
    return 1;
  }

  try {
    const { provider } = await loadCommandContext(values.config, values.verbose);

    ui.intro("packrat download");
    const s = ui.spinner();
    s.start(`Downloading ${key}...`);
    try {
      const localFile = await downloadBackup(provider, key, values.output);
      s.stop(`Saved to ${localFile}`);
    } catch (error) {
      s.stop("Download aborted");
      throw error;
    }

    ui.outro("Download complete!");
    return 0;
  } catch (error) {
    return reportFailure("Download", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("packrat download")} - Download a backup from remote storage

${color.dim("USAGE:")}
  packrat download <key> [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./packrat.config.yaml)
  -o, --output <dir>      Output directory (default: ${DEFAULT_DOWNLOAD_DIR})
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  packrat download backup-full-20240101-020000.tar.zst
  packrat download backups/backup-incr-20240102-020000.tar.zst -o /tmp
`);
}
