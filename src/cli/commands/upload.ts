import { parseArgs } from "node:util";
import { uploadBackups } from "../../core";
import { formatBytes } from "../../utils/format";
import { COMMON_OPTIONS, loadCommandContext, reportFailure } from "../context";
import { color, ui } from "../ui";

export async function uploadCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      file: { type: "string", short: "f" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const { config, provider } = await loadCommandContext(values.config, values.verbose);

    ui.intro("packrat upload");

    const uploaded = await uploadBackups(config, provider, values.file);
    if (uploaded.length === 0) {
      ui.info("No local backups to upload");
      ui.outro("Nothing to do");
      return 0;
    }

    for (const item of uploaded) {
      ui.success(`${item.key} ${color.dim(`(${formatBytes(item.sizeBytes)})`)}`);
    }

    ui.outro(`Uploaded ${uploaded.length} backup(s) to ${config.storage.provider}`);
    return 0;
  } catch (error) {
    return reportFailure("Upload", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("packrat upload")} - Upload backups to remote storage

${color.dim("USAGE:")}
  packrat upload [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./packrat.config.yaml)
  -f, --file <path>       Upload a single archive instead of every local backup
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  packrat upload                                   # Upload every local .zst backup
  packrat upload -f backups/backup-full-20240101-020000.tar.zst
`);
}
