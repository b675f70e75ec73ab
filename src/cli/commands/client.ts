import { parseArgs } from "node:util";
import { hasProviderFlags, PROVIDER_FLAG_OPTIONS, providerConfigFromFlags } from "../../config/inline";
import { downloadBackup, listRemoteBackups } from "../../core";
import { createStorageProvider } from "../../storage";
import type { IStorageProvider } from "../../types";
import { formatBytes } from "../../utils/format";
import { stripRemotePrefix } from "../../utils/naming";
import { applyVerbosity, COMMON_OPTIONS, loadCommandContext, reportFailure } from "../context";
import { color, formatDateTime, ui } from "../ui";
import { DEFAULT_DOWNLOAD_DIR } from "./download";

/**
 * Provider from --provider/--bucket/... flags, or from the config file when
 * no provider flag is given
 */
async function resolveProvider(
  values: Record<string, unknown>,
  configPath: string | undefined,
  verbose: boolean | undefined,
): Promise<IStorageProvider> {
  if (hasProviderFlags(values)) {
    applyVerbosity(verbose);
    return createStorageProvider(providerConfigFromFlags(values, process.env));
  }
  return (await loadCommandContext(configPath, verbose)).provider;
}

export async function clientCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      ...PROVIDER_FLAG_OPTIONS,
      output: { type: "string", short: "o", default: DEFAULT_DOWNLOAD_DIR },
      json: { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  const [action, key] = positionals;

  if (values.help || !action) {
    printHelp();
    return values.help ? 0 : 1;
  }

  try {
    switch (action) {
      case "list": {
        const provider = await resolveProvider(values, values.config, values.verbose);
        const items = await listRemoteBackups(provider);

        if (values.json) {
          console.log(JSON.stringify(items, null, 2));
          return 0;
        }

        ui.intro("packrat client list");
        for (const item of items) {
          const modified = item.lastModified ? ` ${color.dim(formatDateTime(item.lastModified))}` : "";
          ui.message(`${stripRemotePrefix(item.key)} ${color.dim(`(${formatBytes(item.size)})`)}${modified}`);
        }
        ui.outro(`${items.length} remote backup(s) on ${provider.name}`);
        return 0;
      }

      case "download": {
        if (!key) {
          ui.error("Missing backup key");
          return 1;
        }
        const provider = await resolveProvider(values, values.config, values.verbose);
        ui.intro("packrat client download");
        const localFile = await downloadBackup(provider, key, values.output);
        ui.outro(`Saved to ${localFile}`);
        return 0;
      }

      default:
        ui.error(`Unknown client action: ${action}`);
        printHelp();
        return 1;
    }
  } catch (error) {
    return reportFailure(`Client ${action}`, error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("packrat client")} - Remote operations without a server config

${color.dim("USAGE:")}
  packrat client list [OPTIONS]
  packrat client download <key> [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>            Use a config file instead of provider flags
  -o, --output <dir>             Download directory (default: ${DEFAULT_DOWNLOAD_DIR})
      --json                     List as JSON
  -v, --verbose                  Verbose output
  -h, --help                     Show this help message

${color.dim("PROVIDER OPTIONS:")}
      --provider <name>          s3, aws, r2, minio, gcs, azure, b2, gdrive, onedrive,
                                 dropbox, box, pcloud, mega, ...
      --endpoint <url>           Endpoint for S3-compatible services
      --region <region>          Region (default: us-east-1)
      --bucket <name>            Bucket or container
      --access-key <key>         Access key or OAuth token
      --secret-key <key>         Secret key
      --account-id <id>          Account id (B2, R2)
      --account-name <name>      Account name (Azure) or email (MEGA)
      --account-key <key>        Account key (Azure) or password (MEGA)
      --application-key <key>    Application key (B2)
      --bucket-id <id>           Bucket id (B2) or folder id/path
      --credentials-path <path>  Service account key file (GCS)

${color.dim("EXAMPLES:")}
  packrat client list --provider s3 --bucket my-backups --access-key KEY --secret-key SECRET
  packrat client download backup-full-20240101-020000.tar.zst --provider dropbox --access-key TOKEN
`);
}
