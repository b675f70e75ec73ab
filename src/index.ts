#!/usr/bin/env -S npx tsx

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { cleanCommand } from "./cli/commands/clean";
import { clientCommand } from "./cli/commands/client";
import { daemonCommand } from "./cli/commands/daemon";
import { downloadCommand } from "./cli/commands/download";
import { generateConfigCommand } from "./cli/commands/generate-config";
import { listCommand } from "./cli/commands/list";
import { logsCommand } from "./cli/commands/logs";
import { restoreCommand } from "./cli/commands/restore";
import { statusCommand } from "./cli/commands/status";
import { uploadCommand } from "./cli/commands/upload";
import { LOGO, VERSION } from "./cli/ui";

type Command = (args: string[]) => Promise<number>;

const COMMANDS: Record<string, Command> = {
  backup: backupCommand,
  upload: uploadCommand,
  list: listCommand,
  download: downloadCommand,
  clean: cleanCommand,
  restore: restoreCommand,
  daemon: daemonCommand,
  status: statusCommand,
  "generate-config": generateConfigCommand,
  logs: logsCommand,
  client: clientCommand,
};

function printHelp(): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.intro(`${color.cyan("packrat")} ${color.dim(`v${VERSION}`)} - Server backups to any cloud`);

  p.note(
    `${color.cyan("backup")}            Create a backup archive
${color.cyan("upload")}            Upload local backups to remote storage
${color.cyan("list")}              List local or remote backups
${color.cyan("download")}          Download a backup
${color.cyan("clean")}             Delete backups past the retention period
${color.cyan("restore")}           Extract a backup archive
${color.cyan("daemon")}            Run periodic backups and uploads
${color.cyan("status")}            Show configuration and backup counts
${color.cyan("generate-config")}   Write an example config file
${color.cyan("logs")}              Show recent log lines
${color.cyan("client")}            Remote list/download with credentials as flags`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
    --version   Show version`,
    "Options",
  );

  p.note(
    `packrat generate-config           ${color.dim("# Write packrat.config.yaml")}
packrat backup --full             ${color.dim("# Create a full backup")}
packrat upload                    ${color.dim("# Upload every local backup")}
packrat list --remote             ${color.dim("# List remote backups")}
packrat clean --dry-run           ${color.dim("# Preview cleanup")}
packrat daemon -p /run/packrat.pid ${color.dim("# Run as a service")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("packrat <command> --help")} for command details`);
}

function printVersion(): void {
  console.log(`packrat v${VERSION}`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const [command = "", ...commandArgs] = args;
  const run = COMMANDS[command];
  if (run) {
    return run(commandArgs);
  }

  switch (command) {
    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("packrat --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
