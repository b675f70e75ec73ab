import * as path from "node:path";
import { parseArgs } from "node:util";
import { LOG_FILE_NAME, readLogTail } from "../../utils/logger";
import { COMMON_OPTIONS, loadCommandConfig, reportFailure } from "../context";
import { color, ui } from "../ui";

const DEFAULT_LINES = 50;

export async function logsCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      lines: { type: "string", short: "n", default: String(DEFAULT_LINES) },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const lines = Number.parseInt(values.lines, 10);
  if (!Number.isInteger(lines) || lines < 0) {
    ui.error(`--lines must be a non-negative integer, got "${values.lines}"`);
    return 1;
  }

  try {
    const config = await loadCommandConfig(values.config, values.verbose);
    const tail = await readLogTail(config.logging.logDir, lines);

    if (tail === null) {
      ui.info(`No log file found at ${path.join(config.logging.logDir, LOG_FILE_NAME)}`);
      return 0;
    }

    for (const line of tail) {
      console.log(line);
    }
    return 0;
  } catch (error) {
    return reportFailure("Logs", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("packrat logs")} - Show recent log lines

${color.dim("USAGE:")}
  packrat logs [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./packrat.config.yaml)
  -n, --lines <count>     Number of lines to show (default: ${DEFAULT_LINES})
  -v, --verbose           Verbose output
  -h, --help              Show this help message
`);
}
