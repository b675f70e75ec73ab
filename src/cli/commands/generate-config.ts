import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { renderExampleConfig } from "../../config/example";
import { CONFIG_FILE_NAMES } from "../../config/loader";
import { applyVerbosity, COMMON_OPTIONS, reportFailure } from "../context";
import { color, ui } from "../ui";

const DEFAULT_OUTPUT = CONFIG_FILE_NAMES[0] ?? "packrat.config.yaml";

export async function generateConfigCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      output: { type: "string", short: "o", default: DEFAULT_OUTPUT },
      force: { type: "boolean", short: "f", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  applyVerbosity(values.verbose);

  try {
    if (existsSync(values.output) && !values.force) {
      ui.error(`${values.output} already exists (use --force to overwrite)`);
      return 1;
    }

    await writeFile(values.output, renderExampleConfig());
    ui.success(`Example configuration written to ${values.output}`);
    return 0;
  } catch (error) {
    return reportFailure("Generate config", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("packrat generate-config")} - Write an example configuration file

${color.dim("USAGE:")}
  packrat generate-config [OPTIONS]

${color.dim("OPTIONS:")}
  -o, --output <path>     Output path (default: ${DEFAULT_OUTPUT})
  -f, --force             Overwrite an existing file
  -h, --help              Show this help message
`);
}
