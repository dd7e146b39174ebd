import { parseArgs } from "node:util";
import { CONFIG_FLAG_OPTIONS, CONFIG_FLAGS_HELP } from "../../config";
import { checkPreconditions } from "../../core";
import { setLogLevel } from "../../utils/logger";
import { loadCommandConfig, reportCommandError } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function checkCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...CONFIG_FLAG_OPTIONS,
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  try {
    const config = await loadCommandConfig(values, false);

    ui.intro("raftsnap check");

    const checked = await checkPreconditions({
      executable: config.vault.executable,
      backupPath: config.backup.path,
    });

    ui.note(
      formatSummary([
        { label: "Executable", value: checked.executable },
        { label: "Backup path", value: `${checked.backupPath} ${color.dim("(writable)")}` },
        { label: "Event sink", value: config.events.sink },
        { label: "Token", value: config.token ? color.green("provided") : color.yellow("missing") },
      ]),
      "Preconditions",
    );

    ui.outro("All checks passed");
    return 0;
  } catch (error) {
    return reportCommandError("Check failed", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("raftsnap check")} - Verify preconditions without taking a snapshot

${color.dim("USAGE:")}
  raftsnap check [OPTIONS]

  Exits 2 when vault is missing, 3 when the backup directory is missing
  and 4 when the directory is not writable.

${color.dim("OPTIONS:")}
${CONFIG_FLAGS_HELP}
  -v, --verbose                Verbose output
  -h, --help                   Show this help message
`);
}
