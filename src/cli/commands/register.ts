import { parseArgs } from "node:util";
import { CONFIG_FLAG_OPTIONS, CONFIG_FLAGS_HELP } from "../../config";
import { createEventSink } from "../../events";
import { setLogLevel } from "../../utils/logger";
import { loadCommandConfig, reportCommandError } from "../context";
import { color, ui } from "../ui";

export async function registerCommand(args: string[]): Promise<number> {
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
    const sink = createEventSink(config.events);

    ui.intro("raftsnap register");
    await sink.register();

    ui.success(
      `Registered source ${color.cyan(config.events.source)} in ${color.cyan(config.events.logName)} (${sink.type})`,
    );
    ui.outro("Event source ready");
    return 0;
  } catch (error) {
    return reportCommandError("Registration failed", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("raftsnap register")} - Register the event source with the host event log

${color.dim("USAGE:")}
  raftsnap register [OPTIONS]

  Run once per machine before the first backup, as a user allowed to
  create event sources.

    windows   New-EventLog -LogName <log> -Source <source>
    syslog    nothing to do
    file      creates the log file

${color.dim("OPTIONS:")}
${CONFIG_FLAGS_HELP}
  -v, --verbose                Verbose output
  -h, --help                   Show this help message
`);
}
