import { parseArgs } from "node:util";
import { CONFIG_FLAG_OPTIONS, CONFIG_FLAGS_HELP } from "../../config";
import { runBackup, Scheduler } from "../../core";
import { ConfigError, errorMessage } from "../../errors";
import { logger, setLogLevel } from "../../utils/logger";
import { createSink, loadCommandConfig, reportCommandError } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function startCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...CONFIG_FLAG_OPTIONS,
      schedule: { type: "string", short: "s" },
      timezone: { type: "string" },
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
    const config = await loadCommandConfig(values);
    const expression = values.schedule ?? config.schedule;
    if (!expression) {
      throw new ConfigError("No schedule configured. Pass --schedule or set 'schedule' in the config file");
    }

    ui.intro("raftsnap scheduler");

    const sink = createSink(config, false);
    const scheduler = new Scheduler(
      expression,
      async () => {
        const result = await runBackup(config, { sink });
        if (result.state === "done") {
          logger.info(`Scheduled backup finished: ${result.snapshotPath ?? "no snapshot"}`);
        } else {
          logger.error(`Scheduled backup failed while ${result.reached}: ${errorMessage(result.error)}`);
        }
        return result;
      },
      values.timezone,
    );

    scheduler.start();
    const status = scheduler.getStatus();
    ui.note(
      formatSummary([
        { label: "Schedule", value: status.cron },
        { label: "Next run", value: status.nextRun?.toLocaleString() },
        { label: "Backup path", value: config.backup.path },
      ]),
      "Scheduler",
    );
    ui.info(`Press ${color.cyan("Ctrl+C")} to stop`);

    await new Promise<void>((resolve) => {
      const shutdown = () => {
        logger.info("Shutting down...");
        scheduler
          .stop()
          .catch((error: unknown) => logger.error(`Error while stopping: ${String(error)}`))
          .finally(resolve);
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

    ui.outro("Scheduler stopped");
    return 0;
  } catch (error) {
    return reportCommandError("Scheduler failed", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("raftsnap start")} - Run backups on a cron schedule

${color.dim("USAGE:")}
  raftsnap start [OPTIONS]

  Runs the full backup on every tick of the schedule. A tick that fires
  while the previous run is still in progress is skipped.

${color.dim("OPTIONS:")}
${CONFIG_FLAGS_HELP}
  -s, --schedule <cron>        Cron expression (default: 'schedule' in config)
      --timezone <tz>          IANA timezone for the schedule
  -v, --verbose                Verbose output
  -h, --help                   Show this help message

${color.dim("EXAMPLES:")}
  raftsnap start -s "0 2 * * *" --prune        # Nightly at 02:00
`);
}
