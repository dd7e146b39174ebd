import { parseArgs } from "node:util";
import { CONFIG_FLAG_OPTIONS, CONFIG_FLAGS_HELP } from "../../config";
import { checkPreconditions, classifyError, pruneBackups } from "../../core";
import { EventReporter } from "../../events";
import { setLogLevel } from "../../utils/logger";
import { createShouldProcess, createSink, loadCommandConfig, reportCommandError } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function pruneCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...CONFIG_FLAG_OPTIONS,
      "dry-run": { type: "boolean", default: false },
      confirm: { type: "boolean", default: false },
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

  let reporter: EventReporter | undefined;
  let state: "checking" | "pruning" = "checking";

  try {
    const config = await loadCommandConfig(values, false);
    const dryRun = values["dry-run"];
    reporter = new EventReporter(createSink(config, dryRun));

    ui.intro(dryRun ? "raftsnap prune [DRY RUN]" : "raftsnap prune");

    const checked = await checkPreconditions({
      executable: config.vault.executable,
      backupPath: config.backup.path,
    });

    state = "pruning";
    const result = await pruneBackups({
      backupPath: checked.backupPath,
      retentionDays: config.retention.days,
      enabled: config.retention.prune,
      reporter,
      shouldProcess: createShouldProcess({ dryRun, confirm: values.confirm }),
    });

    if (!result.enabled) {
      ui.warn(`Pruning is disabled. Pass ${color.cyan("--prune")} or set retention.prune`);
    } else {
      ui.note(
        formatSummary([
          { label: "Cutoff", value: result.cutoff.toISOString() },
          { label: "Deleted", value: result.deleted.length.toString() },
        ]),
        "Prune Summary",
      );
      for (const name of result.deleted) {
        ui.message(`  ${color.dim("•")} ${name}`);
      }
    }

    ui.outro(dryRun ? "[DRY RUN] No changes were made." : "Prune complete!");
    return 0;
  } catch (caught) {
    const error = classifyError(caught, state);
    if (reporter) {
      await reporter.runFailed(error);
    }
    return reportCommandError("Prune failed", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("raftsnap prune")} - Delete snapshots older than the retention window

${color.dim("USAGE:")}
  raftsnap prune --prune [OPTIONS]

  Only files ending in .snap directly inside the backup directory are
  considered. A file is deleted when it was last modified before
  now minus --retention-days. The first failed deletion stops the run.

${color.dim("OPTIONS:")}
${CONFIG_FLAGS_HELP}
      --dry-run                Show what would be deleted without doing it
      --confirm                Ask before each deletion
  -v, --verbose                Verbose output
  -h, --help                   Show this help message

${color.dim("EXAMPLES:")}
  raftsnap prune --prune -r 30                 # Keep 30 days
  raftsnap prune --prune -r 0 --dry-run        # Preview deleting everything
`);
}
