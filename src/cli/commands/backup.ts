import { parseArgs } from "node:util";
import { CONFIG_FLAG_OPTIONS, CONFIG_FLAGS_HELP } from "../../config";
import { runBackup } from "../../core";
import { formatDuration } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { createShouldProcess, createSink, loadCommandConfig, reportCommandError } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function backupCommand(args: string[]): Promise<number> {
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

  try {
    const config = await loadCommandConfig(values);
    const dryRun = values["dry-run"];

    ui.intro(dryRun ? "raftsnap backup [DRY RUN]" : "raftsnap backup");

    const result = await runBackup(config, {
      sink: createSink(config, dryRun),
      shouldProcess: createShouldProcess({ dryRun, confirm: values.confirm }),
    });

    const summaryItems = [
      { label: "Snapshot", value: result.snapshotPath ?? color.dim("none") },
      {
        label: "Pruned",
        value: config.retention.prune ? result.pruned.length.toString() : color.dim("disabled"),
      },
      { label: "Skipped", value: result.skipped.length > 0 ? result.skipped.join(", ") : null },
      { label: "Duration", value: formatDuration(result.durationMs) },
    ];
    ui.note(formatSummary(summaryItems), "Backup Summary");

    if (result.state === "failed") {
      return reportCommandError(`Backup failed while ${result.reached}`, result.error, values.verbose);
    }

    if (dryRun) {
      ui.warn("[DRY RUN] No changes were made.");
    }
    ui.outro("Backup complete!");
    return 0;
  } catch (error) {
    return reportCommandError("Backup failed", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("raftsnap backup")} - Save a Raft snapshot and renew the Vault token

${color.dim("USAGE:")}
  raftsnap backup [OPTIONS]

${color.dim("STEPS:")}
  1. Check that vault exists and the backup directory is writable
  2. Delete snapshots older than the retention window (with --prune)
  3. vault operator raft snapshot save <host>-raft.<timestamp>.snap
  4. vault token renew

  Any failure stops the run and writes one error event to the event log.

${color.dim("OPTIONS:")}
${CONFIG_FLAGS_HELP}
      --dry-run                Show what would happen without doing it
      --confirm                Ask before each delete, snapshot and renewal
  -v, --verbose                Verbose output
  -h, --help                   Show this help message

${color.dim("EXAMPLES:")}
  raftsnap backup -t $VAULT_BACKUP_TOKEN -p /var/backups/vault
  raftsnap backup --prune -r 14                # Keep two weeks of snapshots
  raftsnap backup --dry-run --prune            # Preview
`);
}
