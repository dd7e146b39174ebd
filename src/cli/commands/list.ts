import { parseArgs } from "node:util";
import { CONFIG_FLAG_OPTIONS, CONFIG_FLAGS_HELP } from "../../config";
import { computeCutoff, isExpired, listSnapshotFiles } from "../../core";
import { MissingDirectoryError } from "../../errors";
import { formatAge, formatBytes } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { parseSnapshotFileName } from "../../utils/naming";
import { isDirectory } from "../../utils/path";
import { loadCommandConfig, reportCommandError } from "../context";
import {
  color,
  formatLocalDateTime,
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  TABLE_WIDTHS,
  ui,
} from "../ui";

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...CONFIG_FLAG_OPTIONS,
      json: { type: "boolean", default: false },
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

    if (!(await isDirectory(config.backup.path))) {
      throw new MissingDirectoryError(config.backup.path);
    }

    const now = new Date();
    const cutoff = computeCutoff(now, config.retention.days);
    const files = await listSnapshotFiles(config.backup.path);

    if (values.json) {
      const rows = files.map((file) => ({
        name: file.name,
        hostname: parseSnapshotFileName(file.name)?.hostname ?? null,
        path: file.path,
        modifiedAt: file.modifiedAt.toISOString(),
        sizeBytes: file.sizeBytes,
        expired: isExpired(file, cutoff),
      }));
      console.log(JSON.stringify(rows, null, 2));
      return 0;
    }

    ui.intro("raftsnap list");

    if (files.length === 0) {
      ui.info(`No snapshots in ${config.backup.path}`);
      ui.outro("Nothing to show");
      return 0;
    }

    const widths = [
      TABLE_WIDTHS.name,
      TABLE_WIDTHS.modified,
      TABLE_WIDTHS.age,
      TABLE_WIDTHS.size,
      TABLE_WIDTHS.status,
    ];
    const lines = [
      formatTableRow(["Name", "Modified", "Age", "Size", "Status"], widths),
      formatTableSeparator(widths),
      ...files.map((file) => {
        const expired = isExpired(file, cutoff);
        const status = expired ? color.yellow("expired") : color.green("kept");
        return formatTableRow(
          [
            file.name,
            formatLocalDateTime(file.modifiedAt),
            formatAge(now.getTime() - file.modifiedAt.getTime()),
            formatBytes(file.sizeBytes),
            status,
          ],
          widths,
        );
      }),
    ];
    ui.message(lines.join("\n"));

    const expiredCount = files.filter((file) => isExpired(file, cutoff)).length;
    const totalBytes = files.reduce((sum, file) => sum + file.sizeBytes, 0);
    ui.note(
      formatSummary([
        { label: "Snapshots", value: files.length },
        { label: "Total size", value: formatBytes(totalBytes) },
        { label: "Expired", value: `${expiredCount} (older than ${config.retention.days}d)` },
        { label: "Pruning", value: config.retention.prune ? "enabled" : "disabled" },
      ]),
      "Summary",
    );

    ui.outro(`${files.length} snapshot(s)`);
    return 0;
  } catch (error) {
    return reportCommandError("List failed", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("raftsnap list")} - List snapshots in the backup directory

${color.dim("USAGE:")}
  raftsnap list [OPTIONS]

${color.dim("OPTIONS:")}
${CONFIG_FLAGS_HELP}
      --json                   Print JSON instead of a table
  -v, --verbose                Verbose output
  -h, --help                   Show this help message
`);
}
