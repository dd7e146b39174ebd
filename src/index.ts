#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { checkCommand } from "./cli/commands/check";
import { listCommand } from "./cli/commands/list";
import { pruneCommand } from "./cli/commands/prune";
import { registerCommand } from "./cli/commands/register";
import { startCommand } from "./cli/commands/start";
import { banner } from "./cli/ui";

function printHelp(): void {
  banner("help");

  p.note(
    `${color.cyan("backup")}      Prune, save a Raft snapshot and renew the token
${color.cyan("check")}       Verify vault and the backup directory
${color.cyan("prune")}       Delete snapshots older than the retention window
${color.cyan("list")}        List snapshots in the backup directory
${color.cyan("start")}       Run backups on a cron schedule
${color.cyan("register")}    Register the event source with the host event log`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `raftsnap backup -t $TOKEN -p /var/backups/vault   ${color.dim("# One backup")}
raftsnap backup --prune -r 14                  ${color.dim("# Keep two weeks")}
raftsnap backup --dry-run                      ${color.dim("# Preview")}
raftsnap check                                 ${color.dim("# Verify preconditions")}
raftsnap list                                  ${color.dim("# Show snapshots")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("raftsnap <command> --help")} for command details`);
}

function printVersion(): void {
  banner("version");
  p.outro(`Run ${color.cyan("raftsnap --help")} for usage`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "backup":
      return backupCommand(commandArgs);

    case "check":
      return checkCommand(commandArgs);

    case "prune":
      return pruneCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "start":
      return startCommand(commandArgs);

    case "register":
      return registerCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("raftsnap --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
