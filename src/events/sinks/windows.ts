/**
 * Windows Event Log sink via PowerShell
 */

import { EventLogError } from "../../errors";
import { type CommandRunner, describeFailure, runCommand } from "../../process/runner";
import type { EventEntry, EventSink } from "../../types";

const POWERSHELL_ARGS = ["-NoProfile", "-NonInteractive", "-Command"];

/**
 * Single-quoted PowerShell literal
 */
export function quotePowerShell(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function buildWriteEventLogCommand(logName: string, source: string, entry: EventEntry): string {
  const entryType = entry.severity === "error" ? "Error" : "Information";
  return [
    "Write-EventLog",
    `-LogName ${quotePowerShell(logName)}`,
    `-Source ${quotePowerShell(source)}`,
    `-EventId ${entry.eventId}`,
    `-EntryType ${entryType}`,
    `-Message ${quotePowerShell(entry.message)}`,
  ].join(" ");
}

export function buildNewEventLogCommand(logName: string, source: string): string {
  return `New-EventLog -LogName ${quotePowerShell(logName)} -Source ${quotePowerShell(source)}`;
}

export class WindowsEventSink implements EventSink {
  readonly type = "windows";

  constructor(
    private readonly logName: string,
    private readonly source: string,
    private readonly runner: CommandRunner = runCommand,
  ) {}

  async write(entry: EventEntry): Promise<void> {
    await this.powershell(buildWriteEventLogCommand(this.logName, this.source, entry));
  }

  async register(): Promise<void> {
    await this.powershell(buildNewEventLogCommand(this.logName, this.source));
  }

  private async powershell(command: string): Promise<void> {
    const result = await this.runner("powershell.exe", [...POWERSHELL_ARGS, command]);
    if (!result.success) {
      throw new EventLogError(describeFailure(result));
    }
  }
}
