/**
 * syslog sink via the util-linux `logger` command
 */

import { EventLogError } from "../../errors";
import { type CommandRunner, describeFailure, runCommand } from "../../process/runner";
import type { EventEntry, EventSink } from "../../types";

const SYSLOG_FACILITIES = new Set([
  "auth",
  "authpriv",
  "cron",
  "daemon",
  "kern",
  "local0",
  "local1",
  "local2",
  "local3",
  "local4",
  "local5",
  "local6",
  "local7",
  "lpr",
  "mail",
  "news",
  "syslog",
  "user",
  "uucp",
]);

/**
 * Log names that are not syslog facilities (e.g. "Application") fall back to "user".
 */
export function toFacility(logName: string): string {
  const lower = logName.toLowerCase();
  return SYSLOG_FACILITIES.has(lower) ? lower : "user";
}

export function buildLoggerArgs(logName: string, source: string, entry: EventEntry): string[] {
  const level = entry.severity === "error" ? "err" : "info";
  return ["-t", source, "-p", `${toFacility(logName)}.${level}`, "--", `[${entry.eventId}] ${entry.message}`];
}

export class SyslogEventSink implements EventSink {
  readonly type = "syslog";

  constructor(
    private readonly logName: string,
    private readonly source: string,
    private readonly runner: CommandRunner = runCommand,
  ) {}

  async write(entry: EventEntry): Promise<void> {
    const result = await this.runner("logger", buildLoggerArgs(this.logName, this.source, entry));
    if (!result.success) {
      throw new EventLogError(describeFailure(result));
    }
  }

  // syslog tags need no registration
  async register(): Promise<void> {}
}
