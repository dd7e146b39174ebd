/**
 * Event log exports
 */

import * as path from "node:path";
import { ConfigError } from "../errors";
import type { CommandRunner } from "../process/runner";
import type { EventSink, EventsConfig } from "../types";
import { FileEventSink } from "./sinks/file";
import { NullEventSink, PreviewEventSink } from "./sinks/memory";
import { SyslogEventSink } from "./sinks/syslog";
import { WindowsEventSink } from "./sinks/windows";

export { EVENT_IDS, type EventName } from "./ids";
export { EventReporter } from "./reporter";
export { FileEventSink, NullEventSink, PreviewEventSink, SyslogEventSink, WindowsEventSink };

export function defaultSinkType(platform: NodeJS.Platform = process.platform): EventsConfig["sink"] {
  return platform === "win32" ? "windows" : "syslog";
}

export function createEventSink(config: EventsConfig, runner?: CommandRunner): EventSink {
  switch (config.sink) {
    case "windows":
      return new WindowsEventSink(config.logName, config.source, runner);
    case "syslog":
      return new SyslogEventSink(config.logName, config.source, runner);
    case "file":
      if (!config.filePath) {
        throw new ConfigError("events.filePath is required when events.sink is 'file'");
      }
      return new FileEventSink(path.resolve(config.filePath), config.logName, config.source);
    case "none":
      return new NullEventSink();
  }
}
