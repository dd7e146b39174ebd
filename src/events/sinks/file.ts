/**
 * Append-only JSON lines event log
 */

import { appendFile, mkdir, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { EventLogError } from "../../errors";
import type { EventEntry, EventSink } from "../../types";

export interface FileEventRecord extends EventEntry {
  time: string;
  logName: string;
  source: string;
}

export class FileEventSink implements EventSink {
  readonly type = "file";

  constructor(
    private readonly filePath: string,
    private readonly logName: string,
    private readonly source: string,
  ) {}

  async write(entry: EventEntry): Promise<void> {
    if (!(await this.exists())) {
      throw new EventLogError(
        `Event log ${this.filePath} is not registered. Run "raftsnap register" first`,
      );
    }

    const record: FileEventRecord = {
      time: new Date().toISOString(),
      logName: this.logName,
      source: this.source,
      ...entry,
    };
    await appendFile(this.filePath, `${JSON.stringify(record)}\n`);
  }

  async register(): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    // "a" creates the file without truncating an existing log
    await writeFile(this.filePath, "", { flag: "a" });
  }

  private async exists(): Promise<boolean> {
    try {
      return (await stat(this.filePath)).isFile();
    } catch {
      return false;
    }
  }
}
