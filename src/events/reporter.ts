/**
 * Maps run outcomes to host event log entries
 */

import { errorMessage } from "../errors";
import type { EventEntry, EventSeverity, EventSink } from "../types";
import { logger } from "../utils/logger";
import { EVENT_IDS, type EventName } from "./ids";

export class EventReporter {
  constructor(private readonly sink: EventSink) {}

  backupSucceeded(snapshotPath: string): Promise<void> {
    return this.emit("backupSucceeded", "info", `Raft snapshot saved: ${snapshotPath}`);
  }

  tokenRenewed(): Promise<void> {
    return this.emit("tokenRenewed", "info", "Vault token renewed");
  }

  pruneCompleted(deleted: string[], cutoff: Date): Promise<void> {
    const list = deleted.length > 0 ? `: ${deleted.join(", ")}` : "";
    return this.emit(
      "pruneCompleted",
      "info",
      `Pruned ${deleted.length} snapshot(s) older than ${cutoff.toISOString()}${list}`,
    );
  }

  pruneSkipped(): Promise<void> {
    return this.emit("pruneSkipped", "info", "Pruning disabled, no snapshots deleted");
  }

  runFailed(error: unknown): Promise<void> {
    return this.emit("runFailed", "error", errorMessage(error));
  }

  /**
   * A failed write is logged and dropped so it never changes the run outcome.
   */
  private async emit(name: EventName, severity: EventSeverity, message: string): Promise<void> {
    const entry: EventEntry = { eventId: EVENT_IDS[name], severity, message };

    // Faults are printed by whoever handles the failed RunResult
    if (severity === "error") {
      logger.debug(`[${entry.eventId}] ${message}`);
    } else {
      logger.info(`[${entry.eventId}] ${message}`);
    }

    try {
      await this.sink.write(entry);
    } catch (error) {
      logger.error(`Failed to write event ${entry.eventId} to ${this.sink.type} log: ${errorMessage(error)}`);
    }
  }
}
