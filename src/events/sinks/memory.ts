/**
 * Sinks that never touch the host log
 */

import type { EventEntry, EventSink } from "../../types";
import { logger } from "../../utils/logger";

export class NullEventSink implements EventSink {
  readonly type = "none";

  async write(_entry: EventEntry): Promise<void> {}

  async register(): Promise<void> {}
}

/**
 * Used by --dry-run: describes the write instead of performing it
 */
export class PreviewEventSink implements EventSink {
  readonly type = "preview";

  constructor(private readonly inner: EventSink) {}

  async write(entry: EventEntry): Promise<void> {
    logger.info(`What if: write ${entry.severity} event ${entry.eventId} to ${this.inner.type} log`);
  }

  async register(): Promise<void> {
    logger.info(`What if: register event source with ${this.inner.type} log`);
  }
}
