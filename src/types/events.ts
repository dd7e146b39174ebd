/**
 * Event log type definitions
 */

export type EventSeverity = "info" | "error";

export interface EventEntry {
  eventId: number;
  severity: EventSeverity;
  message: string;
}

export interface EventSink {
  readonly type: string;
  /** Append one entry to the host event log */
  write(entry: EventEntry): Promise<void>;
  /** Register the event source with the host, once per machine */
  register(): Promise<void>;
}
