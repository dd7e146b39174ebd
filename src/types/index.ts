/**
 * Centralized type exports for raftsnap
 */

// Config types
export type {
  BackupConfig,
  EventSinkType,
  EventsConfig,
  RaftsnapConfig,
  RaftsnapConfigFile,
  RetentionConfig,
  VaultConfig,
} from "./config";
// Event types
export type { EventEntry, EventSeverity, EventSink } from "./events";
// Run types
export type { GatedAction, PruneResult, RunResult, RunState, ShouldProcess } from "./run";
