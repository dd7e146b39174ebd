/**
 * Backup run type definitions
 */

import type { RaftsnapError } from "../errors";

export type RunState =
  | "start"
  | "checking"
  | "pruning"
  | "snapshotting"
  | "renewing"
  | "done"
  | "failed";

export type GatedAction = "prune" | "snapshot" | "renew";

/**
 * Asked before every destructive or external action. Returning false skips it.
 */
export type ShouldProcess = (action: GatedAction, target: string) => Promise<boolean>;

export interface PruneResult {
  enabled: boolean;
  cutoff: Date;
  deleted: string[];
}

export interface RunResult {
  state: "done" | "failed";
  /** Last non-terminal state entered before the run ended */
  reached: RunState;
  snapshotPath: string | null;
  pruned: string[];
  skipped: GatedAction[];
  error?: RaftsnapError;
  durationMs: number;
}
