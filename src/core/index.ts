/**
 * Core module exports
 */

// Preconditions
export { checkPreconditions, type PreconditionResult, probeWriteAccess } from "./preconditions";

// Pruning
export {
  computeCutoff,
  findExpiredBackups,
  isExpired,
  listSnapshotFiles,
  type PruneOptions,
  pruneBackups,
  type SnapshotFile,
} from "./prune";

// Snapshot and renewal
export { renewToken } from "./renew";
export { buildSnapshotPath, takeSnapshot } from "./snapshot";

// Run
export { classifyError, type RunOptions, runBackup } from "./run";

// Scheduler
export { getNextRun, parseCron, Scheduler } from "./scheduler";
