export { type PruneOptions, pruneBackups } from "./pruner";
export {
  computeCutoff,
  findExpiredBackups,
  isExpired,
  listSnapshotFiles,
  type SnapshotFile,
} from "./retention";
