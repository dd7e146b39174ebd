/**
 * Utility exports
 */

// Formatting utilities
export { formatAge, formatBytes, formatDuration } from "./format";
export type { LogLevel } from "./logger";
// Logger
export { debug, error, getLogLevel, info, logger, setLogLevel, warn } from "./logger";
export type { ParsedSnapshotName } from "./naming";
// Naming utilities
export {
  buildSnapshotFileName,
  formatSnapshotTimestamp,
  isSnapshotFile,
  parseSnapshotFileName,
  SNAPSHOT_EXTENSION,
} from "./naming";
// Path utilities
export { hasPathSeparator, isDirectory, isFile, resolveExecutable } from "./path";
