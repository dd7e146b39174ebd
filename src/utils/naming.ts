/**
 * Snapshot file naming
 */

export const SNAPSHOT_EXTENSION = ".snap";

// Pattern: host-raft.YYYYMD_Hms.snap, components are not zero-padded
const SNAPSHOT_NAME_PATTERN = /^(.+)-raft\.(\d{6,8})_(\d{3,6})\.snap$/;

export interface ParsedSnapshotName {
  hostname: string;
  date: string;
  time: string;
}

/**
 * Local-time timestamp without zero padding, e.g. 2024-03-05 04:07:09 -> "202435_479".
 * Existing backup directories rely on this exact shape.
 */
export function formatSnapshotTimestamp(date: Date): string {
  const datePart = `${date.getFullYear()}${date.getMonth() + 1}${date.getDate()}`;
  const timePart = `${date.getHours()}${date.getMinutes()}${date.getSeconds()}`;
  return `${datePart}_${timePart}`;
}

export function buildSnapshotFileName(hostname: string, date: Date = new Date()): string {
  return `${hostname}-raft.${formatSnapshotTimestamp(date)}${SNAPSHOT_EXTENSION}`;
}

export function parseSnapshotFileName(fileName: string): ParsedSnapshotName | null {
  const [, hostname, date, time] = fileName.match(SNAPSHOT_NAME_PATTERN) ?? [];
  if (hostname === undefined || date === undefined || time === undefined) return null;

  return { hostname, date, time };
}

/**
 * The pruner only filters on the extension, so hand-named snapshots are pruned too.
 */
export function isSnapshotFile(fileName: string): boolean {
  return fileName.toLowerCase().endsWith(SNAPSHOT_EXTENSION);
}
