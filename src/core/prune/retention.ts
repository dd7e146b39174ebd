/**
 * Retention window logic
 */

import { readdir, stat } from "node:fs/promises";
import * as path from "node:path";
import { isSnapshotFile } from "../../utils/naming";

const DAY_MS = 24 * 60 * 60 * 1000;
// Earliest instant a Date can hold
const MIN_DATE_MS = -8.64e15;

export interface SnapshotFile {
  name: string;
  path: string;
  modifiedAt: Date;
  sizeBytes: number;
}

export function computeCutoff(now: Date, retentionDays: number): Date {
  return new Date(Math.max(now.getTime() - retentionDays * DAY_MS, MIN_DATE_MS));
}

/**
 * Every snapshot file in the directory, oldest first
 */
export async function listSnapshotFiles(dir: string): Promise<SnapshotFile[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: SnapshotFile[] = [];

  for (const entry of entries) {
    if (!entry.isFile() || !isSnapshotFile(entry.name)) continue;

    const filePath = path.join(dir, entry.name);
    const stats = await stat(filePath);
    files.push({
      name: entry.name,
      path: filePath,
      modifiedAt: stats.mtime,
      sizeBytes: stats.size,
    });
  }

  return files.sort(
    (a, b) => a.modifiedAt.getTime() - b.modifiedAt.getTime() || a.name.localeCompare(b.name),
  );
}

export function isExpired(file: SnapshotFile, cutoff: Date): boolean {
  return file.modifiedAt.getTime() < cutoff.getTime();
}

export async function findExpiredBackups(dir: string, cutoff: Date): Promise<SnapshotFile[]> {
  const files = await listSnapshotFiles(dir);
  return files.filter((file) => isExpired(file, cutoff));
}
