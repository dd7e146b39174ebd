/**
 * Snapshot step
 */

import * as path from "node:path";
import { SnapshotError } from "../errors";
import type { EventReporter } from "../events";
import { describeFailure } from "../process/runner";
import type { VaultClient } from "../vault/client";
import { buildSnapshotFileName } from "../utils/naming";

export function buildSnapshotPath(backupPath: string, hostname: string, date: Date = new Date()): string {
  return path.join(backupPath, buildSnapshotFileName(hostname, date));
}

export async function takeSnapshot(
  client: VaultClient,
  reporter: EventReporter,
  snapshotPath: string,
): Promise<string> {
  const result = await client.saveSnapshot(snapshotPath);

  // The top-level handler reports the failure event
  if (!result.success) {
    throw new SnapshotError(describeFailure(result, client.timeoutMs), result.exitCode);
  }

  await reporter.backupSucceeded(snapshotPath);
  return snapshotPath;
}
