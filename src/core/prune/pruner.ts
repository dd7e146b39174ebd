/**
 * Deletes snapshots that fall outside the retention window
 */

import { unlink } from "node:fs/promises";
import { PruneError } from "../../errors";
import type { EventReporter } from "../../events";
import type { PruneResult, ShouldProcess } from "../../types";
import { logger } from "../../utils/logger";
import { computeCutoff, findExpiredBackups } from "./retention";

export interface PruneOptions {
  backupPath: string;
  retentionDays: number;
  enabled: boolean;
  reporter: EventReporter;
  shouldProcess?: ShouldProcess;
  now?: Date;
}

/**
 * Stops at the first file that cannot be deleted.
 */
export async function pruneBackups(options: PruneOptions): Promise<PruneResult> {
  const cutoff = computeCutoff(options.now ?? new Date(), options.retentionDays);

  if (!options.enabled) {
    await options.reporter.pruneSkipped();
    return { enabled: false, cutoff, deleted: [] };
  }

  const expired = await findExpiredBackups(options.backupPath, cutoff);
  logger.debug(`Found ${expired.length} snapshot(s) modified before ${cutoff.toISOString()}`);

  const deleted: string[] = [];
  for (const file of expired) {
    if (options.shouldProcess && !(await options.shouldProcess("prune", file.path))) {
      continue;
    }

    try {
      await unlink(file.path);
    } catch (error) {
      throw new PruneError(file.path, error);
    }
    logger.debug(`Deleted ${file.path}`);
    deleted.push(file.name);
  }

  await options.reporter.pruneCompleted(deleted, cutoff);
  return { enabled: true, cutoff, deleted };
}
