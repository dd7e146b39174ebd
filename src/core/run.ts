/**
 * Backup run orchestration
 *
 * start -> checking -> pruning -> snapshotting -> renewing -> done
 *
 * Any step may end the run in "failed". The failure is reported once, here,
 * and returned rather than thrown.
 */

import * as os from "node:os";
import { type ErrorKind, errorMessage, RaftsnapError } from "../errors";
import { EventReporter } from "../events";
import type { CommandRunner } from "../process/runner";
import type { EventSink, GatedAction, RaftsnapConfig, RunResult, RunState, ShouldProcess } from "../types";
import { formatDuration } from "../utils/format";
import { logger } from "../utils/logger";
import { VaultClient } from "../vault/client";
import { checkPreconditions } from "./preconditions";
import { pruneBackups } from "./prune";
import { renewToken } from "./renew";
import { buildSnapshotPath, takeSnapshot } from "./snapshot";

export interface RunOptions {
  sink: EventSink;
  runner?: CommandRunner;
  shouldProcess?: ShouldProcess;
  now?: () => Date;
}

const KIND_BY_STATE: Partial<Record<RunState, ErrorKind>> = {
  pruning: "prune-failed",
  snapshotting: "snapshot-failed",
  renewing: "renew-failed",
};

/**
 * Wrap anything a step threw that is not already classified, e.g. a spawn
 * failure or an unreadable directory listing.
 */
export function classifyError(error: unknown, state: RunState): RaftsnapError {
  if (error instanceof RaftsnapError) {
    return error;
  }
  return new RaftsnapError(KIND_BY_STATE[state] ?? "config", errorMessage(error), { cause: error });
}

export async function runBackup(config: RaftsnapConfig, options: RunOptions): Promise<RunResult> {
  const startTime = Date.now();
  const now = options.now ?? (() => new Date());
  const reporter = new EventReporter(options.sink);
  const shouldProcess: ShouldProcess = options.shouldProcess ?? (async () => true);

  let state: RunState = "start";
  let snapshotPath: string | null = null;
  let pruned: string[] = [];
  const skipped: GatedAction[] = [];

  try {
    state = "checking";
    const checked = await checkPreconditions({
      executable: config.vault.executable,
      backupPath: config.backup.path,
    });

    state = "pruning";
    const pruneResult = await pruneBackups({
      backupPath: checked.backupPath,
      retentionDays: config.retention.days,
      enabled: config.retention.prune,
      reporter,
      shouldProcess,
      now: now(),
    });
    pruned = pruneResult.deleted;

    const client = new VaultClient({
      executable: checked.executable,
      token: config.token,
      address: config.vault.address,
      timeoutSeconds: config.timeoutSeconds,
      runner: options.runner,
    });

    state = "snapshotting";
    const target = buildSnapshotPath(checked.backupPath, config.backup.hostname ?? os.hostname(), now());
    if (await shouldProcess("snapshot", target)) {
      snapshotPath = await takeSnapshot(client, reporter, target);
    } else {
      skipped.push("snapshot");
    }

    state = "renewing";
    if (snapshotPath === null) {
      logger.debug("No snapshot was taken, token renewal skipped");
      skipped.push("renew");
    } else if (await shouldProcess("renew", "Vault token")) {
      await renewToken(client, reporter);
    } else {
      skipped.push("renew");
    }

    const durationMs = Date.now() - startTime;
    logger.debug(`Run completed in ${formatDuration(durationMs)}`);

    return { state: "done", reached: state, snapshotPath, pruned, skipped, durationMs };
  } catch (caught) {
    const error = classifyError(caught, state);
    await reporter.runFailed(error);

    return {
      state: "failed",
      reached: state,
      snapshotPath,
      pruned,
      skipped,
      error,
      durationMs: Date.now() - startTime,
    };
  }
}
