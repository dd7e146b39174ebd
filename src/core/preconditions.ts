/**
 * Checks that must pass before anything is deleted or spawned
 */

import { unlink, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { MissingDirectoryError, MissingExecutableError, PermissionDeniedError } from "../errors";
import { logger } from "../utils/logger";
import { isDirectory, resolveExecutable } from "../utils/path";

export interface PreconditionInput {
  executable: string;
  backupPath: string;
  env?: NodeJS.ProcessEnv;
}

export interface PreconditionResult {
  /** Absolute path of the executable that will be spawned */
  executable: string;
  backupPath: string;
}

export function probeFileName(): string {
  return `.raftsnap-probe-${process.pid}-${Date.now()}`;
}

/**
 * Write and delete a probe file. Any failure means the directory is not usable.
 */
export async function probeWriteAccess(dir: string): Promise<void> {
  const probe = path.join(dir, probeFileName());
  try {
    await writeFile(probe, "");
    await unlink(probe);
  } catch (error) {
    throw new PermissionDeniedError(dir, error);
  }
}

export async function checkPreconditions(input: PreconditionInput): Promise<PreconditionResult> {
  const executable = await resolveExecutable(input.executable, input.env);
  if (!executable) {
    throw new MissingExecutableError(input.executable);
  }
  logger.debug(`Using executable ${executable}`);

  const backupPath = path.resolve(input.backupPath);
  if (!(await isDirectory(backupPath))) {
    throw new MissingDirectoryError(backupPath);
  }

  await probeWriteAccess(backupPath);
  logger.debug(`Backup directory is writable: ${backupPath}`);

  return { executable, backupPath };
}
