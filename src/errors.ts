/**
 * Error taxonomy for a backup run
 */

export type ErrorKind =
  | "config"
  | "missing-executable"
  | "missing-directory"
  | "permission-denied"
  | "snapshot-failed"
  | "renew-failed"
  | "prune-failed"
  | "event-log";

export const EXIT_CODES: Record<ErrorKind, number> = {
  config: 1,
  "missing-executable": 2,
  "missing-directory": 3,
  "permission-denied": 4,
  "snapshot-failed": 5,
  "renew-failed": 6,
  "prune-failed": 7,
  "event-log": 1,
};

export class RaftsnapError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RaftsnapError";
    this.kind = kind;
  }

  get exitCode(): number {
    return EXIT_CODES[this.kind];
  }
}

export class ConfigError extends RaftsnapError {
  constructor(message: string) {
    super("config", message);
    this.name = "ConfigError";
  }
}

export class MissingExecutableError extends RaftsnapError {
  constructor(readonly executable: string) {
    super("missing-executable", `Executable not found: ${executable}`);
    this.name = "MissingExecutableError";
  }
}

export class MissingDirectoryError extends RaftsnapError {
  constructor(readonly directory: string) {
    super("missing-directory", `Backup directory not found: ${directory}`);
    this.name = "MissingDirectoryError";
  }
}

export class PermissionDeniedError extends RaftsnapError {
  constructor(
    readonly directory: string,
    cause?: unknown,
  ) {
    super("permission-denied", `No write access to backup directory: ${directory}`, { cause });
    this.name = "PermissionDeniedError";
  }
}

/**
 * A subprocess exited non-zero. The message is the captured stderr.
 */
export class SnapshotError extends RaftsnapError {
  constructor(
    message: string,
    readonly processExitCode: number | null,
  ) {
    super("snapshot-failed", message);
    this.name = "SnapshotError";
  }
}

export class RenewError extends RaftsnapError {
  constructor(
    message: string,
    readonly processExitCode: number | null,
  ) {
    super("renew-failed", message);
    this.name = "RenewError";
  }
}

export class PruneError extends RaftsnapError {
  constructor(
    readonly filePath: string,
    cause: unknown,
  ) {
    super("prune-failed", `Failed to delete ${filePath}: ${errorMessage(cause)}`, { cause });
    this.name = "PruneError";
  }
}

export class EventLogError extends RaftsnapError {
  constructor(message: string) {
    super("event-log", message);
    this.name = "EventLogError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function exitCodeFor(error: unknown): number {
  return error instanceof RaftsnapError ? error.exitCode : 1;
}
