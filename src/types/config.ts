/**
 * Configuration type definitions for raftsnap
 */

export interface VaultConfig {
  /** Path to the vault binary, or a bare name looked up on PATH */
  executable: string;
  /** Passed to the child process as VAULT_ADDR when set */
  address?: string;
}

export interface BackupConfig {
  /** Directory the snapshot files are written to and pruned from */
  path: string;
  /** Host identifier embedded in snapshot file names (default: os.hostname()) */
  hostname?: string;
}

export interface RetentionConfig {
  days: number;
  prune: boolean;
}

export type EventSinkType = "windows" | "syslog" | "file" | "none";

export interface EventsConfig {
  sink: EventSinkType;
  logName: string;
  source: string;
  /** Required when sink is "file" */
  filePath?: string;
}

export interface RaftsnapConfig {
  /** Never read from a config file; see resolveToken() */
  token: string;
  vault: VaultConfig;
  backup: BackupConfig;
  retention: RetentionConfig;
  events: EventsConfig;
  /** Subprocess timeout in seconds, 0 disables it */
  timeoutSeconds: number;
  /** Cron expression used by the `start` daemon */
  schedule?: string;
}

/**
 * Shape of a config file on disk: every section optional, no token.
 */
export type RaftsnapConfigFile = {
  [K in Exclude<keyof RaftsnapConfig, "token">]?: RaftsnapConfig[K] extends object
    ? Partial<RaftsnapConfig[K]>
    : RaftsnapConfig[K];
};
