/**
 * Configuration overrides passed as CLI flags
 */

import { ConfigError } from "../errors";
import type { EventSinkType, RaftsnapConfigFile } from "../types";

/**
 * parseArgs option definitions shared by every command that resolves config
 */
export const CONFIG_FLAG_OPTIONS = {
  config: { type: "string", short: "c" },
  token: { type: "string", short: "t" },
  executable: { type: "string", short: "e" },
  "backup-path": { type: "string", short: "p" },
  "retention-days": { type: "string", short: "r" },
  prune: { type: "boolean" },
  "no-prune": { type: "boolean" },
  hostname: { type: "string" },
  "vault-addr": { type: "string" },
  timeout: { type: "string" },
  "event-sink": { type: "string" },
  "event-log": { type: "string" },
  "event-source": { type: "string" },
  "event-file": { type: "string" },
} as const;

export type ConfigOverrides = RaftsnapConfigFile & { token?: string };

/** About a century */
export const MAX_RETENTION_DAYS = 36500;
/** setTimeout cannot wait longer than 2^31 - 1 ms */
export const MAX_TIMEOUT_SECONDS = 2147483;

export const EVENT_SINK_TYPES: readonly EventSinkType[] = ["windows", "syslog", "file", "none"];

export function isEventSinkType(value: unknown): value is EventSinkType {
  return EVENT_SINK_TYPES.some((type) => type === value);
}

type FlagValues = Record<string, string | boolean | (string | boolean)[] | undefined>;

function stringFlag(values: FlagValues, name: string): string | undefined {
  const value = values[name];
  return typeof value === "string" ? value : undefined;
}

export function parseWholeNumber(value: string, flag: string, max: number): number {
  const parsed = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value.trim()) || parsed > max) {
    throw new ConfigError(`--${flag} must be a whole number from 0 to ${max} (got "${value}")`);
  }
  return parsed;
}

/**
 * Turn parsed flag values into a partial config. Unset flags are left out so
 * they do not mask config file values.
 */
export function extractOverrides(values: FlagValues): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  const token = stringFlag(values, "token");
  if (token !== undefined) overrides.token = token;

  const executable = stringFlag(values, "executable");
  const address = stringFlag(values, "vault-addr");
  if (executable !== undefined || address !== undefined) {
    overrides.vault = {
      ...(executable !== undefined ? { executable } : {}),
      ...(address !== undefined ? { address } : {}),
    };
  }

  const backupPath = stringFlag(values, "backup-path");
  const hostname = stringFlag(values, "hostname");
  if (backupPath !== undefined || hostname !== undefined) {
    overrides.backup = {
      ...(backupPath !== undefined ? { path: backupPath } : {}),
      ...(hostname !== undefined ? { hostname } : {}),
    };
  }

  if (values.prune === true && values["no-prune"] === true) {
    throw new ConfigError("--prune and --no-prune cannot be used together");
  }
  const retentionDays = stringFlag(values, "retention-days");
  const prune = values.prune === true ? true : values["no-prune"] === true ? false : undefined;
  if (retentionDays !== undefined || prune !== undefined) {
    overrides.retention = {
      ...(retentionDays !== undefined
        ? { days: parseWholeNumber(retentionDays, "retention-days", MAX_RETENTION_DAYS) }
        : {}),
      ...(prune !== undefined ? { prune } : {}),
    };
  }

  const timeout = stringFlag(values, "timeout");
  if (timeout !== undefined) {
    overrides.timeoutSeconds = parseWholeNumber(timeout, "timeout", MAX_TIMEOUT_SECONDS);
  }

  const sink = stringFlag(values, "event-sink");
  const logName = stringFlag(values, "event-log");
  const source = stringFlag(values, "event-source");
  const filePath = stringFlag(values, "event-file");
  if (sink !== undefined && !isEventSinkType(sink)) {
    throw new ConfigError(`--event-sink must be one of: ${EVENT_SINK_TYPES.join(", ")}`);
  }
  if ([sink, logName, source, filePath].some((v) => v !== undefined)) {
    overrides.events = {
      ...(sink !== undefined ? { sink } : {}),
      ...(logName !== undefined ? { logName } : {}),
      ...(source !== undefined ? { source } : {}),
      ...(filePath !== undefined ? { filePath } : {}),
    };
  }

  return overrides;
}

export const CONFIG_FLAGS_HELP = `  -c, --config <path>          Config file (default: ./raftsnap.config.yaml)
  -t, --token <token>          Vault token (default: $RAFTSNAP_TOKEN)
  -e, --executable <path>      vault binary (default: vault on PATH)
  -p, --backup-path <dir>      Snapshot directory
  -r, --retention-days <n>     Retention window in days (default: 7)
      --prune / --no-prune     Delete snapshots older than the retention window
      --hostname <name>        Host identifier in file names (default: this host)
      --vault-addr <url>       Passed to vault as VAULT_ADDR
      --timeout <seconds>      Kill vault after this long (default: 0, no limit)
      --event-sink <type>      windows | syslog | file | none
      --event-log <name>       Event log name (default: Application)
      --event-source <name>    Event source (default: VaultRaftBackup)
      --event-file <path>      Log file for the 'file' sink`;
