/**
 * Default configuration values
 */

import { defaultSinkType } from "../events";
import type { RaftsnapConfig } from "../types";

export function defaultBackupPath(platform: NodeJS.Platform = process.platform): string {
  return platform === "win32" ? "C:\\vault\\backups" : "/var/backups/vault";
}

// token is intentionally absent - it never comes from a file or a default
export function getDefaultConfig(
  platform: NodeJS.Platform = process.platform,
): Omit<RaftsnapConfig, "token"> {
  return {
    vault: {
      executable: "vault",
    },
    backup: {
      path: defaultBackupPath(platform),
    },
    retention: {
      days: 7,
      prune: false,
    },
    events: {
      sink: defaultSinkType(platform),
      logName: "Application",
      source: "VaultRaftBackup",
    },
    timeoutSeconds: 0,
  };
}

type PlainRecord = Record<string, unknown>;

function isPlainRecord(value: unknown): value is PlainRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target
 */
export function deepMerge(target: PlainRecord, source: PlainRecord): PlainRecord {
  const result: PlainRecord = { ...target };

  for (const key in source) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isPlainRecord(sourceValue) && isPlainRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
