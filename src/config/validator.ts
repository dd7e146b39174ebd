/**
 * Configuration validation
 */

import { ConfigError, errorMessage } from "../errors";
import type { RaftsnapConfig } from "../types";
import { parseCron } from "../core/scheduler/cron-parser";
import { EVENT_SINK_TYPES, isEventSinkType, MAX_RETENTION_DAYS, MAX_TIMEOUT_SECONDS } from "./inline";

type Validator = (config: Record<string, unknown>, options: ValidateOptions) => void;

export interface ValidateOptions {
  requireToken: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(c: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = c[name];
  if (!isRecord(value)) {
    throw new ConfigError(`Config must have a '${name}' section`);
  }
  return value;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

const validators: Record<string, Validator> = {
  token: (c, options) => {
    if (typeof c.token !== "string") {
      throw new ConfigError("token must be a string");
    }
    if (options.requireToken && !isNonEmptyString(c.token)) {
      throw new ConfigError(
        "A Vault token is required. Pass --token or set RAFTSNAP_TOKEN",
      );
    }
  },

  vault: (c) => {
    const vault = section(c, "vault");
    if (!isNonEmptyString(vault.executable)) {
      throw new ConfigError("vault.executable must be a non-empty string");
    }
    if (vault.address !== undefined && !isNonEmptyString(vault.address)) {
      throw new ConfigError("vault.address must be a non-empty string");
    }
  },

  backup: (c) => {
    const backup = section(c, "backup");
    if (!isNonEmptyString(backup.path)) {
      throw new ConfigError("backup.path must be a non-empty string");
    }
    if (backup.hostname !== undefined && !isNonEmptyString(backup.hostname)) {
      throw new ConfigError("backup.hostname must be a non-empty string");
    }
    if (typeof backup.hostname === "string" && /[\\/]/.test(backup.hostname)) {
      throw new ConfigError("backup.hostname must not contain path separators");
    }
  },

  retention: (c) => {
    const retention = section(c, "retention");
    if (
      typeof retention.days !== "number" ||
      !Number.isInteger(retention.days) ||
      retention.days < 0 ||
      retention.days > MAX_RETENTION_DAYS
    ) {
      throw new ConfigError(`retention.days must be a whole number of days from 0 to ${MAX_RETENTION_DAYS}`);
    }
    if (typeof retention.prune !== "boolean") {
      throw new ConfigError("retention.prune must be a boolean");
    }
  },

  events: (c) => {
    const events = section(c, "events");
    if (!isEventSinkType(events.sink)) {
      throw new ConfigError(`events.sink must be one of: ${EVENT_SINK_TYPES.join(", ")}`);
    }
    if (!isNonEmptyString(events.logName)) {
      throw new ConfigError("events.logName must be a non-empty string");
    }
    if (!isNonEmptyString(events.source)) {
      throw new ConfigError("events.source must be a non-empty string");
    }
    if (events.sink === "file" && !isNonEmptyString(events.filePath)) {
      throw new ConfigError("events.filePath is required when events.sink is 'file'");
    }
  },

  timeoutSeconds: (c) => {
    if (
      typeof c.timeoutSeconds !== "number" ||
      !(c.timeoutSeconds >= 0) ||
      c.timeoutSeconds > MAX_TIMEOUT_SECONDS
    ) {
      throw new ConfigError(`timeoutSeconds must be a number from 0 to ${MAX_TIMEOUT_SECONDS}`);
    }
  },

  schedule: (c) => {
    if (c.schedule === undefined) {
      return;
    }
    if (typeof c.schedule !== "string") {
      throw new ConfigError("schedule must be a cron expression string");
    }
    try {
      parseCron(c.schedule);
    } catch (error) {
      throw new ConfigError(`schedule: ${errorMessage(error)}`);
    }
  },
};

/**
 * Validate a fully merged configuration object
 */
export function validateConfig(
  config: unknown,
  options: ValidateOptions = { requireToken: true },
): asserts config is RaftsnapConfig {
  if (!isRecord(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config, options);
  }
}
