/**
 * Configuration file loading and resolution
 */

import { readFile, stat } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { ConfigError, errorMessage } from "../errors";
import type { RaftsnapConfig } from "../types";
import { logger } from "../utils/logger";
import { deepMerge, getDefaultConfig } from "./defaults";
import type { ConfigOverrides } from "./inline";
import { validateConfig } from "./validator";

export const CONFIG_FILE_NAMES = ["raftsnap.config.yaml", "raftsnap.config.yml", "raftsnap.config.json"];
export const SYSTEM_CONFIG_PATH = "/etc/raftsnap/config.yaml";
export const TOKEN_ENV_VAR = "RAFTSNAP_TOKEN";

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse file content into an unvalidated mapping; resolveConfig() validates
 * it once merged with defaults and flags.
 */
export function parseConfigContent(content: string, ext: string): ConfigRecord {
  let parsed: unknown;

  if (ext === ".yaml" || ext === ".yml") {
    try {
      parsed = yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  } else if (ext === ".json") {
    try {
      parsed = JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  } else {
    throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
  }

  // An empty YAML document is an empty config
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError("Config file must contain a mapping");
  }
  if ("token" in parsed) {
    throw new ConfigError("The token must not be stored in a config file. Use RAFTSNAP_TOKEN");
  }

  return parsed;
}

/**
 * Load a config file and resolve its relative paths against its directory
 */
export async function loadConfigFile(configPath: string): Promise<ConfigRecord> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf8");
  } catch (e) {
    throw new ConfigError(`Cannot read config file ${absolutePath}: ${errorMessage(e)}`);
  }

  const parsed = parseConfigContent(content, path.extname(absolutePath).toLowerCase());
  return resolveRelativePaths(parsed, path.dirname(absolutePath));
}

function resolveRelativePaths(file: ConfigRecord, baseDir: string): ConfigRecord {
  const resolved: ConfigRecord = { ...file };

  const resolveIn = (sectionName: string, key: string, onlyPaths = false) => {
    const section = file[sectionName];
    if (!isRecord(section)) return;
    const value = section[key];
    if (typeof value !== "string") return;
    if (onlyPaths && !/[\\/]/.test(value)) return;
    resolved[sectionName] = { ...section, [key]: path.resolve(baseDir, value) };
  };

  resolveIn("backup", "path");
  resolveIn("events", "filePath");
  // Bare command names stay as they are so they can be found on PATH
  resolveIn("vault", "executable", true);

  return resolved;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Find a config file in the given directory, then the system location
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  const candidates = [
    ...CONFIG_FILE_NAMES.map((name) => path.join(startDir, name)),
    SYSTEM_CONFIG_PATH,
  ];

  for (const candidate of candidates) {
    if (await fileExists(candidate)) {
      return candidate;
    }
  }

  return null;
}

export function resolveToken(
  flagToken: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  return flagToken ?? env[TOKEN_ENV_VAR];
}

export interface ResolveConfigOptions {
  configPath?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
  /** false for commands that never spawn vault */
  requireToken?: boolean;
  cwd?: string;
}

/**
 * defaults <- config file <- CLI flags, then validated and frozen
 */
export async function resolveConfig(
  options: ResolveConfigOptions = {},
): Promise<Readonly<RaftsnapConfig>> {
  const configPath = options.configPath ?? (await findConfigFile(options.cwd));
  const file = configPath ? await loadConfigFile(configPath) : {};
  if (configPath) {
    logger.debug(`Loaded config from ${path.resolve(configPath)}`);
  }

  const { token: flagToken, ...overrides } = options.overrides ?? {};
  const merged = deepMerge(deepMerge(getDefaultConfig(), file), overrides);
  const candidate = { ...merged, token: resolveToken(flagToken, options.env) ?? "" };

  validateConfig(candidate, { requireToken: options.requireToken ?? true });
  return Object.freeze(candidate);
}
