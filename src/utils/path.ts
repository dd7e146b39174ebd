/**
 * Path utilities
 */

import { stat } from "node:fs/promises";
import * as path from "node:path";

export async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * True when the command names a path rather than something to look up on PATH.
 */
export function hasPathSeparator(command: string): boolean {
  return command.includes("/") || command.includes("\\");
}

// spawn() without a shell cannot start .cmd or .bat files on Windows
const WINDOWS_SPAWNABLE_EXTENSIONS = [".EXE", ".COM"];

function isSpawnableOnWindows(filePath: string): boolean {
  return WINDOWS_SPAWNABLE_EXTENSIONS.includes(path.extname(filePath).toUpperCase());
}

/**
 * Resolve a command to a file, searching PATH for bare names.
 * Returns null when nothing matches. On Windows only .exe and .com files match.
 */
export async function resolveExecutable(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): Promise<string | null> {
  const windows = platform === "win32";

  if (hasPathSeparator(command) || path.isAbsolute(command)) {
    const resolved = path.resolve(command);
    if (windows && !isSpawnableOnWindows(resolved)) return null;
    return (await isFile(resolved)) ? resolved : null;
  }

  const delimiter = windows ? ";" : ":";
  const searchDirs = (env.PATH ?? env.Path ?? "").split(delimiter).filter(Boolean);
  const extensions =
    windows && !path.extname(command)
      ? (env.PATHEXT ?? WINDOWS_SPAWNABLE_EXTENSIONS.join(";"))
          .split(";")
          .filter((ext) => WINDOWS_SPAWNABLE_EXTENSIONS.includes(ext.toUpperCase()))
      : [""];

  for (const dir of searchDirs) {
    for (const ext of extensions) {
      const candidate = path.join(dir, command + ext);
      if (windows && !isSpawnableOnWindows(candidate)) continue;
      if (await isFile(candidate)) {
        return candidate;
      }
    }
  }

  return null;
}
