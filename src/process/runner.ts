/**
 * Subprocess wrapper around child_process.spawn
 */

import { spawn } from "node:child_process";
import { logger } from "../utils/logger";

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  /** null when the process was killed by a signal */
  exitCode: number | null;
  timedOut: boolean;
}

export interface CommandOptions {
  /** Extra variables for this spawn only, layered over process.env */
  env?: Record<string, string>;
  /** 0 or undefined waits forever */
  timeoutMs?: number;
}

export type CommandRunner = (
  file: string,
  args: string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

/**
 * Run a program to completion with stdout and stderr captured.
 * Rejects only when the program cannot be started at all.
 */
export const runCommand: CommandRunner = (file, args, options = {}) => {
  return new Promise((resolve, reject) => {
    logger.debug(`Running: ${file} ${args.join(" ")}`);

    const child = spawn(file, args, {
      env: { ...process.env, ...options.env },
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;

    if (options.timeoutMs && options.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGTERM");
      }, options.timeoutMs);
    }

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", (error) => {
      if (timer) clearTimeout(timer);
      reject(error);
    });

    child.on("close", (code) => {
      if (timer) clearTimeout(timer);
      resolve({
        success: code === 0 && !timedOut,
        stdout: Buffer.concat(stdout).toString().trim(),
        stderr: Buffer.concat(stderr).toString().trim(),
        exitCode: code,
        timedOut,
      });
    });
  });
};

/**
 * Text describing why a command failed, for use as an error message
 */
export function describeFailure(result: CommandResult, timeoutMs?: number): string {
  if (result.timedOut) {
    return `timed out after ${Math.round((timeoutMs ?? 0) / 1000)}s`;
  }
  if (result.stderr) {
    return result.stderr;
  }
  return `exited with code ${result.exitCode ?? "null"}`;
}
