/**
 * Vault CLI client wrapper
 */

import { type CommandResult, type CommandRunner, runCommand } from "../process/runner";
import { logger } from "../utils/logger";

export const SNAPSHOT_SAVE_ARGS = ["operator", "raft", "snapshot", "save"] as const;
export const TOKEN_RENEW_ARGS = ["token", "renew"] as const;

export interface VaultClientOptions {
  /** Resolved path to the vault binary */
  executable: string;
  token: string;
  address?: string;
  timeoutSeconds?: number;
  runner?: CommandRunner;
}

export class VaultClient {
  private readonly runner: CommandRunner;

  constructor(private readonly options: VaultClientOptions) {
    this.runner = options.runner ?? runCommand;
  }

  get timeoutMs(): number {
    return (this.options.timeoutSeconds ?? 0) * 1000;
  }

  /**
   * Write a point-in-time snapshot of the Raft storage to outputPath
   */
  async saveSnapshot(outputPath: string): Promise<CommandResult> {
    logger.debug(`Saving Raft snapshot to ${outputPath}`);
    return this.run([...SNAPSHOT_SAVE_ARGS, outputPath]);
  }

  /**
   * Extend the TTL of the token the client authenticates with
   */
  async renewToken(): Promise<CommandResult> {
    logger.debug("Renewing Vault token");
    return this.run([...TOKEN_RENEW_ARGS]);
  }

  // The token goes through the child's environment only, never argv or process.env.
  private run(args: string[]): Promise<CommandResult> {
    const env: Record<string, string> = { VAULT_TOKEN: this.options.token };
    if (this.options.address) {
      env.VAULT_ADDR = this.options.address;
    }

    return this.runner(this.options.executable, args, {
      env,
      timeoutMs: this.timeoutMs,
    });
  }
}
