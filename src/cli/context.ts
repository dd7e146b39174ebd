/**
 * Shared setup for commands that resolve config and touch the host
 */

import { type ConfigOverrides, extractOverrides, resolveConfig } from "../config";
import { ConfigError, errorMessage, exitCodeFor, RaftsnapError } from "../errors";
import { createEventSink, PreviewEventSink } from "../events";
import type { EventSink, GatedAction, RaftsnapConfig, ShouldProcess } from "../types";
import { logger } from "../utils/logger";
import { color, ui } from "./ui";

export interface PreviewFlags {
  dryRun: boolean;
  confirm: boolean;
}

const ACTION_LABELS: Record<GatedAction, string> = {
  prune: "Delete expired snapshot",
  snapshot: "Save Raft snapshot",
  renew: "Renew",
};

/**
 * --dry-run answers "no" to everything and says what would have happened.
 * --confirm asks for each action. Otherwise every action proceeds.
 */
export function createShouldProcess(flags: PreviewFlags): ShouldProcess | undefined {
  if (flags.dryRun) {
    return async (action, target) => {
      logger.info(`What if: ${ACTION_LABELS[action]} "${target}"`);
      return false;
    };
  }

  if (flags.confirm) {
    return async (action, target) => {
      const answer = await ui.confirm({
        message: `${ACTION_LABELS[action]} "${target}"?`,
        initialValue: true,
      });
      return !ui.isCancel(answer) && answer;
    };
  }

  return undefined;
}

export function createSink(config: RaftsnapConfig, dryRun: boolean): EventSink {
  const sink = createEventSink(config.events);
  return dryRun ? new PreviewEventSink(sink) : sink;
}

export async function loadCommandConfig(
  values: Record<string, string | boolean | (string | boolean)[] | undefined>,
  requireToken = true,
): Promise<Readonly<RaftsnapConfig>> {
  const configPath = typeof values.config === "string" ? values.config : undefined;
  const overrides: ConfigOverrides = extractOverrides(values);
  return resolveConfig({ configPath, overrides, requireToken });
}

/**
 * Print a fault in the failure color and map it to an exit code
 */
export function reportCommandError(prefix: string, error: unknown, verbose: boolean): number {
  ui.error(`${prefix}: ${errorMessage(error)}`);
  if (error instanceof ConfigError) {
    ui.info(`Run with ${color.cyan("--help")} for usage`);
  }
  if (verbose && !(error instanceof RaftsnapError)) {
    console.error(error);
  }
  return exitCodeFor(error);
}
