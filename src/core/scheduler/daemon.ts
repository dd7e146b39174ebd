/**
 * Scheduler daemon
 */

import type { RunResult } from "../../types";
import { logger } from "../../utils/logger";
import { getNextRun, type ParsedCron, parseCron } from "./cron-parser";

export type ScheduledJob = () => Promise<RunResult>;

export interface SchedulerStatus {
  cron: string;
  running: boolean;
  lastRun: Date | null;
  lastState: RunResult["state"] | null;
  nextRun: Date | null;
}

/**
 * Runs the job on every cron tick. A tick that fires while the previous run
 * is still in progress is dropped.
 */
export class Scheduler {
  private readonly cron: ParsedCron;
  private timer: NodeJS.Timeout | null = null;
  private active = false;
  private inFlight: Promise<void> | null = null;
  private lastRun: Date | null = null;
  private lastState: RunResult["state"] | null = null;
  private nextRun: Date | null = null;

  constructor(
    expression: string,
    private readonly job: ScheduledJob,
    timezone?: string,
  ) {
    this.cron = parseCron(expression, timezone);
  }

  start(): void {
    if (this.active) {
      logger.warn("Scheduler is already running");
      return;
    }

    this.active = true;
    logger.info(`Scheduler started (${this.cron.expression})`);
    this.scheduleNext();
  }

  async stop(): Promise<void> {
    if (!this.active) {
      return;
    }

    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextRun = null;

    if (this.inFlight) {
      logger.info("Waiting for the current run to finish");
      await this.inFlight;
    }

    logger.info("Scheduler stopped");
  }

  /**
   * Run the job now unless a run is already in progress
   */
  async trigger(): Promise<RunResult | null> {
    if (this.inFlight) {
      logger.warn("Previous run still in progress, skipping this tick");
      return null;
    }

    let result: RunResult | null = null;
    this.inFlight = (async () => {
      this.lastRun = new Date();
      result = await this.job();
      this.lastState = result.state;
    })();

    try {
      await this.inFlight;
    } finally {
      this.inFlight = null;
    }
    return result;
  }

  getStatus(): SchedulerStatus {
    return {
      cron: this.cron.expression,
      running: this.inFlight !== null,
      lastRun: this.lastRun,
      lastState: this.lastState,
      nextRun: this.nextRun,
    };
  }

  private scheduleNext(): void {
    if (!this.active) return;

    const next = getNextRun(this.cron);
    this.nextRun = next;
    logger.debug(`Next run at ${next.toISOString()}`);

    this.timer = setTimeout(
      () => {
        this.trigger()
          .catch((error: unknown) => {
            logger.error(`Scheduled run failed: ${error instanceof Error ? error.message : String(error)}`);
          })
          .finally(() => this.scheduleNext());
      },
      Math.max(0, next.getTime() - Date.now()),
    );
  }
}
