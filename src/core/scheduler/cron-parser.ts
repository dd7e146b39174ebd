/**
 * Cron expression parser using cron-parser library
 *
 * Supports: minute hour day-of-month month day-of-week
 *
 * Examples:
 *   "0 2 * * *"      - Every day at 2:00 AM
 *   "30 1 * * 0"     - Every Sunday at 1:30 AM
 */

import { CronExpressionParser } from "cron-parser";

export interface ParsedCron {
  expression: string;
  timezone?: string;
}

export function parseCron(expression: string, timezone?: string): ParsedCron {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5) {
    throw new Error(
      `Invalid cron expression: "${expression}". Expected 5 fields, got ${fields.length}.`,
    );
  }

  // Throws on out-of-range values
  CronExpressionParser.parse(expression, timezone ? { tz: timezone } : undefined);
  return { expression, timezone };
}

export function getNextRun(cron: ParsedCron, fromDate: Date = new Date()): Date {
  const interval = CronExpressionParser.parse(cron.expression, {
    currentDate: fromDate,
    ...(cron.timezone ? { tz: cron.timezone } : {}),
  });
  return interval.next().toDate();
}
