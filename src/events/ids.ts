/**
 * Fixed event identifiers written to the host event log
 */

export const EVENT_IDS = {
  backupSucceeded: 1000,
  tokenRenewed: 1001,
  pruneCompleted: 1002,
  pruneSkipped: 1003,
  runFailed: 1100,
} as const;

export type EventName = keyof typeof EVENT_IDS;
