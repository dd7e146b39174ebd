export { getNextRun, type ParsedCron, parseCron } from "./cron-parser";
export { type ScheduledJob, Scheduler, type SchedulerStatus } from "./daemon";
