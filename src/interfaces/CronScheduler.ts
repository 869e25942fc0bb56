/**
 * Interface for cron-based backup scheduling
 */
export interface CronScheduler {
  /** Start the cron task and fire one run immediately */
  start(): void;

  /** Stop the cron scheduler */
  stop(): void;

  /** Check if the scheduler is currently running */
  isRunning(): boolean;

  /** Check if a backup run is in progress */
  isBackupInProgress(): boolean;

  /** Validate a cron expression */
  validateCronExpression(expression: string): boolean;
}

/**
 * Configuration for the cron scheduler
 */
export interface CronSchedulerConfig {
  /** Cron expression for backup schedule */
  cronExpression: string;

  /** Timezone the cron expression is evaluated in */
  timezone: string;

  /** Whether to run once immediately on start */
  runOnInit?: boolean;
}
