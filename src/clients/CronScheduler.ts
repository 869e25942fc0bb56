import * as cron from 'node-cron';
import { CronScheduler as ICronScheduler, CronSchedulerConfig } from '../interfaces/CronScheduler';
import { BackupManager } from '../interfaces/BackupManager';
import { Logger } from '../interfaces/Logger';

export type TriggerSource = 'startup' | 'schedule';

/**
 * Custom error classes for cron scheduling operations
 */
export class CronSchedulerError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CronSchedulerError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class CronValidationError extends CronSchedulerError {
  constructor(
    message: string,
    public readonly expression: string
  ) {
    super(message, 'validation');
    this.name = 'CronValidationError';
  }
}

/**
 * CronScheduler implementation using node-cron.
 *
 * Runs never overlap: a tick that arrives while a run is still in progress is
 * logged and skipped, not queued.
 */
export class CronScheduler implements ICronScheduler {
  private task: cron.ScheduledTask | null = null;
  private isBackupRunning = false;
  private skippedTicks = 0;

  constructor(
    private readonly config: CronSchedulerConfig,
    private readonly backupManager: BackupManager,
    private readonly logger: Logger
  ) {}

  /**
   * Start the cron task and, when runOnInit is set, fire one run right away
   */
  start(): void {
    if (this.task) {
      this.logger.warn('CronScheduler is already running');
      return;
    }

    if (!this.validateCronExpression(this.config.cronExpression)) {
      throw new CronValidationError(
        `Invalid cron expression: ${this.config.cronExpression}`,
        this.config.cronExpression
      );
    }

    this.logger.info(
      `Starting cron scheduler with expression: ${this.config.cronExpression} (timezone: ${this.config.timezone})`
    );

    try {
      this.task = cron.schedule(this.config.cronExpression, () => this.trigger('schedule'), {
        scheduled: false,
        timezone: this.config.timezone,
      });
      this.task.start();
    } catch (error) {
      this.task = null;
      throw new CronSchedulerError(
        `Failed to start cron scheduler: ${formatError(error)}`,
        'start',
        error instanceof Error ? error : undefined
      );
    }

    this.logger.info('CronScheduler started successfully');

    if (this.config.runOnInit) {
      this.logger.info('Running initial backup at startup');
      setImmediate(() => this.trigger('startup'));
    }
  }

  /**
   * Stop the cron scheduler. A run already in progress is left to finish.
   */
  stop(): void {
    if (!this.task) {
      this.logger.warn('CronScheduler is not running');
      return;
    }

    this.task.stop();
    this.task = null;
    this.logger.info('CronScheduler stopped successfully');
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  isBackupInProgress(): boolean {
    return this.isBackupRunning;
  }

  /** Number of ticks dropped because a run was still in progress */
  getSkippedTickCount(): number {
    return this.skippedTicks;
  }

  /**
   * Validate a cron expression using node-cron's built-in validation
   */
  validateCronExpression(expression: string): boolean {
    try {
      return cron.validate(expression);
    } catch (error) {
      this.logger.warn('Cron expression validation error', { expression, error: formatError(error) });
      return false;
    }
  }

  private trigger(source: TriggerSource): void {
    this.executeScheduledBackup(source).catch(error => {
      // executeBackup reports its own failures; this only fires on a bug
      this.logger.error('Unexpected error in backup execution', error instanceof Error ? error : new Error(String(error)), {
        trigger: source,
      });
    });
  }

  /**
   * Execute one backup run unless another is still in progress
   */
  private async executeScheduledBackup(source: TriggerSource): Promise<void> {
    if (this.isBackupRunning) {
      this.skippedTicks++;
      this.logger.warn('Backup is already running, skipping this execution', { trigger: source });
      return;
    }

    this.isBackupRunning = true;
    this.logger.logScheduledExecution(this.config.cronExpression, source);

    try {
      const result = await this.backupManager.executeBackup();

      if (result.success) {
        this.logger.info(`Backup ${result.jobId} stored as ${result.remoteKey}`, { trigger: source });
      } else {
        this.logger.warn(`Backup ${result.jobId} failed during ${result.failedStage ?? 'unknown stage'}`, {
          trigger: source,
          error: result.error,
        });
      }
    } finally {
      this.isBackupRunning = false;
    }
  }
}

/**
 * Format error for consistent logging
 */
function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
