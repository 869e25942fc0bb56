import { promises as fs } from 'fs';
import { basename, join } from 'path';
import {
  BackupJob,
  BackupManager as IBackupManager,
  BackupResult,
  BackupStage,
  FailedStage,
  NotificationOutcome,
} from '../interfaces/BackupManager';
import { DatabaseDumper, DumpResult } from '../interfaces/DatabaseDumper';
import { StorageProvider, StorageSession, UploadMetadata } from '../interfaces/StorageProvider';
import { Notifier, NotificationPayload } from '../interfaces/Notifier';
import { BackupConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { APPLICATION_NAME } from '../config/ConfigurationManager';
import { LocalClock, formatDisplayTimestamp, formatFileTimestamp, toIsoTimestamp } from '../utils/LocalClock';

/**
 * Orchestrates one backup run: dump, upload, notify, clean up.
 *
 * Stages run strictly in sequence. A failure while dumping or uploading skips
 * straight to notifying, and cleanup runs on every exit path. Dump, storage
 * and notification errors are reported through the returned BackupResult and
 * never reject executeBackup().
 */
export class BackupManager implements IBackupManager {
  private readonly clock: LocalClock;

  constructor(
    private readonly dumper: DatabaseDumper,
    private readonly storage: StorageProvider,
    private readonly notifier: Notifier,
    private readonly config: BackupConfig,
    private readonly logger: Logger,
    clock?: LocalClock
  ) {
    this.clock = clock ?? new LocalClock(config.timezone);
  }

  async executeBackup(): Promise<BackupResult> {
    const startTime = Date.now();
    const job = this.createJob();
    const session = this.storage.openSession();
    let notification: NotificationOutcome;

    this.logger.logBackupStart(job.id, job.engine, job.connection.database);

    try {
      await this.dumpAndUpload(job, session);

      this.enterStage(job, BackupStage.NOTIFYING);
      notification = await this.notifySafely(job);
    } finally {
      this.enterStage(job, BackupStage.CLEANING_UP);
      session.close();
      await this.cleanupTempFile(job);
      this.enterStage(job, BackupStage.IDLE);
    }

    const duration = Date.now() - startTime;
    const result: BackupResult = {
      success: job.outcome === 'success',
      jobId: job.id,
      engine: job.engine,
      databaseName: job.connection.database,
      fileName: basename(job.stagingPath),
      fileSize: job.fileSize ?? 0,
      remoteKey: job.remoteKey ?? '',
      duration,
      notification,
      stages: [...job.stageHistory],
    };

    if (job.outcome === 'success') {
      this.logger.logBackupComplete(
        job.id,
        job.engine,
        job.connection.database,
        result.fileName,
        result.fileSize,
        result.remoteKey,
        duration
      );
    } else {
      result.failedStage = job.failedStage;
      result.error = job.error ? formatError(job.error) : 'Unknown error';
      this.logger.error('Backup run finished with failure', job.error, {
        jobId: job.id,
        engine: job.engine,
        databaseName: job.connection.database,
        duration,
        remoteKey: result.remoteKey,
        failedStage: job.failedStage,
      });
    }

    return result;
  }

  /**
   * Dump then upload. Failures are recorded on the job rather than thrown.
   */
  private async dumpAndUpload(job: BackupJob, session: StorageSession): Promise<void> {
    try {
      this.enterStage(job, BackupStage.DUMPING);
      const dump = await this.dumper.dump(job.connection, job.stagingPath);
      job.localFilePath = dump.filePath;
      job.fileSize = dump.fileSize;

      this.enterStage(job, BackupStage.UPLOADING);
      job.remoteKey = await session.upload(dump.filePath, this.buildMetadata(job, dump), job.startedAt);
      job.outcome = 'success';
    } catch (error) {
      const failedStage: FailedStage =
        job.stage === BackupStage.UPLOADING ? BackupStage.UPLOADING : BackupStage.DUMPING;
      job.outcome = 'failure';
      job.failedStage = failedStage;
      job.error = toError(error);

      this.logger.logBackupError(failedStage, job.error, {
        jobId: job.id,
        engine: job.engine,
        databaseName: job.connection.database,
      });
    }
  }

  /**
   * Send the run's outcome. A delivery failure is logged and returned, never
   * thrown, so it cannot turn a stored backup into a failed run.
   */
  private async notifySafely(job: BackupJob): Promise<NotificationOutcome> {
    try {
      await this.notifier.notify(this.buildPayload(job));
      return { delivered: true };
    } catch (error) {
      const notifyError = toError(error);
      this.logger.logNotificationFailure(job.id, notifyError);
      return { delivered: false, error: notifyError };
    }
  }

  private createJob(): BackupJob {
    const startedAt = this.clock.current();
    const { database } = this.config;
    const fileName =
      `backup_${database.database.replace(/[^A-Za-z0-9._-]/g, '_')}_` +
      `${formatFileTimestamp(startedAt)}${this.dumper.fileExtension}`;

    return {
      id: this.generateOperationId(),
      engine: this.dumper.engine,
      connection: {
        host: database.host,
        port: database.port,
        user: database.user,
        password: database.password,
        database: database.database,
      },
      startedAt,
      stage: BackupStage.IDLE,
      stageHistory: [BackupStage.IDLE],
      stagingPath: join(this.config.tempDir, fileName),
    };
  }

  private buildMetadata(job: BackupJob, dump: DumpResult): UploadMetadata {
    return Object.freeze({
      ...dump.metadata,
      'uploaded-by': APPLICATION_NAME,
      'backup-type': job.engine,
      database: job.connection.database,
      timestamp: toIsoTimestamp(job.startedAt),
      timezone: this.clock.timezone,
    });
  }

  private buildPayload(job: BackupJob): NotificationPayload {
    return {
      outcome: job.outcome === 'success' ? 'success' : 'failure',
      engine: job.engine,
      databaseName: job.connection.database,
      localTimestamp: formatDisplayTimestamp(job.startedAt),
      timezone: this.clock.timezone,
      remoteKey: job.remoteKey ?? '',
      errorMessage: job.error ? formatError(job.error) : '',
      failedStage: job.failedStage ?? null,
    };
  }

  private enterStage(job: BackupJob, stage: BackupStage): void {
    job.stage = stage;
    job.stageHistory.push(stage);
    this.logger.debug(`Backup job entered stage ${stage}`, { jobId: job.id, stage });
  }

  /**
   * Remove the staging file, whether it is complete, partial or was never written
   */
  private async cleanupTempFile(job: BackupJob): Promise<void> {
    try {
      await fs.unlink(job.stagingPath);
      this.logger.info('Local backup file removed', { jobId: job.id, filePath: job.stagingPath });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return;
      }
      this.logger.error('Failed to remove local backup file', toError(error), {
        jobId: job.id,
        filePath: job.stagingPath,
      });
    }
  }

  /**
   * Generate unique operation ID for tracking
   */
  private generateOperationId(): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const random = Math.random().toString(36).substring(2, 8);
    return `backup-${timestamp}-${random}`;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Format error for consistent logging
 */
function formatError(error: Error): string {
  return `${error.name}: ${error.message}`;
}
