export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;

  // Specialized logging methods for backup operations
  logBackupStart(jobId: string, engine: string, databaseName: string): void;
  logBackupComplete(
    jobId: string,
    engine: string,
    databaseName: string,
    fileName: string,
    fileSize: number,
    remoteKey: string,
    duration: number
  ): void;
  logBackupError(stage: string, error: Error, meta?: LogMeta): void;
  logNotificationFailure(jobId: string, error: Error): void;
  logConfigurationStart(config: LogMeta): void;
  logScheduledExecution(cronExpression: string, trigger: string): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
