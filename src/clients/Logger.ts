import winston from 'winston';
import { SeqTransport } from '@datalust/winston-seq';
import { Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';
import { SeqConfig } from '../interfaces/BackupConfig';
import { APPLICATION_NAME } from '../config/ConfigurationManager';

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'credential', 'accesskey', 'apikey', 'authorization'];

export interface LoggerOptions {
  level?: LogLevel;
  environment?: string;
  /** Ship records to Seq as well as the console */
  seq?: SeqConfig;
}

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(options: LoggerOptions = {}) {
    const consoleTransport = new winston.transports.Console({
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.printf(info => {
          const { timestamp, level, message, application, environment, ...meta } = info;
          const suffix = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
          return `[${String(timestamp)}] ${level.toUpperCase()}: ${String(message)}${suffix}`;
        })
      ),
    });

    // Seq is optional; without it records only reach the console
    const seqTransports = options.seq
      ? [
          new SeqTransport({
            serverUrl: options.seq.serverUrl,
            apiKey: options.seq.apiKey,
            onError: error => {
              console.error('Seq transport error:', error.message);
            },
          }),
        ]
      : [];

    this.winston = winston.createLogger({
      level: options.level ?? LogLevel.INFO,
      defaultMeta: {
        application: APPLICATION_NAME,
        environment: options.environment ?? 'Development',
      },
      format: winston.format.combine(winston.format.errors({ stack: true }), winston.format.json()),
      transports: [consoleTransport, ...seqTransports],
    });
  }

  /**
   * Sanitize metadata to remove sensitive information
   */
  private sanitizeMeta(meta: LogMeta): LogMeta {
    const sanitized: LogMeta = { ...meta };

    for (const [key, value] of Object.entries(sanitized)) {
      const lowerKey = key.toLowerCase().replace(/[-_]/g, '');
      if (SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive))) {
        sanitized[key] = '[REDACTED]';
      } else if (isPlainObject(value)) {
        sanitized[key] = this.sanitizeMeta(value);
      }
    }

    return sanitized;
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta && this.sanitizeMeta(meta));
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta && this.sanitizeMeta(meta));
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    const errorMeta: LogMeta = {
      ...(meta && this.sanitizeMeta(meta)),
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
          ...errorDetails(error),
        },
      }),
    };
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta && this.sanitizeMeta(meta));
  }

  logBackupStart(jobId: string, engine: string, databaseName: string): void {
    this.info('Backup operation started', {
      operation: 'backup_start',
      jobId,
      engine,
      databaseName,
    });
  }

  logBackupComplete(
    jobId: string,
    engine: string,
    databaseName: string,
    fileName: string,
    fileSize: number,
    remoteKey: string,
    duration: number
  ): void {
    this.info('Backup operation completed successfully', {
      operation: 'backup_complete',
      jobId,
      engine,
      databaseName,
      fileName,
      fileSize,
      remoteKey,
      duration,
      fileSizeMB: Math.round((fileSize / 1024 / 1024) * 100) / 100,
    });
  }

  logBackupError(stage: string, error: Error, meta?: LogMeta): void {
    this.error(`Backup operation failed: ${stage}`, error, {
      operation: 'backup_error',
      failedStage: stage,
      ...meta,
    });
  }

  logNotificationFailure(jobId: string, error: Error): void {
    this.error('Notification could not be delivered; backup outcome unchanged', error, {
      operation: 'notification_failed',
      jobId,
    });
  }

  logConfigurationStart(config: LogMeta): void {
    this.info('Application starting with configuration', {
      operation: 'startup',
      config,
    });
  }

  logScheduledExecution(cronExpression: string, trigger: string): void {
    this.info('Scheduled backup execution triggered', {
      operation: 'scheduled_execution',
      cronExpression,
      trigger,
    });
  }

  /**
   * Flush and close every transport
   */
  close(): Promise<void> {
    return new Promise(resolve => {
      this.winston.on('finish', () => resolve());
      this.winston.end();
    });
  }
}

function isPlainObject(value: unknown): value is LogMeta {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

/** Extra fields carried by Node system errors and the backup error classes */
function errorDetails(error: Error): LogMeta {
  const details: LogMeta = {};
  for (const field of ['code', 'errno', 'syscall', 'path', 'engine', 'exitCode', 'provider']) {
    const value: unknown = Reflect.get(error, field);
    if (value !== undefined && value !== null) {
      details[field] = value;
    }
  }
  return details;
}
