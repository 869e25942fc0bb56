import winston from 'winston';
import { SeqTransport } from '@datalust/winston-seq';
import { Logger } from '../src/clients/Logger';
import { DumpError } from '../src/clients/DatabaseDumper';
import { LogLevel } from '../src/interfaces/Logger';

const mockWinstonLogger = {
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  debug: jest.fn(),
  end: jest.fn(),
  on: jest.fn((_event: string, listener: () => void) => listener()),
};

// Mock winston to capture log calls
jest.mock('winston', () => ({
  createLogger: jest.fn(() => mockWinstonLogger),
  format: {
    combine: jest.fn(),
    timestamp: jest.fn(),
    errors: jest.fn(),
    json: jest.fn(),
    printf: jest.fn(),
  },
  transports: {
    Console: jest.fn(),
  },
}));

jest.mock('@datalust/winston-seq', () => ({
  SeqTransport: jest.fn(),
}));

describe('Logger', () => {
  let logger: Logger;

  beforeEach(() => {
    jest.clearAllMocks();
    logger = new Logger({ level: LogLevel.DEBUG, environment: 'Test' });
  });

  describe('constructor', () => {
    it('should tag every record with the application and environment', () => {
      expect(winston.createLogger).toHaveBeenCalledWith(
        expect.objectContaining({
          level: 'debug',
          defaultMeta: { application: 'database-backup-service', environment: 'Test' },
        })
      );
    });

    it('should default to info level in Development', () => {
      jest.clearAllMocks();

      new Logger();

      expect(winston.createLogger).toHaveBeenCalledWith(
        expect.objectContaining({
          level: 'info',
          defaultMeta: { application: 'database-backup-service', environment: 'Development' },
        })
      );
    });

    it('should only log to the console without Seq', () => {
      const options = jest.mocked(winston.createLogger).mock.calls[0][0];

      expect(SeqTransport).not.toHaveBeenCalled();
      expect(options?.transports).toHaveLength(1);
    });

    it('should add a Seq transport when configured', () => {
      jest.clearAllMocks();

      new Logger({ seq: { serverUrl: 'http://seq.internal:5341', apiKey: 'test-seq-key' } });

      expect(SeqTransport).toHaveBeenCalledWith({
        serverUrl: 'http://seq.internal:5341',
        apiKey: 'test-seq-key',
        onError: expect.any(Function),
      });
      const options = jest.mocked(winston.createLogger).mock.calls[0][0];
      expect(options?.transports).toHaveLength(2);
    });
  });

  describe('Basic logging methods', () => {
    it('should log info messages', () => {
      logger.info('Test info message', { key: 'value' });

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Test info message', { key: 'value' });
    });

    it('should log messages without metadata', () => {
      logger.warn('Test warning message');

      expect(mockWinstonLogger.warn).toHaveBeenCalledWith('Test warning message', undefined);
    });

    it('should log debug messages', () => {
      logger.debug('Test debug message', { stage: 'dumping' });

      expect(mockWinstonLogger.debug).toHaveBeenCalledWith('Test debug message', { stage: 'dumping' });
    });

    it('should redact sensitive keys at any depth', () => {
      logger.info('Connecting', {
        host: 'db.internal',
        password: 'test-password',
        'access-key': 'test-access-key',
        storage: { bucketName: 'test-bucket', secretAccessKey: 'test-secret', SEQ_API_KEY: 'test-seq-key' },
      });

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Connecting', {
        host: 'db.internal',
        password: '[REDACTED]',
        'access-key': '[REDACTED]',
        storage: { bucketName: 'test-bucket', secretAccessKey: '[REDACTED]', SEQ_API_KEY: '[REDACTED]' },
      });
    });

    it('should not modify the caller metadata', () => {
      const meta = { password: 'test-password' };

      logger.info('Connecting', meta);

      expect(meta.password).toBe('test-password');
    });
  });

  describe('error', () => {
    it('should include the error fields and the fields of dump errors', () => {
      const error = new DumpError('pg_dump failed with exit code 1: denied', 'postgres', 1, 'denied');

      logger.error('Dump failed', error, { jobId: 'backup-1' });

      expect(mockWinstonLogger.error).toHaveBeenCalledWith('Dump failed', {
        jobId: 'backup-1',
        error: {
          name: 'DumpError',
          message: 'pg_dump failed with exit code 1: denied',
          stack: error.stack,
          engine: 'postgres',
          exitCode: 1,
        },
      });
    });

    it('should include the code of system errors', () => {
      const error = Object.assign(new Error('spawn pg_dump ENOENT'), { code: 'ENOENT', syscall: 'spawn pg_dump' });

      logger.error('Spawn failed', error);

      expect(mockWinstonLogger.error).toHaveBeenCalledWith('Spawn failed', {
        error: {
          name: 'Error',
          message: 'spawn pg_dump ENOENT',
          stack: error.stack,
          code: 'ENOENT',
          syscall: 'spawn pg_dump',
        },
      });
    });

    it('should log without an error object', () => {
      logger.error('Something failed', undefined, { jobId: 'backup-1' });

      expect(mockWinstonLogger.error).toHaveBeenCalledWith('Something failed', { jobId: 'backup-1' });
    });
  });

  describe('Backup-specific logging methods', () => {
    it('should log backup start', () => {
      logger.logBackupStart('backup-1', 'postgres', 'orders');

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Backup operation started', {
        operation: 'backup_start',
        jobId: 'backup-1',
        engine: 'postgres',
        databaseName: 'orders',
      });
    });

    it('should log backup completion with the size in megabytes', () => {
      logger.logBackupComplete(
        'backup-1',
        'postgres',
        'orders',
        'backup_orders_20240310_235800.sql',
        5242880,
        'backups/20240310/backup_orders_20240310_235800.sql',
        4200
      );

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Backup operation completed successfully', {
        operation: 'backup_complete',
        jobId: 'backup-1',
        engine: 'postgres',
        databaseName: 'orders',
        fileName: 'backup_orders_20240310_235800.sql',
        fileSize: 5242880,
        remoteKey: 'backups/20240310/backup_orders_20240310_235800.sql',
        duration: 4200,
        fileSizeMB: 5,
      });
    });

    it('should log backup errors with the failed stage', () => {
      const error = new Error('upload failed');

      logger.logBackupError('uploading', error, { jobId: 'backup-1' });

      expect(mockWinstonLogger.error).toHaveBeenCalledWith('Backup operation failed: uploading', {
        operation: 'backup_error',
        failedStage: 'uploading',
        jobId: 'backup-1',
        error: { name: 'Error', message: 'upload failed', stack: error.stack },
      });
    });

    it('should log notification failures', () => {
      const error = new Error('connection timeout');

      logger.logNotificationFailure('backup-1', error);

      expect(mockWinstonLogger.error).toHaveBeenCalledWith(
        'Notification could not be delivered; backup outcome unchanged',
        {
          operation: 'notification_failed',
          jobId: 'backup-1',
          error: { name: 'Error', message: 'connection timeout', stack: error.stack },
        }
      );
    });

    it('should log scheduled executions', () => {
      logger.logScheduledExecution('0 */12 * * *', 'startup');

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Scheduled backup execution triggered', {
        operation: 'scheduled_execution',
        cronExpression: '0 */12 * * *',
        trigger: 'startup',
      });
    });

    it('should log the startup configuration', () => {
      logger.logConfigurationStart({ cronSchedule: '0 */12 * * *', database: { host: 'db.internal', password: '[REDACTED]' } });

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Application starting with configuration', {
        operation: 'startup',
        config: { cronSchedule: '0 */12 * * *', database: { host: 'db.internal', password: '[REDACTED]' } },
      });
    });
  });

  describe('close', () => {
    it('should end winston and resolve once it finishes', async () => {
      await expect(logger.close()).resolves.toBeUndefined();

      expect(mockWinstonLogger.on).toHaveBeenCalledWith('finish', expect.any(Function));
      expect(mockWinstonLogger.end).toHaveBeenCalledTimes(1);
    });
  });
});
