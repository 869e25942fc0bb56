#!/usr/bin/env node
import 'dotenv/config';
import { ConfigurationManager, ConfigurationError } from './config/ConfigurationManager';
import { Logger } from './clients/Logger';
import { BackupManager } from './clients/BackupManager';
import { CronScheduler } from './clients/CronScheduler';
import { createDumper } from './clients/DatabaseDumper';
import { createStorageProvider } from './clients/StorageProvider';
import { EmailNotifier } from './clients/EmailNotifier';
import { BackupConfig } from './interfaces/BackupConfig';

/**
 * Main application class that initializes and coordinates all components
 */
class DatabaseBackupApplication {
  private logger: Logger;
  private config: BackupConfig | null = null;
  private cronScheduler: CronScheduler | null = null;
  private isShuttingDown = false;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
    // Replaced once the configured level and sinks are known
    this.logger = new Logger();
  }

  /**
   * Load configuration and build every component. Configuration errors are
   * fatal and exit before the scheduler exists.
   */
  async initialize(): Promise<void> {
    try {
      this.logger.info('Database backup service starting...');

      const config = ConfigurationManager.loadConfiguration(this.env, this.logger);
      this.config = config;

      this.logger = new Logger({ level: config.logLevel, environment: config.appEnv, seq: config.seq });
      this.logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));

      const dumper = createDumper(config.database.engine, this.logger);
      const storage = createStorageProvider(config.storage, this.logger);
      const notifier = new EmailNotifier(config.email, this.logger);
      const backupManager = new BackupManager(dumper, storage, notifier, config, this.logger);

      this.cronScheduler = new CronScheduler(
        {
          cronExpression: config.cronSchedule,
          timezone: config.timezone,
          runOnInit: true, // Immediate run confirms the configuration works
        },
        backupManager,
        this.logger
      );

      this.logger.info('Application initialized successfully', {
        engine: dumper.engine,
        storage: storage.type,
      });
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.logger.error('Configuration error', error, { field: error.field });
        await this.exitAfterFlush(1);
      } else {
        this.logger.error('Failed to initialize application', error instanceof Error ? error : new Error(String(error)));
        await this.exitAfterFlush(2);
      }
    }
  }

  /**
   * Start the application and begin scheduled backups
   */
  async start(): Promise<void> {
    try {
      if (!this.cronScheduler || !this.config) {
        throw new Error('Application not initialized. Call initialize() first.');
      }

      this.logger.info(`Starting backup scheduler with schedule: ${this.config.cronSchedule}`);
      this.cronScheduler.start();
      this.logger.info('Service is now running and will execute backups according to the configured schedule');
    } catch (error) {
      this.logger.error('Failed to start application', error instanceof Error ? error : new Error(String(error)));
      await this.exitAfterFlush(3);
    }
  }

  /**
   * Exit once buffered records, including batched Seq events, have been written
   */
  private async exitAfterFlush(code: number): Promise<void> {
    await this.logger.close();
    process.exit(code);
  }

  /**
   * Stop scheduling new runs and flush the logs
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    this.logger.info('Initiating graceful shutdown...');

    if (this.cronScheduler && this.cronScheduler.isRunning()) {
      this.cronScheduler.stop();
    }
    if (this.cronScheduler?.isBackupInProgress()) {
      this.logger.warn('A backup run is still in progress and will be interrupted');
    }

    this.logger.info('Database backup service shutdown completed');
    await this.logger.close();
  }

  /**
   * Setup signal handlers for graceful shutdown
   */
  setupSignalHandlers(): void {
    const signals = ['SIGTERM', 'SIGINT'] as const;

    signals.forEach(signal => {
      process.on(signal, () => {
        this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
        void this.shutdown().finally(() => process.exit(0));
      });
    });

    process.on('uncaughtException', error => {
      this.logger.error('Uncaught exception', error);
      void this.shutdown().finally(() => process.exit(5));
    });

    process.on('unhandledRejection', reason => {
      this.logger.error('Unhandled promise rejection', reason instanceof Error ? reason : new Error(String(reason)));
      void this.shutdown().finally(() => process.exit(6));
    });
  }

  getScheduler(): CronScheduler | null {
    return this.cronScheduler;
  }
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  const app = new DatabaseBackupApplication();

  app.setupSignalHandlers();

  await app.initialize();
  await app.start();
}

// Export for testing
export { DatabaseBackupApplication, main };

if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error starting application:', error);
    process.exit(7);
  });
}
