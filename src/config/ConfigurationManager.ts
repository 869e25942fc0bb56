import { tmpdir } from 'os';
import * as cron from 'node-cron';
import { BackupConfig } from '../interfaces/BackupConfig';
import { DatabaseEngine, SUPPORTED_DATABASE_ENGINES } from '../interfaces/DatabaseDumper';
import { StorageProviderType, SUPPORTED_STORAGE_TYPES } from '../interfaces/StorageProvider';
import { Logger, LogLevel } from '../interfaces/Logger';
import { LocalClock } from '../utils/LocalClock';

export const APPLICATION_NAME = 'database-backup-service';
export const DEFAULT_CRON_SCHEDULE = '0 */12 * * *';
export const DEFAULT_TIMEZONE = 'America/Sao_Paulo';
export const DEFAULT_DESTINATION_FOLDER = 'backups/';

const REQUIRED_VARIABLES = [
  'DB_TYPE',
  'DB_HOST',
  'DB_PORT',
  'DB_USER',
  'DB_PASSWORD',
  'DB_DATABASE',
  'STORAGE_TYPE',
  'STORAGE_ACCESS_KEY_ID',
  'STORAGE_SECRET_ACCESS_KEY',
  'STORAGE_BUCKET_NAME',
  'EMAIL_FROM',
  'EMAIL_TO',
  'EMAIL_SMTP',
  'EMAIL_PORT',
  'EMAIL_USER',
  'EMAIL_PASSWORD',
] as const;

/**
 * Raised for any unusable startup configuration. Fatal: the process exits
 * before the scheduler starts.
 */
export class ConfigurationError extends Error {
  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ConfigurationManager {
  /**
   * Load and validate configuration from environment variables.
   * The returned object is frozen for the lifetime of the process.
   * Recoverable problems, such as an unknown timezone, are reported to the
   * logger and replaced by their defaults.
   */
  static loadConfiguration(env: NodeJS.ProcessEnv = process.env, logger?: Pick<Logger, 'warn'>): BackupConfig {
    const missing = REQUIRED_VARIABLES.filter(name => !env[name]?.trim());
    if (missing.length > 0) {
      throw new ConfigurationError(
        `Missing required environment variables: ${missing.join(', ')}`,
        missing[0]
      );
    }

    const read = (name: (typeof REQUIRED_VARIABLES)[number]): string => (env[name] ?? '').trim();
    const optional = (name: string): string | undefined => env[name]?.trim() || undefined;

    const cronSchedule = optional('CRON_SCHEDULE') ?? DEFAULT_CRON_SCHEDULE;
    if (!ConfigurationManager.isValidCronExpression(cronSchedule)) {
      throw new ConfigurationError(
        `CRON_SCHEDULE must be a valid cron expression, got "${cronSchedule}"`,
        'CRON_SCHEDULE'
      );
    }

    let timezone = optional('TIMEZONE') ?? DEFAULT_TIMEZONE;
    if (!LocalClock.isValidTimezone(timezone)) {
      logger?.warn(`TIMEZONE "${timezone}" is not a known IANA timezone, falling back to ${DEFAULT_TIMEZONE}`, {
        field: 'TIMEZONE',
      });
      timezone = DEFAULT_TIMEZONE;
    }

    const config: BackupConfig = {
      database: {
        engine: ConfigurationManager.parseEngine(read('DB_TYPE')),
        host: read('DB_HOST'),
        port: ConfigurationManager.parsePort(read('DB_PORT'), 'DB_PORT'),
        user: read('DB_USER'),
        // Passwords are taken verbatim; surrounding whitespace may be significant
        password: env['DB_PASSWORD'] ?? '',
        database: read('DB_DATABASE'),
      },
      storage: {
        type: ConfigurationManager.parseStorageType(read('STORAGE_TYPE')),
        accessKeyId: read('STORAGE_ACCESS_KEY_ID'),
        secretAccessKey: read('STORAGE_SECRET_ACCESS_KEY'),
        bucketName: read('STORAGE_BUCKET_NAME'),
        destinationFolder: optional('STORAGE_DESTINATION_FOLDER') ?? DEFAULT_DESTINATION_FOLDER,
      },
      email: {
        from: read('EMAIL_FROM'),
        to: read('EMAIL_TO'),
        smtpHost: read('EMAIL_SMTP'),
        smtpPort: ConfigurationManager.parsePort(read('EMAIL_PORT'), 'EMAIL_PORT'),
        user: read('EMAIL_USER'),
        password: env['EMAIL_PASSWORD'] ?? '',
      },
      cronSchedule,
      timezone,
      tempDir: optional('BACKUP_TEMP_DIR') ?? tmpdir(),
      appEnv: optional('APP_ENV') ?? 'Development',
      logLevel: ConfigurationManager.parseLogLevel(optional('LOG_LEVEL')),
    };

    // Add optional properties only if they exist
    const endpointUrl = optional('STORAGE_ENDPOINT_URL');
    if (endpointUrl) {
      config.storage.endpointUrl = endpointUrl;
    }
    const region = optional('STORAGE_REGION');
    if (region) {
      config.storage.region = region;
    }
    const seqUrl = optional('SEQ_URL');
    if (seqUrl) {
      config.seq = { serverUrl: seqUrl };
      const apiKey = optional('SEQ_API_KEY');
      if (apiKey) {
        config.seq.apiKey = apiKey;
      }
    }

    return deepFreeze(config);
  }

  /**
   * Copy of the configuration that is safe to log
   */
  static sanitizeForLogging(config: BackupConfig): Record<string, unknown> {
    return {
      database: { ...config.database, password: '[REDACTED]' },
      storage: { ...config.storage, accessKeyId: '[REDACTED]', secretAccessKey: '[REDACTED]' },
      email: { ...config.email, password: '[REDACTED]' },
      cronSchedule: config.cronSchedule,
      timezone: config.timezone,
      tempDir: config.tempDir,
      appEnv: config.appEnv,
      logLevel: config.logLevel,
      seq: config.seq ? { serverUrl: config.seq.serverUrl, apiKey: config.seq.apiKey ? '[REDACTED]' : undefined } : undefined,
    };
  }

  static isValidCronExpression(expression: string): boolean {
    try {
      return cron.validate(expression);
    } catch {
      return false;
    }
  }

  private static parseEngine(value: string): DatabaseEngine {
    const engine = value.toLowerCase();
    const match = SUPPORTED_DATABASE_ENGINES.find(candidate => candidate === engine);
    if (!match) {
      throw new ConfigurationError(
        `DB_TYPE "${value}" is not supported. Accepted values: ${SUPPORTED_DATABASE_ENGINES.join(', ')}`,
        'DB_TYPE'
      );
    }
    return match;
  }

  private static parseStorageType(value: string): StorageProviderType {
    const type = value.toLowerCase();
    const match = SUPPORTED_STORAGE_TYPES.find(candidate => candidate === type);
    if (!match) {
      throw new ConfigurationError(
        `STORAGE_TYPE "${value}" is not supported. Accepted values: ${SUPPORTED_STORAGE_TYPES.join(', ')}`,
        'STORAGE_TYPE'
      );
    }
    return match;
  }

  private static parsePort(value: string, field: string): number {
    const port = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
    if (isNaN(port) || port <= 0 || port > 65535) {
      throw new ConfigurationError(`${field} must be a positive integer port, got "${value}"`, field);
    }
    return port;
  }

  private static parseLogLevel(value: string | undefined): LogLevel {
    if (value === undefined) {
      return LogLevel.INFO;
    }
    const level = Object.values(LogLevel).find(candidate => candidate === value.toLowerCase());
    if (!level) {
      throw new ConfigurationError(
        `LOG_LEVEL "${value}" is not supported. Accepted values: ${Object.values(LogLevel).join(', ')}`,
        'LOG_LEVEL'
      );
    }
    return level;
  }
}

function deepFreeze<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    if (typeof nested === 'object' && nested !== null && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}
