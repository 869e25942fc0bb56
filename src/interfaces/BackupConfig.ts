import { DatabaseEngine } from './DatabaseDumper';
import { StorageProviderType } from './StorageProvider';
import { LogLevel } from './Logger';

export interface DatabaseConfig {
  engine: DatabaseEngine;
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

export interface StorageConfig {
  type: StorageProviderType;
  accessKeyId: string;
  secretAccessKey: string;
  bucketName: string;
  destinationFolder: string;
  endpointUrl?: string; // required for r2
  region?: string; // required for s3
}

export interface EmailConfig {
  from: string;
  to: string;
  smtpHost: string;
  smtpPort: number;
  user: string;
  password: string;
}

export interface SeqConfig {
  serverUrl: string;
  apiKey?: string;
}

export interface BackupConfig {
  database: DatabaseConfig;
  storage: StorageConfig;
  email: EmailConfig;
  cronSchedule: string; // cron format
  timezone: string; // IANA zone name
  tempDir: string;
  appEnv: string;
  logLevel: LogLevel;
  seq?: SeqConfig;
}
