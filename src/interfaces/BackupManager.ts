import { DateTime } from 'luxon';
import { ConnectionParams, DatabaseEngine } from './DatabaseDumper';

/**
 * States a backup run moves through
 */
export enum BackupStage {
  IDLE = 'idle',
  DUMPING = 'dumping',
  UPLOADING = 'uploading',
  NOTIFYING = 'notifying',
  CLEANING_UP = 'cleaning_up',
}

/** Stages whose failure aborts a run */
export type FailedStage = BackupStage.DUMPING | BackupStage.UPLOADING;

/**
 * Outcome of the notification attempt of a run. A failed delivery is kept
 * here instead of being thrown.
 */
export type NotificationOutcome = { delivered: true } | { delivered: false; error: Error };

/**
 * State of a single run, owned by the orchestrator for the run's lifetime
 */
export interface BackupJob {
  id: string;
  engine: DatabaseEngine;
  connection: ConnectionParams;
  startedAt: DateTime;
  stage: BackupStage;
  stageHistory: BackupStage[];

  /** Deterministic target path of the dump, known before it starts */
  stagingPath: string;

  /** Set only after a successful dump */
  localFilePath?: string;
  fileSize?: number;

  /** Set only after a successful upload */
  remoteKey?: string;

  outcome?: 'success' | 'failure';
  failedStage?: FailedStage;
  error?: Error;
}

/**
 * Result of a backup operation
 */
export interface BackupResult {
  /** Whether the dump and upload both succeeded */
  success: boolean;

  jobId: string;
  engine: DatabaseEngine;
  databaseName: string;

  /** Name of the backup file created */
  fileName: string;

  /** Size of the backup file in bytes */
  fileSize: number;

  /** Object key the backup was stored under, empty on failure */
  remoteKey: string;

  /** Duration of the run in milliseconds */
  duration: number;

  failedStage?: FailedStage;

  /** Error message if the backup failed */
  error?: string;

  notification: NotificationOutcome;

  /** Every stage the run entered, in order */
  stages: BackupStage[];
}

/**
 * Interface for the main backup orchestration manager
 */
export interface BackupManager {
  /** Execute one dump, upload, notify and cleanup cycle */
  executeBackup(): Promise<BackupResult>;
}
