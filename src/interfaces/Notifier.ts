import { DatabaseEngine } from './DatabaseDumper';
import { FailedStage } from './BackupManager';

export interface NotificationPayload {
  outcome: 'success' | 'failure';
  engine: DatabaseEngine;
  databaseName: string;

  /** Job start time formatted in the configured timezone */
  localTimestamp: string;
  timezone: string;

  /** Object key of the uploaded backup, empty when nothing was stored */
  remoteKey: string;

  /** Error detail, empty on success */
  errorMessage: string;

  failedStage: FailedStage | null;
}

/**
 * Sends the outcome of a backup run to the operator
 */
export interface Notifier {
  notify(payload: NotificationPayload): Promise<void>;
}
