import { DateTime } from 'luxon';

export const SUPPORTED_STORAGE_TYPES = ['r2', 's3'] as const;

export type StorageProviderType = (typeof SUPPORTED_STORAGE_TYPES)[number];

/**
 * Annotations attached verbatim to a stored backup object
 */
export type UploadMetadata = Readonly<Record<string, string>>;

/**
 * Per-run handle on the remote bucket. The SDK client behind it is opened on
 * first use and released by close().
 */
export interface StorageSession {
  /**
   * Upload a local file and return the object key it was stored under.
   * The date partition of the key is taken from startedAt, not from the
   * current time.
   */
  upload(localPath: string, metadata: UploadMetadata, startedAt: DateTime): Promise<string>;

  /** Read back the user metadata of a stored object */
  readMetadata(key: string): Promise<Record<string, string>>;

  /** Whether the underlying SDK client has been created */
  isOpen(): boolean;

  close(): void;
}

/**
 * Remote bucket-like object store
 */
export interface StorageProvider {
  readonly type: StorageProviderType;
  readonly bucketName: string;

  /** Build the object key for a backup file started at startedAt */
  buildRemoteKey(fileName: string, startedAt: DateTime): string;

  /** Open a session scoped to a single backup run */
  openSession(): StorageSession;
}
