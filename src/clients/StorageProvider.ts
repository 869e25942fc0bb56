import {
  S3Client,
  S3ClientConfig,
  PutObjectCommand,
  PutObjectCommandInput,
  HeadObjectCommand,
} from '@aws-sdk/client-s3';
import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import { basename } from 'path';
import { DateTime } from 'luxon';
import {
  StorageProvider as IStorageProvider,
  StorageProviderType,
  StorageSession,
  UploadMetadata,
} from '../interfaces/StorageProvider';
import { StorageConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { ConfigurationError } from '../config/ConfigurationManager';
import { formatPartitionDate } from '../utils/LocalClock';

export const R2_REGION = 'auto';

// Failures that another attempt cannot fix
const NON_RETRYABLE_ERRORS = [
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'AccessDenied',
  'NoSuchBucket',
  'InvalidBucketName',
  'CredentialsProviderError',
];

/**
 * Raised when an object store call fails
 */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly provider: StorageProviderType,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'StorageError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
}

interface SessionContext {
  type: StorageProviderType;
  bucketName: string;
  buildRemoteKey(fileName: string, startedAt: DateTime): string;
  createClient(): S3Client;
  logger: Logger;
  maxAttempts: number;
  baseDelayMs: number;
}

/**
 * One run's view of the bucket. The SDK client is created on the first call
 * and destroyed by close().
 */
class S3StorageSession implements StorageSession {
  private client: S3Client | null = null;

  constructor(private readonly context: SessionContext) {}

  isOpen(): boolean {
    return this.client !== null;
  }

  async upload(localPath: string, metadata: UploadMetadata, startedAt: DateTime): Promise<string> {
    const { type, bucketName, logger } = this.context;
    const key = this.context.buildRemoteKey(basename(localPath), startedAt);

    let contentLength: number;
    try {
      contentLength = (await stat(localPath)).size;
    } catch (error) {
      throw new StorageError(
        `Local backup file not found: ${localPath}`,
        type,
        error instanceof Error ? error : undefined
      );
    }

    logger.info('Starting upload', { provider: type, bucket: bucketName, remoteKey: key, fileSize: contentLength });

    await this.withRetry(async () => {
      // Each attempt reads the file afresh; the descriptor is released whatever the outcome
      const body = createReadStream(localPath);
      const uploadParams: PutObjectCommandInput = {
        Bucket: bucketName,
        Key: key,
        Body: body,
        ContentLength: contentLength,
        ContentType: 'application/octet-stream',
        Metadata: { ...metadata },
      };
      try {
        await this.getClient().send(new PutObjectCommand(uploadParams));
      } finally {
        body.destroy();
      }
    }, `upload ${localPath} to ${bucketName}/${key}`);

    logger.info('Upload completed', { provider: type, remoteKey: key });
    return key;
  }

  async readMetadata(key: string): Promise<Record<string, string>> {
    const { bucketName } = this.context;
    const response = await this.withRetry(
      () => this.getClient().send(new HeadObjectCommand({ Bucket: bucketName, Key: key })),
      `read metadata of ${bucketName}/${key}`
    );
    return response.Metadata ?? {};
  }

  close(): void {
    if (this.client) {
      this.client.destroy();
      this.client = null;
    }
  }

  private getClient(): S3Client {
    if (!this.client) {
      this.client = this.context.createClient();
    }
    return this.client;
  }

  /**
   * Execute an operation with exponential backoff retry logic
   */
  private async withRetry<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
    const { type, logger, maxAttempts, baseDelayMs } = this.context;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const description = describeError(error);
        const cause = error instanceof Error ? error : undefined;

        if (isNonRetryableError(error)) {
          throw new StorageError(`Failed to ${operationName}: ${description}`, type, cause);
        }

        if (attempt >= maxAttempts) {
          throw new StorageError(
            `Failed to ${operationName} after ${maxAttempts} attempts. Last error: ${description}`,
            type,
            cause
          );
        }

        const delay = baseDelayMs * Math.pow(2, attempt - 1);
        logger.warn(`Attempt ${attempt} failed to ${operationName}: ${description}. Retrying in ${delay}ms...`, {
          provider: type,
        });
        await sleep(delay);
      }
    }
  }
}

/**
 * Shared behaviour of the S3-compatible providers. Variants only decide how
 * the SDK client is configured.
 */
abstract class S3CompatibleStorage implements IStorageProvider {
  abstract readonly type: StorageProviderType;
  readonly bucketName: string;
  protected readonly destinationFolder: string;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;

  constructor(
    protected readonly config: StorageConfig,
    protected readonly logger: Logger,
    retry: RetryOptions = {}
  ) {
    const missing = (['accessKeyId', 'secretAccessKey', 'bucketName'] as const).filter(
      field => !config[field]
    );
    if (missing.length > 0) {
      throw new ConfigurationError(`Incomplete storage configuration, missing: ${missing.join(', ')}`, missing[0]);
    }
    this.bucketName = config.bucketName;
    this.destinationFolder = config.destinationFolder;
    this.maxAttempts = retry.maxAttempts ?? 3;
    this.baseDelayMs = retry.baseDelayMs ?? 1000;
  }

  protected abstract clientConfig(): S3ClientConfig;

  /**
   * Build the key {destinationFolder}/{yyyyMMdd}/{fileName}, the date being
   * startedAt's calendar date in its own zone
   */
  buildRemoteKey(fileName: string, startedAt: DateTime): string {
    const folder = this.destinationFolder
      .replace(/^\/+/, '') // Remove leading slashes
      .replace(/\/+$/, ''); // Remove trailing slashes
    const partition = formatPartitionDate(startedAt);

    return folder ? `${folder}/${partition}/${fileName}` : `${partition}/${fileName}`;
  }

  openSession(): StorageSession {
    return new S3StorageSession({
      type: this.type,
      bucketName: this.bucketName,
      buildRemoteKey: (fileName, startedAt) => this.buildRemoteKey(fileName, startedAt),
      createClient: () => new S3Client(this.clientConfig()),
      logger: this.logger,
      maxAttempts: this.maxAttempts,
      baseDelayMs: this.baseDelayMs,
    });
  }

  protected credentials(): S3ClientConfig['credentials'] {
    return {
      accessKeyId: this.config.accessKeyId,
      secretAccessKey: this.config.secretAccessKey,
    };
  }
}

/**
 * Cloudflare R2: explicit endpoint, fixed "auto" region
 */
export class R2Storage extends S3CompatibleStorage {
  readonly type = 'r2';
  private readonly endpointUrl: string;

  constructor(config: StorageConfig, logger: Logger, retry?: RetryOptions) {
    super(config, logger, retry);
    if (!config.endpointUrl) {
      throw new ConfigurationError('STORAGE_ENDPOINT_URL is required for Cloudflare R2', 'STORAGE_ENDPOINT_URL');
    }
    this.endpointUrl = config.endpointUrl;
  }

  protected clientConfig(): S3ClientConfig {
    return {
      region: R2_REGION,
      endpoint: this.endpointUrl,
      credentials: this.credentials(),
    };
  }
}

/**
 * AWS S3: configured region, optional custom endpoint
 */
export class S3Storage extends S3CompatibleStorage {
  readonly type = 's3';
  private readonly region: string;

  constructor(config: StorageConfig, logger: Logger, retry?: RetryOptions) {
    super(config, logger, retry);
    if (!config.region) {
      throw new ConfigurationError('STORAGE_REGION is required for AWS S3 (e.g. us-east-1)', 'STORAGE_REGION');
    }
    this.region = config.region;
  }

  protected clientConfig(): S3ClientConfig {
    const clientConfig: S3ClientConfig = {
      region: this.region,
      credentials: this.credentials(),
    };

    // Use custom endpoint if provided (for S3-compatible services)
    if (this.config.endpointUrl) {
      clientConfig.endpoint = this.config.endpointUrl;
      clientConfig.forcePathStyle = true;
    }

    return clientConfig;
  }
}

/**
 * Map a storage type tag to its provider
 */
export function createStorageProvider(config: StorageConfig, logger: Logger, retry?: RetryOptions): IStorageProvider {
  switch (config.type) {
    case 'r2':
      return new R2Storage(config, logger, retry);
    case 's3':
      return new S3Storage(config, logger, retry);
  }
}

function isNonRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (NON_RETRYABLE_ERRORS.includes(error.name)) {
    return true;
  }
  const status: unknown = Reflect.get(error, '$metadata');
  if (typeof status === 'object' && status !== null) {
    const httpStatusCode: unknown = Reflect.get(status, 'httpStatusCode');
    return typeof httpStatusCode === 'number' && httpStatusCode >= 400 && httpStatusCode < 500;
  }
  return false;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
