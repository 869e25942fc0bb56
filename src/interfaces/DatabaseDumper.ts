export const SUPPORTED_DATABASE_ENGINES = ['postgres', 'mysql', 'mariadb', 'mssql'] as const;

export type DatabaseEngine = (typeof SUPPORTED_DATABASE_ENGINES)[number];

/**
 * Connection parameters handed to a dumper for a single run
 */
export interface ConnectionParams {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

/**
 * Result of a successful dump
 */
export interface DumpResult {
  /** Path of the local backup file */
  filePath: string;

  /** Size of the backup file in bytes, always greater than zero */
  fileSize: number;

  /** Engine-specific annotations, e.g. the dump format */
  metadata: Record<string, string>;
}

/**
 * Produces a local backup file for one database engine
 */
export interface DatabaseDumper {
  readonly engine: DatabaseEngine;

  /** Extension of the produced file, including the leading dot */
  readonly fileExtension: string;

  /** Dump the database into outputPath */
  dump(connection: ConnectionParams, outputPath: string): Promise<DumpResult>;
}
