import { spawn } from 'child_process';
import { promises as fs } from 'fs';
import { dirname } from 'path';
import {
  ConnectionParams,
  DatabaseDumper as IDatabaseDumper,
  DatabaseEngine,
  DumpResult,
} from '../interfaces/DatabaseDumper';
import { Logger } from '../interfaces/Logger';

const STDERR_EXCERPT_LENGTH = 500;

/**
 * Raised when a dump tool cannot be started, exits non-zero or produces no data
 */
export class DumpError extends Error {
  constructor(
    message: string,
    public readonly engine: DatabaseEngine,
    public readonly exitCode: number | null,
    public readonly stderrExcerpt: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'DumpError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Check connection parameters, returning one message per problem
 */
export function validateConnectionParams(connection: ConnectionParams): string[] {
  const problems: string[] = [];
  for (const field of ['host', 'user', 'password', 'database'] as const) {
    if (connection[field].trim() === '') {
      problems.push(`${field} must not be empty`);
    }
  }
  if (!Number.isInteger(connection.port) || connection.port <= 0) {
    problems.push('port must be a positive integer');
  }
  return problems;
}

/**
 * Runs an engine's dump tool as a child process. Variants choose the command,
 * its arguments and the environment variable that carries the password, which
 * is never placed on the command line.
 */
abstract class CommandLineDumper implements IDatabaseDumper {
  abstract readonly engine: DatabaseEngine;
  abstract readonly fileExtension: string;
  protected abstract readonly command: string;
  protected abstract readonly passwordVariable: string;
  protected abstract readonly dumpFormat: string;

  constructor(protected readonly logger: Logger) {}

  protected abstract buildArgs(connection: ConnectionParams, outputPath: string): string[];

  async dump(connection: ConnectionParams, outputPath: string): Promise<DumpResult> {
    const problems = validateConnectionParams(connection);
    if (problems.length > 0) {
      throw new DumpError(`Invalid connection parameters: ${problems.join('; ')}`, this.engine, null, '');
    }

    try {
      await fs.mkdir(dirname(outputPath), { recursive: true });
    } catch (error) {
      throw new DumpError(
        `Failed to create output directory for ${outputPath}: ${formatError(error)}`,
        this.engine,
        null,
        '',
        error instanceof Error ? error : undefined
      );
    }

    const args = this.buildArgs(connection, outputPath);
    this.logger.info(`Executing ${this.command}`, {
      engine: this.engine,
      databaseName: connection.database,
      commandLine: [this.command, ...args].join(' '),
    });

    await this.execute(args, { [this.passwordVariable]: connection.password });

    let fileSize: number;
    try {
      fileSize = (await fs.stat(outputPath)).size;
    } catch (error) {
      throw new DumpError(
        `${this.command} exited successfully but no backup file was found at ${outputPath}`,
        this.engine,
        0,
        '',
        error instanceof Error ? error : undefined
      );
    }

    if (fileSize === 0) {
      throw new DumpError(`${this.command} produced no data: ${outputPath} is empty`, this.engine, 0, '');
    }

    this.logger.info(`${this.command} completed`, { engine: this.engine, filePath: outputPath, fileSize });

    return {
      filePath: outputPath,
      fileSize,
      metadata: { 'dump-format': this.dumpFormat },
    };
  }

  private execute(args: string[], credentials: Record<string, string>): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.command, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        env: { ...process.env, ...credentials },
      });

      let stderr = '';
      let settled = false;

      child.stdout?.on('data', (data: Buffer) => {
        this.logger.debug(`${this.command}: ${data.toString().trim()}`);
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
        // Only the tail is ever reported
        if (stderr.length > STDERR_EXCERPT_LENGTH * 4) {
          stderr = stderr.slice(-STDERR_EXCERPT_LENGTH * 2);
        }
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        if (settled) {
          return;
        }
        settled = true;
        const message =
          error.code === 'ENOENT'
            ? `${this.command} command not found. Please ensure the ${this.engine} client tools are installed.`
            : `Failed to execute ${this.command}: ${error.message}`;
        reject(new DumpError(message, this.engine, null, excerpt(stderr), error));
      });

      child.on('close', (code: number | null) => {
        if (settled) {
          return;
        }
        settled = true;
        if (code === 0) {
          resolve();
          return;
        }
        const stderrExcerpt = excerpt(stderr);
        reject(
          new DumpError(
            `${this.command} failed with exit code ${code ?? 'null'}${stderrExcerpt ? `: ${stderrExcerpt}` : ''}`,
            this.engine,
            code,
            stderrExcerpt
          )
        );
      });
    });
  }
}

/**
 * PostgreSQL, custom-format archive via pg_dump
 */
export class PostgresDumper extends CommandLineDumper {
  readonly engine = 'postgres';
  readonly fileExtension = '.sql';
  protected readonly command = 'pg_dump';
  protected readonly passwordVariable = 'PGPASSWORD';
  protected readonly dumpFormat = 'custom';

  protected buildArgs(connection: ConnectionParams, outputPath: string): string[] {
    return [
      '-h', connection.host,
      '-p', String(connection.port),
      '-U', connection.user,
      '-F', 'c',
      '-b',
      '-v',
      '-f', outputPath,
      connection.database,
    ];
  }
}

/**
 * MySQL and MariaDB via mysqldump, which both engines accept
 */
export class MySQLDumper extends CommandLineDumper {
  readonly fileExtension = '.sql';
  protected readonly command = 'mysqldump';
  protected readonly passwordVariable = 'MYSQL_PWD';
  protected readonly dumpFormat = 'plain';

  constructor(
    logger: Logger,
    readonly engine: 'mysql' | 'mariadb' = 'mysql'
  ) {
    super(logger);
  }

  protected buildArgs(connection: ConnectionParams, outputPath: string): string[] {
    return [
      `--host=${connection.host}`,
      `--port=${connection.port}`,
      `--user=${connection.user}`,
      '--single-transaction',
      '--routines',
      '--triggers',
      '--databases',
      connection.database,
      `--result-file=${outputPath}`,
    ];
  }
}

/**
 * SQL Server native backup through sqlcmd. The .bak file is written by the
 * server itself, so outputPath must be reachable from the server host.
 */
export class MSSQLDumper extends CommandLineDumper {
  readonly engine = 'mssql';
  readonly fileExtension = '.bak';
  protected readonly command = 'sqlcmd';
  protected readonly passwordVariable = 'SQLCMDPASSWORD';
  protected readonly dumpFormat = 'native';

  protected buildArgs(connection: ConnectionParams, outputPath: string): string[] {
    const database = connection.database.replace(/]/g, ']]');
    const disk = outputPath.replace(/'/g, "''");
    const name = connection.database.replace(/'/g, "''");
    const query =
      `BACKUP DATABASE [${database}] TO DISK = N'${disk}' ` +
      `WITH FORMAT, INIT, COMPRESSION, NAME = N'${name}-backup'`;

    return ['-S', `${connection.host},${connection.port}`, '-U', connection.user, '-C', '-b', '-Q', query];
  }
}

/**
 * Map an engine tag to its dumper
 */
export function createDumper(engine: DatabaseEngine, logger: Logger): IDatabaseDumper {
  switch (engine) {
    case 'postgres':
      return new PostgresDumper(logger);
    case 'mysql':
    case 'mariadb':
      return new MySQLDumper(logger, engine);
    case 'mssql':
      return new MSSQLDumper(logger);
  }
}

function excerpt(stderr: string): string {
  return stderr.trim().slice(-STDERR_EXCERPT_LENGTH);
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
