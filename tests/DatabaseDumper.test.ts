import { EventEmitter } from 'events';
import { spawn, ChildProcess } from 'child_process';
import { promises as fs, Stats } from 'fs';
import {
  createDumper,
  DumpError,
  MSSQLDumper,
  MySQLDumper,
  PostgresDumper,
  validateConnectionParams,
} from '../src/clients/DatabaseDumper';
import { ConnectionParams, DatabaseEngine } from '../src/interfaces/DatabaseDumper';
import { createMockLogger } from './helpers/mockLogger';

jest.mock('child_process');
jest.mock('fs', () => {
  const actual = jest.requireActual<typeof import('fs')>('fs');
  return {
    ...actual,
    promises: {
      ...actual.promises,
      mkdir: jest.fn(),
      stat: jest.fn(),
    },
  };
});

const mockSpawn = spawn as jest.MockedFunction<typeof spawn>;
const mockFs = fs as jest.Mocked<typeof fs>;

interface FakeProcess extends EventEmitter {
  stdout: EventEmitter;
  stderr: EventEmitter;
}

/**
 * Make the next spawn return a process that writes stderr then exits with code
 */
function mockProcessExit(code: number, stderr = ''): void {
  mockSpawn.mockImplementation(() => {
    const child: FakeProcess = Object.assign(new EventEmitter(), {
      stdout: new EventEmitter(),
      stderr: new EventEmitter(),
    });
    setImmediate(() => {
      if (stderr) {
        child.stderr.emit('data', Buffer.from(stderr));
      }
      child.emit('close', code);
    });
    return child as unknown as ChildProcess;
  });
}

function mockSpawnFailure(error: NodeJS.ErrnoException): void {
  mockSpawn.mockImplementation(() => {
    const child: FakeProcess = Object.assign(new EventEmitter(), {
      stdout: new EventEmitter(),
      stderr: new EventEmitter(),
    });
    setImmediate(() => child.emit('error', error));
    return child as unknown as ChildProcess;
  });
}

describe('DatabaseDumper', () => {
  const connection: ConnectionParams = {
    host: 'db.internal',
    port: 5432,
    user: 'backup',
    password: 'test-password',
    database: 'orders',
  };
  const outputPath = '/tmp/backups/backup_orders_20240310_235800.sql';
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    jest.clearAllMocks();
    logger = createMockLogger();
    mockFs.mkdir.mockResolvedValue(undefined);
    mockFs.stat.mockResolvedValue({ size: 2048 } as Stats);
  });

  describe('PostgresDumper', () => {
    it('should run pg_dump in custom format and return the file details', async () => {
      mockProcessExit(0);
      const dumper = new PostgresDumper(logger);

      const result = await dumper.dump(connection, outputPath);

      expect(result).toEqual({
        filePath: outputPath,
        fileSize: 2048,
        metadata: { 'dump-format': 'custom' },
      });
      expect(mockFs.mkdir).toHaveBeenCalledWith('/tmp/backups', { recursive: true });
      expect(mockSpawn).toHaveBeenCalledWith(
        'pg_dump',
        ['-h', 'db.internal', '-p', '5432', '-U', 'backup', '-F', 'c', '-b', '-v', '-f', outputPath, 'orders'],
        expect.objectContaining({
          stdio: ['ignore', 'pipe', 'pipe'],
          env: expect.objectContaining({ PGPASSWORD: 'test-password' }),
        })
      );
    });

    it('should never put the password on the command line', async () => {
      mockProcessExit(0);

      await new PostgresDumper(logger).dump(connection, outputPath);

      const args = mockSpawn.mock.calls[0][1];
      expect(args).not.toContain('test-password');
      expect(logger.info).toHaveBeenCalledWith('Executing pg_dump', {
        engine: 'postgres',
        databaseName: 'orders',
        commandLine: `pg_dump -h db.internal -p 5432 -U backup -F c -b -v -f ${outputPath} orders`,
      });
    });
  });

  describe('MySQLDumper', () => {
    it('should run mysqldump with the password in MYSQL_PWD', async () => {
      mockProcessExit(0);
      const dumper = new MySQLDumper(logger, 'mysql');

      const result = await dumper.dump({ ...connection, port: 3306 }, outputPath);

      expect(result.metadata).toEqual({ 'dump-format': 'plain' });
      expect(mockSpawn).toHaveBeenCalledWith(
        'mysqldump',
        [
          '--host=db.internal',
          '--port=3306',
          '--user=backup',
          '--single-transaction',
          '--routines',
          '--triggers',
          '--databases',
          'orders',
          `--result-file=${outputPath}`,
        ],
        expect.objectContaining({ env: expect.objectContaining({ MYSQL_PWD: 'test-password' }) })
      );
    });

    it('should keep the mariadb tag', () => {
      expect(new MySQLDumper(logger, 'mariadb').engine).toBe('mariadb');
    });
  });

  describe('MSSQLDumper', () => {
    it('should issue BACKUP DATABASE through sqlcmd', async () => {
      mockProcessExit(0);
      const bakPath = '/var/opt/mssql/backup/backup_orders_20240310_235800.bak';

      const result = await new MSSQLDumper(logger).dump({ ...connection, port: 1433 }, bakPath);

      expect(result.metadata).toEqual({ 'dump-format': 'native' });
      expect(mockSpawn).toHaveBeenCalledWith(
        'sqlcmd',
        [
          '-S',
          'db.internal,1433',
          '-U',
          'backup',
          '-C',
          '-b',
          '-Q',
          `BACKUP DATABASE [orders] TO DISK = N'${bakPath}' WITH FORMAT, INIT, COMPRESSION, NAME = N'orders-backup'`,
        ],
        expect.objectContaining({ env: expect.objectContaining({ SQLCMDPASSWORD: 'test-password' }) })
      );
    });

    it('should escape brackets and quotes in the backup statement', async () => {
      mockProcessExit(0);

      await new MSSQLDumper(logger).dump({ ...connection, database: "o'rders]x" }, '/tmp/a.bak');

      const args = mockSpawn.mock.calls[0][1];
      expect(args[args.length - 1]).toBe(
        "BACKUP DATABASE [o'rders]]x] TO DISK = N'/tmp/a.bak' WITH FORMAT, INIT, COMPRESSION, NAME = N'o''rders]x-backup'"
      );
    });
  });

  describe('every engine', () => {
    it.each<[DatabaseEngine, string, string, string]>([
      ['postgres', 'pg_dump', '.sql', 'custom'],
      ['mysql', 'mysqldump', '.sql', 'plain'],
      ['mariadb', 'mysqldump', '.sql', 'plain'],
      ['mssql', 'sqlcmd', '.bak', 'native'],
    ])('%s should produce a non-empty %s file', async (engine, command, extension, format) => {
      mockProcessExit(0);
      const dumper = createDumper(engine, logger);
      const path = `/tmp/backup_orders_20240310_235800${dumper.fileExtension}`;

      const result = await dumper.dump(connection, path);

      expect(dumper.engine).toBe(engine);
      expect(dumper.fileExtension).toBe(extension);
      expect(mockSpawn.mock.calls[0][0]).toBe(command);
      expect(result.fileSize).toBeGreaterThan(0);
      expect(result.filePath.endsWith(extension)).toBe(true);
      expect(result.metadata['dump-format']).toBe(format);
    });

    it.each<DatabaseEngine>(['postgres', 'mysql', 'mariadb', 'mssql'])(
      '%s should raise DumpError on a non-zero exit',
      async engine => {
        mockProcessExit(2, 'fatal: connection refused\n');
        const dumper = createDumper(engine, logger);

        const error = await dumper.dump(connection, outputPath).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(DumpError);
        expect(error).toMatchObject({
          engine,
          exitCode: 2,
          stderrExcerpt: 'fatal: connection refused',
        });
      }
    );
  });

  describe('failures', () => {
    it('should include the exit code and stderr in the message', async () => {
      mockProcessExit(1, 'pg_dump: error: password authentication failed');

      await expect(new PostgresDumper(logger).dump(connection, outputPath)).rejects.toThrow(
        'pg_dump failed with exit code 1: pg_dump: error: password authentication failed'
      );
    });

    it('should keep only the last 500 characters of stderr', async () => {
      mockProcessExit(1, `${'x'.repeat(1000)}END`);

      const error = await new PostgresDumper(logger).dump(connection, outputPath).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DumpError);
      if (error instanceof DumpError) {
        expect(error.stderrExcerpt).toHaveLength(500);
        expect(error.stderrExcerpt.endsWith('END')).toBe(true);
      }
    });

    it('should report a missing dump tool', async () => {
      const notFound: NodeJS.ErrnoException = Object.assign(new Error('spawn pg_dump ENOENT'), { code: 'ENOENT' });
      mockSpawnFailure(notFound);

      const error = await new PostgresDumper(logger).dump(connection, outputPath).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DumpError);
      expect(error).toMatchObject({
        exitCode: null,
        message: 'pg_dump command not found. Please ensure the postgres client tools are installed.',
      });
    });

    it('should treat an empty file after a zero exit as a failure', async () => {
      mockProcessExit(0);
      mockFs.stat.mockResolvedValue({ size: 0 } as Stats);

      await expect(new PostgresDumper(logger).dump(connection, outputPath)).rejects.toThrow(
        `pg_dump produced no data: ${outputPath} is empty`
      );
    });

    it('should fail when no file was written', async () => {
      mockProcessExit(0);
      mockFs.stat.mockRejectedValue(Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' }));

      await expect(new PostgresDumper(logger).dump(connection, outputPath)).rejects.toBeInstanceOf(DumpError);
    });

    it('should reject invalid connection parameters without spawning', async () => {
      await expect(
        new PostgresDumper(logger).dump({ ...connection, host: '', port: 0 }, outputPath)
      ).rejects.toThrow('Invalid connection parameters: host must not be empty; port must be a positive integer');
      expect(mockSpawn).not.toHaveBeenCalled();
    });
  });

  describe('validateConnectionParams', () => {
    it('should accept complete parameters', () => {
      expect(validateConnectionParams(connection)).toEqual([]);
    });

    it('should report every problem', () => {
      expect(
        validateConnectionParams({ host: ' ', port: 1.5, user: '', password: 'p', database: '' })
      ).toEqual([
        'host must not be empty',
        'user must not be empty',
        'database must not be empty',
        'port must be a positive integer',
      ]);
    });
  });
});
