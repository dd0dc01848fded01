import { spawn, type SpawnOptions } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';

import { createChildLogger } from '../../utils/logger.js';
import { SubprocessError } from './errors.js';
import type { CellValue, TableRow, TableSpec } from './schema.js';
import type { BulkLoader } from './bulkLoader.js';

const logger = createChildLogger({ service: 'Sqlite3CliBulkLoader' });

const NEEDS_QUOTING = /[",\r\n]/;

export function csvField(value: CellValue): string {
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(rows: readonly TableRow[]): string {
  return rows.map((row) => `${row.map(csvField).join(',')}\n`).join('');
}

export interface Sqlite3CliBulkLoaderOptions {
  binary?: string;
}

/** The parts of a child process the import relies on */
export interface ImportProcess {
  stdin: Writable | null;
  stderr: Readable | null;
  on(event: 'error', listener: (error: Error) => void): this;
  on(event: 'close', listener: (exitCode: number | null) => void): this;
}

export interface Sqlite3CliDependencies {
  spawn: (command: string, args: string[], options: SpawnOptions) => ImportProcess;
}

/**
 * Pipes CSV into `sqlite3 -csv <db> ".import '|cat -' <table>"`. The target
 * table already exists, so every CSV line is imported as data. sqlite3 reads
 * through `cat` because Node's stdin pipe is a socket that sqlite3 cannot
 * open by path.
 */
export class Sqlite3CliBulkLoader implements BulkLoader {
  readonly kind = 'sqlite3' as const;
  private readonly binary: string;
  private readonly deps: Sqlite3CliDependencies;

  constructor(options: Sqlite3CliBulkLoaderOptions = {}, deps?: Partial<Sqlite3CliDependencies>) {
    this.binary = options.binary ?? 'sqlite3';
    this.deps = {
      spawn: (command, args, options) => spawn(command, args, options),
      ...deps,
    };
  }

  load(dbPath: string, table: TableSpec, rows: readonly TableRow[]): Promise<void> {
    const args = ['-csv', dbPath, `.import '|cat -' ${table.name}`];
    const command = [this.binary, ...args].join(' ');
    const data = toCsv(rows);

    logger.debug({ command, rows: rows.length, bytes: data.length }, 'Starting bulk import');

    return new Promise<void>((resolve, reject) => {
      const child = this.deps.spawn(this.binary, args, { stdio: ['pipe', 'ignore', 'pipe'] });
      let stderr = '';
      let settled = false;

      const fail = (error: SubprocessError) => {
        if (!settled) {
          settled = true;
          reject(error);
        }
      };

      child.stderr?.setEncoding('utf8');
      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', (error: Error) => {
        fail(new SubprocessError(`Failed to start ${this.binary}: ${error.message}`, command));
      });

      child.on('close', (exitCode: number | null) => {
        if (exitCode !== 0) {
          fail(
            new SubprocessError(
              `${this.binary} exited with code ${exitCode} while importing ${table.name}`,
              command,
              exitCode,
              stderr.trim(),
            ),
          );
          return;
        }
        if (!settled) {
          settled = true;
          logger.debug({ table: table.name, rows: rows.length }, 'Bulk import finished');
          resolve();
        }
      });

      // EPIPE after an early exit is reported through 'close'
      child.stdin?.on('error', (error) => {
        logger.debug({ err: error }, 'stdin of bulk import closed early');
      });
      child.stdin?.end(data);
    });
  }
}
