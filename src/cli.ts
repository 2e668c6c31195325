/**
 * statement-store command line
 *
 * Commands print JSON to stdout. Failures print a formatErrorResponse
 * payload to stderr and return exit code 1.
 *
 * @module cli
 */

import { DatabaseService } from './services/storage/database/index.js';
import { AppError, formatErrorResponse, validationError } from './errors.js';
import { loadConfig, type AppConfig } from './config.js';

export const USAGE = `Usage: statement-store <command>

Commands:
  init <name> [description]   Create a database
  list                        List databases with row counts
  stats [name]                Print processing statistics
  summary <name> <job-id>     Print an extraction summary
  verify [name]               Verify the database schema
`;

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

const defaultIO: CliIO = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

function printJson(write: (text: string) => void, value: unknown): void {
  write(`${JSON.stringify(value, null, 2)}\n`);
}

function parseJobId(raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw) || Number(raw) < 1) {
    throw validationError(`Job ID must be a positive integer, got "${raw ?? ''}"`, {
      field: 'job-id',
    });
  }
  return Number(raw);
}

function withDatabase<T>(config: AppConfig, name: string | undefined, fn: (db: DatabaseService) => T): T {
  const db = DatabaseService.open(name ?? config.defaultDatabase, config.databasesPath);
  try {
    return fn(db);
  } finally {
    db.close();
  }
}

/**
 * Run one CLI command
 *
 * @returns Process exit code
 */
export function runCli(
  argv: string[],
  io: CliIO = defaultIO,
  env: NodeJS.ProcessEnv = process.env
): number {
  const [command, ...args] = argv;

  if (command === undefined || command === 'help' || command === '--help') {
    io.out(USAGE);
    return command === undefined ? 1 : 0;
  }

  try {
    const config = loadConfig(env);

    switch (command) {
      case 'init': {
        const [name, ...descriptionWords] = args;
        if (name === undefined) {
          throw validationError('init requires a database name', { field: 'name' });
        }
        const description = descriptionWords.length > 0 ? descriptionWords.join(' ') : undefined;
        const db = DatabaseService.create(name, description, config.databasesPath);
        const result = { success: true, name: db.getName(), path: db.getPath() };
        db.close();
        printJson(io.out, result);
        return 0;
      }

      case 'list':
        printJson(io.out, DatabaseService.list(config.databasesPath));
        return 0;

      case 'stats':
        printJson(
          io.out,
          withDatabase(config, args[0], (db) => db.getProcessingStatistics())
        );
        return 0;

      case 'summary': {
        const [name, rawJobId] = args;
        if (name === undefined) {
          throw validationError('summary requires a database name', { field: 'name' });
        }
        const jobId = parseJobId(rawJobId);
        printJson(
          io.out,
          withDatabase(config, name, (db) => db.getExtractionSummary(jobId))
        );
        return 0;
      }

      case 'verify': {
        const result = withDatabase(config, args[0], (db) => db.verify());
        printJson(io.out, result);
        return result.valid ? 0 : 1;
      }

      default:
        io.err(USAGE);
        throw validationError(`Unknown command "${command}"`, { command });
    }
  } catch (error) {
    const appError = AppError.fromUnknown(error);
    console.error(`[cli] ${command} failed: ${appError.category}: ${appError.message}`);
    printJson(io.err, formatErrorResponse(appError));
    return 1;
  }
}
