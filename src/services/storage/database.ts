/**
 * DatabaseService facade
 *
 * Implementations live in src/services/storage/database/.
 *
 * Security: all SQL uses parameterized queries via db.prepare()
 * Performance: WAL mode, indexes on every foreign key
 * Permissions: database files are created with mode 0o600
 */

export type { DatabaseInfo, PaginationOptions, RecordCounts } from './database/index.js';
export {
  DatabaseErrorCode,
  DatabaseError,
  MigrationError,
  DatabaseService,
} from './database/index.js';
