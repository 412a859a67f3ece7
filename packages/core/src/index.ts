// Types
export * from './types/index.js';

// Schema
export * from './schema/index.js';

// Database
export {
  createDb,
  createTestDb,
  getRawDb,
  migrate,
  hasColumn,
  DEFAULT_DB_PATH,
  CREATE_TABLES_SQL,
  CREATE_INDEXES_SQL,
  COLUMN_MIGRATIONS,
} from './db.js';
export type { TrackerDb } from './db.js';

// Configuration
export { loadConfig, resolveDatabasePath, LOG_LEVELS } from './config.js';
export type { AppConfig, SharedAccount, LogLevel } from './config.js';

// Errors
export { DuetrackError } from './errors.js';
export type { ErrorCode } from './errors.js';

// Parsers
export * from './parsers/index.js';

// Deadlines
export * from './deadlines/index.js';

// Queries
export * from './queries/index.js';

// Auth
export { hashPassword, verifyPassword, safeEqual } from './auth/index.js';
