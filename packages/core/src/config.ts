/**
 * Process configuration, parsed once from the environment at startup and
 * handed to the app and CLI factories.
 */

import { z } from 'zod';
import { DEFAULT_DB_PATH } from './db.js';
import { DuetrackError } from './errors.js';
import { OWNERSHIP_POLICIES } from './types/scope.js';
import type { OwnershipPolicy } from './types/scope.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
  DATABASE_URL: z.string().trim().optional(),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  SECRET_KEY: z.string().min(1).default('dev-secret-change-me'),
  OWNERSHIP: z.enum(OWNERSHIP_POLICIES).default('none'),
  SHARED_USERNAME: z.string().trim().optional(),
  SHARED_PASSWORD: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface SharedAccount {
  readonly username: string;
  readonly password: string;
}

export interface AppConfig {
  readonly databasePath: string;
  readonly port: number;
  readonly secretKey: string;
  readonly ownership: OwnershipPolicy;
  /** Present only under the shared policy */
  readonly sharedAccount: SharedAccount | null;
  readonly logLevel: LogLevel;
}

const SQLITE_URL_PREFIX = 'sqlite:///';
const URL_SCHEME_RE = /^([a-z][a-z0-9+.-]*):\/\//i;

/**
 * Turn DATABASE_URL into a SQLite file path.
 * Accepts `sqlite:///relative.db`, `sqlite:////abs/path.db`, a bare path or `:memory:`.
 */
export function resolveDatabasePath(url: string | undefined): string {
  if (!url) return DEFAULT_DB_PATH;
  if (url.startsWith(SQLITE_URL_PREFIX)) {
    const path = url.slice(SQLITE_URL_PREFIX.length);
    if (!path) throw DuetrackError.config(`DATABASE_URL has no path: ${url}`);
    return path;
  }
  const scheme = URL_SCHEME_RE.exec(url);
  if (scheme) {
    throw DuetrackError.config(`Unsupported database scheme '${scheme[1]}', only sqlite is available`);
  }
  return url;
}

/** Build the configuration from environment variables */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw DuetrackError.config(`Invalid environment: ${detail}`);
  }

  const e = parsed.data;
  let sharedAccount: SharedAccount | null = null;
  if (e.OWNERSHIP === 'shared') {
    if (!e.SHARED_USERNAME || !e.SHARED_PASSWORD) {
      throw DuetrackError.config('OWNERSHIP=shared needs SHARED_USERNAME and SHARED_PASSWORD');
    }
    sharedAccount = { username: e.SHARED_USERNAME, password: e.SHARED_PASSWORD };
  }

  return Object.freeze({
    databasePath: resolveDatabasePath(e.DATABASE_URL),
    port: e.PORT,
    secretKey: e.SECRET_KEY,
    ownership: e.OWNERSHIP,
    sharedAccount,
    logLevel: e.LOG_LEVEL,
  });
}
