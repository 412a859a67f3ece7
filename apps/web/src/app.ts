import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import session from 'express-session';
import { todayISO } from '@duetrack/core';
import type { AppConfig, TrackerDb } from '@duetrack/core';
import './session.js';
import type { AppContext } from './context.js';
import { createLogger } from './lib/logger.js';
import type { Logger } from './lib/logger.js';
import { requireLogin } from './middleware/require-login.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler } from './middleware/error-handler.js';
import { createAuthRouter } from './routes/auth.js';
import { createTaskRouter } from './routes/tasks.js';

export interface AppOptions {
  readonly config: AppConfig;
  readonly db: TrackerDb;
  readonly logger?: Logger;
  /** Override "today" (tests). Defaults to the local date at request time. */
  readonly today?: () => string;
}

export function createApp(opts: AppOptions): Express {
  const ctx: AppContext = {
    config: opts.config,
    db: opts.db,
    logger: opts.logger ?? createLogger(opts.config.logLevel),
    today: opts.today ?? (() => todayISO()),
  };

  const app = express();
  app.disable('x-powered-by');
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(requestLogger(ctx.logger));
  app.use(session({
    secret: ctx.config.secretKey,
    resave: false,
    saveUninitialized: false,
    cookie: { httpOnly: true, sameSite: 'lax' },
  }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // ================= Login gate, then routes =================
  app.use(requireLogin(ctx.config.ownership));
  app.use(createAuthRouter(ctx));
  app.use(createTaskRouter(ctx));

  app.use(errorHandler(ctx.logger));
  return app;
}
