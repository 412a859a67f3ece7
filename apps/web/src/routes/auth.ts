import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { CredentialsSchema, registerUser, verifySharedAccount, verifyUser, toIssues } from '@duetrack/core';
import type { AppContext } from '../context.js';

const INVALID_LOGIN = 'Invalid username or password';

interface Identity {
  readonly username: string;
  readonly userId: number | null;
}

/** Start a fresh session for the identity, then go to the list */
function startSession(req: Request, res: Response, next: NextFunction, identity: Identity): void {
  req.session.regenerate(err => {
    if (err) {
      next(err);
      return;
    }
    req.session.authenticated = true;
    req.session.username = identity.username;
    if (identity.userId != null) req.session.userId = identity.userId;
    req.session.save(saveErr => {
      if (saveErr) {
        next(saveErr);
        return;
      }
      res.redirect(303, '/');
    });
  });
}

export function createAuthRouter(ctx: AppContext): Router {
  const router = Router();
  const { ownership, sharedAccount } = ctx.config;

  router.get('/login', (req, res) => {
    res.json({
      ownership,
      authenticated: ownership === 'none' || req.session.authenticated === true,
      username: req.session.username ?? null,
    });
  });

  router.post('/login', (req, res, next) => {
    if (ownership === 'none') {
      res.redirect(303, '/');
      return;
    }

    const parsed = CredentialsSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: INVALID_LOGIN, issues: toIssues(parsed.error) });
      return;
    }
    const { username, password } = parsed.data;

    if (ownership === 'shared') {
      if (!sharedAccount || !verifySharedAccount(sharedAccount, username, password)) {
        ctx.logger.warn(`Failed login for '${username}'`);
        res.status(401).json({ error: INVALID_LOGIN });
        return;
      }
      startSession(req, res, next, { username, userId: null });
      return;
    }

    const user = verifyUser(ctx.db, username, password);
    if (!user) {
      ctx.logger.warn(`Failed login for '${username}'`);
      res.status(401).json({ error: INVALID_LOGIN });
      return;
    }
    startSession(req, res, next, { username: user.username, userId: user.id });
  });

  router.post('/logout', (req, res, next) => {
    req.session.destroy(err => {
      if (err) {
        next(err);
        return;
      }
      res.redirect(303, '/login');
    });
  });

  router.post('/register', (req, res) => {
    if (ownership !== 'per-user') {
      res.status(404).json({ error: 'Registration is not available' });
      return;
    }

    const result = registerUser(ctx.db, req.body);
    switch (result.type) {
      case 'success':
        ctx.logger.info(`Registered user ${result.userId}`);
        res.redirect(303, '/login');
        return;
      case 'taken':
        res.status(409).json({ error: 'Username already taken' });
        return;
      case 'invalid':
        res.status(400).json({ error: 'Invalid registration', issues: result.issues });
        return;
    }
  });

  return router;
}
