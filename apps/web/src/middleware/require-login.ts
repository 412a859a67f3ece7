import type { RequestHandler } from 'express';
import type { OwnershipPolicy } from '@duetrack/core';

/** Paths reachable without a session */
export const PUBLIC_PATHS: readonly string[] = ['/login', '/logout', '/register', '/health'];

/**
 * Login gate, mounted before the routes. Under the `none` policy every
 * request passes; otherwise only the allow-list passes without a session.
 */
export function requireLogin(policy: OwnershipPolicy, allowList: readonly string[] = PUBLIC_PATHS): RequestHandler {
  return (req, res, next) => {
    if (policy === 'none' || allowList.includes(req.path) || req.session.authenticated) {
      next();
      return;
    }
    res.status(401).json({ error: 'Login required' });
  };
}
