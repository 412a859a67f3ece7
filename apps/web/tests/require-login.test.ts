import { describe, it, expect } from 'vitest';
import express from 'express';
import session from 'express-session';
import request from 'supertest';
import type { OwnershipPolicy } from '@duetrack/core';
import { requireLogin, PUBLIC_PATHS } from '../src/middleware/require-login.js';
import '../src/session.js';

function gatedApp(policy: OwnershipPolicy, allowList?: readonly string[]) {
  const app = express();
  app.use(session({ secret: 'test-secret', resave: false, saveUninitialized: false }));
  app.post('/signin', (req, res) => {
    req.session.authenticated = true;
    res.sendStatus(204);
  });
  app.use(requireLogin(policy, allowList));
  app.use((_req, res) => {
    res.json({ reached: true });
  });
  return app;
}

describe('requireLogin', () => {
  it('passes everything under the none policy', async () => {
    const res = await request(gatedApp('none')).get('/');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ reached: true });
  });

  it('passes allow-listed paths without a session', async () => {
    const app = gatedApp('shared');
    for (const path of PUBLIC_PATHS) {
      const res = await request(app).get(path);
      expect(res.status).toBe(200);
    }
  });

  it('blocks other paths without a session', async () => {
    const res = await request(gatedApp('per-user')).post('/add');
    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: 'Login required' });
  });

  it('honors a custom allow-list', async () => {
    const app = gatedApp('shared', ['/open']);
    expect((await request(app).get('/open')).status).toBe(200);
    expect((await request(app).get('/login')).status).toBe(401);
  });

  it('passes authenticated sessions', async () => {
    const agent = request.agent(gatedApp('shared'));
    await agent.post('/signin').expect(204);
    const res = await agent.get('/');
    expect(res.status).toBe(200);
  });
});
