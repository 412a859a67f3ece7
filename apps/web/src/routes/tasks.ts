import { Router } from 'express';
import type { Response } from 'express';
import {
  addTask, deleteTask, editTask, getDashboard, getScopedTask, getSubjects, setDone,
  scopeFor, describeResult,
} from '@duetrack/core';
import type { TaskResult, TaskScope } from '@duetrack/core';
import type { AppContext } from '../context.js';
import { parseListQuery, parseTaskId } from '../lib/query.js';

export function createTaskRouter(ctx: AppContext): Router {
  const router = Router();

  function resolveScope(userId: number | undefined, res: Response): TaskScope | null {
    const scope = scopeFor(ctx.config.ownership, userId ?? null);
    if (!scope) res.status(401).json({ error: 'Login required' });
    return scope;
  }

  function notFound(res: Response): void {
    res.status(404).json({ error: 'Task not found' });
  }

  /** Mutations answer like the HTML forms did: redirect back to the list */
  function respond(res: Response, result: TaskResult): void {
    switch (result.type) {
      case 'success':
        ctx.logger.debug(result.message);
        res.redirect(303, '/');
        return;
      case 'not-found':
        notFound(res);
        return;
      case 'not-owned':
        ctx.logger.warn(describeResult(result));
        res.redirect(303, '/');
        return;
      case 'invalid':
        res.status(400).json({ error: 'Invalid task', issues: result.issues });
        return;
    }
  }

  router.get('/', (req, res) => {
    const scope = resolveScope(req.session.userId, res);
    if (!scope) return;
    res.json(getDashboard(ctx.db, scope, parseListQuery(req.query), ctx.today()));
  });

  router.get('/subjects', (req, res) => {
    const scope = resolveScope(req.session.userId, res);
    if (!scope) return;
    res.json(getSubjects(ctx.db, scope));
  });

  router.get('/tasks/:id', (req, res) => {
    const scope = resolveScope(req.session.userId, res);
    if (!scope) return;
    const id = parseTaskId(req.params.id);
    if (id == null) return notFound(res);

    const result = getScopedTask(ctx.db, id, scope);
    if (result.type === 'success') res.json(result.task);
    else respond(res, result);
  });

  router.post('/add', (req, res) => {
    const scope = resolveScope(req.session.userId, res);
    if (!scope) return;
    respond(res, addTask(ctx.db, req.body, scope));
  });

  router.post('/edit/:id', (req, res) => {
    const scope = resolveScope(req.session.userId, res);
    if (!scope) return;
    const id = parseTaskId(req.params.id);
    if (id == null) return notFound(res);
    respond(res, editTask(ctx.db, id, req.body, scope));
  });

  router.post('/done/:id', (req, res) => {
    const scope = resolveScope(req.session.userId, res);
    if (!scope) return;
    const id = parseTaskId(req.params.id);
    if (id == null) return notFound(res);
    respond(res, setDone(ctx.db, id, true, scope));
  });

  router.post('/undo/:id', (req, res) => {
    const scope = resolveScope(req.session.userId, res);
    if (!scope) return;
    const id = parseTaskId(req.params.id);
    if (id == null) return notFound(res);
    respond(res, setDone(ctx.db, id, false, scope));
  });

  router.post('/delete/:id', (req, res) => {
    const scope = resolveScope(req.session.userId, res);
    if (!scope) return;
    const id = parseTaskId(req.params.id);
    if (id == null) return notFound(res);
    respond(res, deleteTask(ctx.db, id, scope));
  });

  return router;
}
