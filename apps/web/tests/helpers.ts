import { createTestDb } from '@duetrack/core';
import type { AppConfig, TrackerDb } from '@duetrack/core';
import type { Express } from 'express';
import { createApp } from '../src/app.js';

export const TODAY = '2024-03-05';

export const SHARED = { username: 'class', password: 'test-secret' } as const;

export function makeApp(overrides: Partial<AppConfig> = {}): { app: Express; db: TrackerDb } {
  const config: AppConfig = {
    databasePath: ':memory:',
    port: 0,
    secretKey: 'test-secret',
    ownership: 'none',
    sharedAccount: null,
    logLevel: 'silent',
    ...overrides,
  };
  const db = createTestDb();
  return { app: createApp({ config, db, today: () => TODAY }), db };
}

export function taskForm(overrides: Record<string, string> = {}): Record<string, string> {
  return {
    title: 'Problem set',
    task_type: 'exercise',
    subject: 'Math',
    due_date: '2024-03-10',
    ...overrides,
  };
}
