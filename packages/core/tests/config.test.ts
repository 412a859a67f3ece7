import { describe, it, expect } from 'vitest';
import { loadConfig, resolveDatabasePath } from '../src/config.js';
import { DuetrackError } from '../src/errors.js';

describe('resolveDatabasePath', () => {
  it('defaults to tasks.db', () => {
    expect(resolveDatabasePath(undefined)).toBe('tasks.db');
    expect(resolveDatabasePath('')).toBe('tasks.db');
  });

  it('strips the sqlite URL prefix', () => {
    expect(resolveDatabasePath('sqlite:///data/tasks.db')).toBe('data/tasks.db');
    expect(resolveDatabasePath('sqlite:////var/lib/tasks.db')).toBe('/var/lib/tasks.db');
  });

  it('passes plain paths and :memory: through', () => {
    expect(resolveDatabasePath('./local.db')).toBe('./local.db');
    expect(resolveDatabasePath(':memory:')).toBe(':memory:');
  });

  it('rejects other database servers', () => {
    expect(() => resolveDatabasePath('postgres://db.example/tasks')).toThrow(
      "Unsupported database scheme 'postgres', only sqlite is available",
    );
  });
});

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      databasePath: 'tasks.db',
      port: 5000,
      secretKey: 'dev-secret-change-me',
      ownership: 'none',
      sharedAccount: null,
      logLevel: 'info',
    });
  });

  it('reads the shared account under the shared policy', () => {
    const config = loadConfig({
      OWNERSHIP: 'shared',
      SHARED_USERNAME: 'class',
      SHARED_PASSWORD: 'test-secret',
      PORT: '8080',
    });
    expect(config.ownership).toBe('shared');
    expect(config.sharedAccount).toEqual({ username: 'class', password: 'test-secret' });
    expect(config.port).toBe(8080);
  });

  it('requires credentials for the shared policy', () => {
    expect(() => loadConfig({ OWNERSHIP: 'shared' })).toThrow(DuetrackError);
  });

  it('rejects an unknown policy', () => {
    try {
      loadConfig({ OWNERSHIP: 'teams' });
      expect.fail('expected loadConfig to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(DuetrackError);
      expect(err instanceof DuetrackError && err.code).toBe('CONFIG_ERROR');
    }
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});
