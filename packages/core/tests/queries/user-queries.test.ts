import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, type TrackerDb } from '../../src/db.js';
import {
  getUserById,
  getUserByUsername,
  registerUser,
  verifySharedAccount,
  verifyUser,
} from '../../src/queries/user-queries.js';

let db: TrackerDb;

beforeEach(() => {
  db = createTestDb();
});

describe('registerUser', () => {
  it('creates a user with a hashed password', () => {
    const r = registerUser(db, { username: ' ana ', password: 'test-secret' });
    expect(r.type).toBe('success');
    if (r.type !== 'success') return;

    const user = getUserById(db, r.userId);
    expect(user?.username).toBe('ana');
    expect(JSON.stringify(user)).not.toContain('test-secret');
  });

  it('rejects a taken username without changing the existing user', () => {
    registerUser(db, { username: 'ana', password: 'test-secret' });
    expect(registerUser(db, { username: 'ana', password: 'other-secret' })).toEqual({ type: 'taken', username: 'ana' });
    expect(verifyUser(db, 'ana', 'test-secret')).not.toBeNull();
    expect(verifyUser(db, 'ana', 'other-secret')).toBeNull();
  });

  it('rejects blank credentials', () => {
    const r = registerUser(db, { username: '  ', password: '' });
    expect(r).toEqual({
      type: 'invalid',
      issues: [
        { field: 'username', message: 'Username is required' },
        { field: 'password', message: 'Password is required' },
      ],
    });
    expect(getUserByUsername(db, '')).toBeNull();
  });
});

describe('verifyUser', () => {
  beforeEach(() => {
    registerUser(db, { username: 'ana', password: 'test-secret' });
  });

  it('returns the user for correct credentials', () => {
    expect(verifyUser(db, 'ana', 'test-secret')?.username).toBe('ana');
  });

  it('returns null for a wrong password or unknown user', () => {
    expect(verifyUser(db, 'ana', 'wrong')).toBeNull();
    expect(verifyUser(db, 'nobody', 'test-secret')).toBeNull();
  });
});

describe('verifySharedAccount', () => {
  const account = { username: 'class', password: 'test-secret' };

  it('accepts the configured pair', () => {
    expect(verifySharedAccount(account, 'class', 'test-secret')).toBe(true);
  });

  it('rejects anything else', () => {
    expect(verifySharedAccount(account, 'class', 'test-secre')).toBe(false);
    expect(verifySharedAccount(account, 'Class', 'test-secret')).toBe(false);
  });
});
