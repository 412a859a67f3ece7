import type { UserId } from './task.js';

/**
 * How tasks are isolated between identities.
 * - none: no login, every task is global
 * - shared: one shared account from configuration, every task is global
 * - per-user: registered users, each sees only their own tasks
 */
export const OWNERSHIP_POLICIES = ['none', 'shared', 'per-user'] as const;

export type OwnershipPolicy = (typeof OWNERSHIP_POLICIES)[number];

/** Owner filter applied to every task query. `global` means no owner column filter. */
export type TaskScope =
  | { readonly kind: 'global' }
  | { readonly kind: 'owner'; readonly userId: UserId };

export const GLOBAL_SCOPE: TaskScope = { kind: 'global' };

export function ownerScope(userId: UserId): TaskScope {
  return { kind: 'owner', userId };
}

/**
 * Resolve the scope for a request given the policy and the session's user.
 * Returns null under per-user when nobody is logged in.
 */
export function scopeFor(policy: OwnershipPolicy, userId: UserId | null): TaskScope | null {
  if (policy !== 'per-user') return GLOBAL_SCOPE;
  return userId != null ? ownerScope(userId) : null;
}
