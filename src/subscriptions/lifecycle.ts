/**
 * Subscription lifecycle - pure state transitions.
 *
 * Every function takes the current subscription and returns the next one;
 * persisting it is the store's job. The blocked flag lives on the user and is
 * never changed here.
 */

import type { Subscription, UnpausedStatus } from '../types';
import { addDays } from '../utils/time';

export const MIN_PAUSE_DAYS = 1;
export const MAX_PAUSE_DAYS = 30;

export type LifecycleErrorCode =
  | 'blocked'
  | 'not_active'
  | 'not_paused'
  | 'invalid_days';

export class LifecycleError extends Error {
  readonly code: LifecycleErrorCode;

  constructor(code: LifecycleErrorCode, message: string) {
    super(message);
    this.name = 'LifecycleError';
    this.code = code;
  }
}

function assertPositiveDays(days: number): void {
  if (!Number.isInteger(days) || days < 1) {
    throw new LifecycleError('invalid_days', `Days must be a positive whole number, got ${days}`);
  }
}

// =============================================================================
// ELIGIBILITY
// =============================================================================

export function isEligible(blocked: boolean, sub: Subscription, now: Date): boolean {
  if (blocked) return false;
  if (sub.status !== 'active' || !sub.approved) return false;
  return sub.expiresAt !== null && sub.expiresAt.getTime() > now.getTime();
}

// =============================================================================
// ADMIN TRANSITIONS
// =============================================================================

/**
 * Activates the subscription for `days`. A paused subscription stays paused
 * and resumes into the new active period.
 */
export function approve(sub: Subscription, days: number, now: Date): Subscription {
  assertPositiveDays(days);
  const expiresAt = addDays(now, days);

  if (sub.status === 'paused') {
    return { ...sub, approved: true, expiresAt, resumeStatus: 'active', updatedAt: now };
  }
  return { ...sub, status: 'active', approved: true, expiresAt, updatedAt: now };
}

export function extend(sub: Subscription, days: number, now: Date): Subscription {
  assertPositiveDays(days);
  const underlying = sub.status === 'paused' ? sub.resumeStatus : sub.status;
  if (underlying !== 'active') {
    throw new LifecycleError('not_active', `Only active subscriptions can be extended (status: ${sub.status})`);
  }

  const base = Math.max(now.getTime(), sub.expiresAt?.getTime() ?? 0);
  return { ...sub, expiresAt: addDays(new Date(base), days), updatedAt: now };
}

// =============================================================================
// USER TRANSITIONS
// =============================================================================

export function pause(sub: Subscription, blocked: boolean, days: number, now: Date): Subscription {
  if (blocked) {
    throw new LifecycleError('blocked', 'Blocked users cannot pause alerts');
  }
  if (!Number.isInteger(days) || days < MIN_PAUSE_DAYS || days > MAX_PAUSE_DAYS) {
    throw new LifecycleError(
      'invalid_days',
      `Pause must be between ${MIN_PAUSE_DAYS} and ${MAX_PAUSE_DAYS} days, got ${days}`,
    );
  }

  const resumeStatus: UnpausedStatus = sub.status === 'paused' ? (sub.resumeStatus ?? 'trial') : sub.status;
  return {
    ...sub,
    status: 'paused',
    pausedUntil: addDays(now, days),
    resumeStatus,
    updatedAt: now,
  };
}

export function resume(sub: Subscription, now: Date): Subscription {
  if (sub.status !== 'paused') {
    throw new LifecycleError('not_paused', 'Alerts are not paused');
  }

  let status: UnpausedStatus = sub.resumeStatus ?? 'trial';
  if (status === 'active' && (sub.expiresAt === null || sub.expiresAt.getTime() <= now.getTime())) {
    status = 'expired';
  }
  return { ...sub, status, pausedUntil: null, resumeStatus: null, updatedAt: now };
}

// =============================================================================
// SWEEPS
// =============================================================================

/** Returns the expired subscription, or null when nothing changes */
export function expireIfDue(sub: Subscription, now: Date): Subscription | null {
  if (sub.status !== 'active') return null;
  if (sub.expiresAt !== null && sub.expiresAt.getTime() > now.getTime()) return null;
  return { ...sub, status: 'expired', updatedAt: now };
}

/** Returns the resumed subscription, or null when the pause is still running */
export function resumeIfDue(sub: Subscription, now: Date): Subscription | null {
  if (sub.status !== 'paused') return null;
  if (sub.pausedUntil !== null && sub.pausedUntil.getTime() > now.getTime()) return null;
  return resume(sub, now);
}
