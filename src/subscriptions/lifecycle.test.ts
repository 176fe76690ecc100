import { describe, it, expect } from 'vitest';
import type { Subscription } from '../types';
import { DAY_MS } from '../utils/time';
import {
  LifecycleError,
  approve,
  expireIfDue,
  extend,
  isEligible,
  pause,
  resume,
  resumeIfDue,
} from './lifecycle';

const NOW = new Date('2024-06-01T06:00:00Z');
const at = (days: number) => new Date(NOW.getTime() + days * DAY_MS);

function sub(overrides: Partial<Subscription> = {}): Subscription {
  return {
    userId: 'u1',
    status: 'trial',
    approved: false,
    expiresAt: null,
    pausedUntil: null,
    resumeStatus: null,
    updatedAt: at(-10),
    ...overrides,
  };
}

const active = (expiresInDays = 30) => sub({ status: 'active', approved: true, expiresAt: at(expiresInDays) });

// =============================================================================
// isEligible
// =============================================================================

describe('isEligible', () => {
  it('accepts an approved, unexpired, active subscription', () => {
    expect(isEligible(false, active(), NOW)).toBe(true);
  });

  it('rejects blocked users regardless of status', () => {
    expect(isEligible(true, active(), NOW)).toBe(false);
  });

  it('rejects trial, paused and expired subscriptions', () => {
    expect(isEligible(false, sub(), NOW)).toBe(false);
    expect(isEligible(false, { ...active(), status: 'paused' }, NOW)).toBe(false);
    expect(isEligible(false, { ...active(), status: 'expired' }, NOW)).toBe(false);
  });

  it('rejects an active row whose expiry has passed', () => {
    expect(isEligible(false, active(0), NOW)).toBe(false);
    expect(isEligible(false, active(-1), NOW)).toBe(false);
  });

  it('rejects an active row that was never approved', () => {
    expect(isEligible(false, { ...active(), approved: false }, NOW)).toBe(false);
  });
});

// =============================================================================
// approve / extend
// =============================================================================

describe('approve', () => {
  it('activates a trial for the given number of days', () => {
    const next = approve(sub(), 30, NOW);
    expect(next.status).toBe('active');
    expect(next.approved).toBe(true);
    expect(next.expiresAt).toEqual(at(30));
    expect(next.updatedAt).toEqual(NOW);
  });

  it('reactivates an expired subscription', () => {
    const next = approve({ ...active(-5), status: 'expired' }, 7, NOW);
    expect(next.status).toBe('active');
    expect(next.expiresAt).toEqual(at(7));
  });

  it('keeps a pause running and resumes into the new period', () => {
    const paused = sub({ status: 'paused', pausedUntil: at(3), resumeStatus: 'trial' });
    const next = approve(paused, 30, NOW);
    expect(next.status).toBe('paused');
    expect(next.resumeStatus).toBe('active');
    expect(next.pausedUntil).toEqual(at(3));
  });

  it('rejects non-positive days', () => {
    expect(() => approve(sub(), 0, NOW)).toThrow(LifecycleError);
  });
});

describe('extend', () => {
  it('adds days to a future expiry', () => {
    expect(extend(active(10), 5, NOW).expiresAt).toEqual(at(15));
  });

  it('adds days from now when the expiry already passed', () => {
    expect(extend(active(-3), 5, NOW).expiresAt).toEqual(at(5));
  });

  it('extends a paused subscription that resumes into active', () => {
    const paused = { ...active(10), status: 'paused' as const, resumeStatus: 'active' as const, pausedUntil: at(2) };
    const next = extend(paused, 5, NOW);
    expect(next.status).toBe('paused');
    expect(next.expiresAt).toEqual(at(15));
  });

  it('refuses trial and expired subscriptions', () => {
    expect(() => extend(sub(), 5, NOW)).toThrow(/Only active/);
    try {
      extend({ ...active(), status: 'expired' }, 5, NOW);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(LifecycleError);
      expect(err instanceof LifecycleError && err.code).toBe('not_active');
    }
  });
});

// =============================================================================
// pause / resume
// =============================================================================

describe('pause', () => {
  it('records the prior status and the pause end', () => {
    const next = pause(active(), false, 7, NOW);
    expect(next.status).toBe('paused');
    expect(next.pausedUntil).toEqual(at(7));
    expect(next.resumeStatus).toBe('active');
  });

  it('keeps the original resume status when pausing again', () => {
    const first = pause(active(), false, 2, NOW);
    const second = pause(first, false, 10, at(1));
    expect(second.resumeStatus).toBe('active');
    expect(second.pausedUntil).toEqual(at(11));
  });

  it('enforces the 1..30 day range', () => {
    expect(() => pause(active(), false, 0, NOW)).toThrow(LifecycleError);
    expect(() => pause(active(), false, 31, NOW)).toThrow(LifecycleError);
    expect(pause(active(), false, 30, NOW).pausedUntil).toEqual(at(30));
  });

  it('refuses blocked users', () => {
    expect(() => pause(active(), true, 3, NOW)).toThrow(/Blocked/);
  });
});

describe('resume', () => {
  it('returns to the stored status and clears the pause', () => {
    const next = resume(pause(active(), false, 7, NOW), at(1));
    expect(next.status).toBe('active');
    expect(next.pausedUntil).toBeNull();
    expect(next.resumeStatus).toBeNull();
  });

  it('lands on expired when the active period ran out during the pause', () => {
    const next = resume(pause(active(2), false, 7, NOW), at(3));
    expect(next.status).toBe('expired');
  });

  it('returns a paused trial to trial', () => {
    expect(resume(pause(sub(), false, 3, NOW), at(1)).status).toBe('trial');
  });

  it('refuses subscriptions that are not paused', () => {
    expect(() => resume(active(), NOW)).toThrow(/not paused/);
  });
});

// =============================================================================
// Sweeps
// =============================================================================

describe('expireIfDue', () => {
  it('expires active subscriptions at or past expiry', () => {
    expect(expireIfDue(active(0), NOW)?.status).toBe('expired');
    expect(expireIfDue(active(-1), NOW)?.status).toBe('expired');
  });

  it('leaves unexpired and non-active subscriptions alone', () => {
    expect(expireIfDue(active(1), NOW)).toBeNull();
    expect(expireIfDue(sub(), NOW)).toBeNull();
  });
});

describe('resumeIfDue', () => {
  it('resumes once the pause has run out and not before', () => {
    const paused = pause(active(), false, 7, NOW);
    expect(resumeIfDue(paused, at(3))).toBeNull();
    expect(resumeIfDue(paused, at(7))?.status).toBe('active');
    expect(resumeIfDue(paused, at(8))?.status).toBe('active');
  });

  it('ignores subscriptions that are not paused', () => {
    expect(resumeIfDue(active(), at(100))).toBeNull();
  });
});
