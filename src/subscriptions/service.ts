/**
 * Subscription service - applies lifecycle transitions through the store.
 *
 * Each operation reads the row, computes the next state and writes it back in
 * a single UPDATE. sql.js runs synchronously, so nothing interleaves between
 * the read and the write.
 */

import { createLogger } from '../utils/logger';
import {
  NotFoundError,
  ValidationError,
  type Cadence,
  type QuietHours,
  type Subscriber,
  type Subscription,
  type SubscriptionStatus,
  type User,
} from '../types';
import * as lifecycle from './lifecycle';
import type { SubscriptionStore } from './store';

const logger = createLogger('subscriptions');

const AUTO_APPROVE_KEY = 'auto_approve';
const PINCODE_RE = /^\d{6}$/;

export function isValidPincode(value: string): boolean {
  return PINCODE_RE.test(value);
}

// =============================================================================
// TYPES
// =============================================================================

export interface SubscriptionServiceOptions {
  trialDays: number;
  defaultApproveDays: number;
  /** Used until an admin toggles auto-approve at runtime */
  autoApprove: boolean;
  /** Product ids users may select */
  products: string[];
}

export interface SetLocationResult {
  location: string;
  autoApproved: boolean;
  subscription: Subscription;
}

export interface SweepResult {
  expired: string[];
  resumed: string[];
}

export interface SubscriptionStats {
  total: number;
  blocked: number;
  byStatus: Record<SubscriptionStatus, number>;
}

export interface SubscriptionService {
  ensureUser(userId: string, username: string | null, now?: Date): User;
  getSubscriber(userId: string): Subscriber;
  setLocation(userId: string, location: string, now?: Date): SetLocationResult;

  trackProduct(userId: string, productId: string, now?: Date): boolean;
  untrackProduct(userId: string, productId: string): boolean;

  approve(userId: string, days?: number, now?: Date): Subscription;
  extend(userId: string, days: number, now?: Date): Subscription;
  block(userId: string): void;
  unblock(userId: string): void;

  setCadence(userId: string, cadence: Cadence): void;
  setQuietHours(userId: string, quiet: QuietHours | null): void;
  pause(userId: string, days: number, now?: Date): Subscription;
  resume(userId: string, now?: Date): Subscription;

  /** Expires overdue subscriptions, then resumes pauses that have run out */
  sweep(now?: Date): SweepResult;

  /** Users who would receive alerts right now */
  eligibleUserIds(now?: Date): string[];

  isAutoApprove(): boolean;
  setAutoApprove(enabled: boolean): void;
  stats(): SubscriptionStats;
}

// =============================================================================
// SERVICE
// =============================================================================

export function createSubscriptionService(
  store: SubscriptionStore,
  options: SubscriptionServiceOptions,
): SubscriptionService {
  const catalog = new Set(options.products);

  function requireUser(userId: string): User {
    const user = store.getUser(userId);
    if (!user) throw new NotFoundError(`Unknown user ${userId}`);
    return user;
  }

  function requireSubscription(userId: string): Subscription {
    const sub = store.getSubscription(userId);
    if (!sub) throw new NotFoundError(`No subscription for user ${userId}`);
    return sub;
  }

  function requireProduct(productId: string): void {
    if (!catalog.has(productId)) {
      throw new ValidationError(`Unknown product: ${productId}`);
    }
  }

  const service: SubscriptionService = {
    ensureUser(userId, username, now = new Date()) {
      const existing = store.getUser(userId);
      if (!existing) return store.insertUser({ id: userId, username }, now);
      if (username !== null && existing.username !== username) {
        store.setUsername(userId, username);
        return { ...existing, username };
      }
      return existing;
    },

    getSubscriber(userId) {
      const subscriber = store.getSubscriber(userId);
      if (!subscriber) throw new NotFoundError(`Unknown user ${userId}`);
      return subscriber;
    },

    setLocation(userId, location, now = new Date()) {
      const pincode = location.trim();
      if (!isValidPincode(pincode)) {
        throw new ValidationError('Pincode must be six digits');
      }
      requireUser(userId);
      store.setLocation(userId, pincode);

      let subscription = requireSubscription(userId);
      let autoApproved = false;
      if (subscription.status === 'trial' && service.isAutoApprove()) {
        subscription = lifecycle.approve(subscription, options.trialDays, now);
        store.saveSubscription(subscription);
        autoApproved = true;
        logger.info({ userId, days: options.trialDays }, 'Trial auto-approved');
      }

      logger.info({ userId, location: pincode }, 'Location set');
      return { location: pincode, autoApproved, subscription };
    },

    trackProduct(userId, productId, now = new Date()) {
      requireProduct(productId);
      requireUser(userId);
      return store.addPreference(userId, productId, now);
    },

    untrackProduct(userId, productId) {
      requireUser(userId);
      return store.removePreference(userId, productId);
    },

    approve(userId, days = options.defaultApproveDays, now = new Date()) {
      const next = lifecycle.approve(requireSubscription(userId), days, now);
      store.saveSubscription(next);
      logger.info({ userId, days, expiresAt: next.expiresAt }, 'Subscription approved');
      return next;
    },

    extend(userId, days, now = new Date()) {
      const next = lifecycle.extend(requireSubscription(userId), days, now);
      store.saveSubscription(next);
      logger.info({ userId, days, expiresAt: next.expiresAt }, 'Subscription extended');
      return next;
    },

    block(userId) {
      requireUser(userId);
      store.setBlocked(userId, true);
      logger.info({ userId }, 'User blocked');
    },

    unblock(userId) {
      requireUser(userId);
      store.setBlocked(userId, false);
      logger.info({ userId }, 'User unblocked');
    },

    setCadence(userId, cadence) {
      requireUser(userId);
      store.setCadence(userId, cadence);
    },

    setQuietHours(userId, quiet) {
      if (quiet) {
        const { start, end } = quiet;
        const inRange = (h: number) => Number.isInteger(h) && h >= 0 && h <= 23;
        if (!inRange(start) || !inRange(end)) {
          throw new ValidationError('Quiet hours must be whole hours between 0 and 23');
        }
        if (start === end) {
          throw new ValidationError('Quiet hours start and end must differ');
        }
      }
      requireUser(userId);
      store.setQuietHours(userId, quiet);
    },

    pause(userId, days, now = new Date()) {
      const user = requireUser(userId);
      const next = lifecycle.pause(requireSubscription(userId), user.blocked, days, now);
      store.saveSubscription(next);
      logger.info({ userId, days, pausedUntil: next.pausedUntil }, 'Alerts paused');
      return next;
    },

    resume(userId, now = new Date()) {
      const next = lifecycle.resume(requireSubscription(userId), now);
      store.saveSubscription(next);
      logger.info({ userId, status: next.status }, 'Alerts resumed');
      return next;
    },

    sweep(now = new Date()) {
      const result: SweepResult = { expired: [], resumed: [] };

      for (const sub of store.listSubscriptionsByStatus('active')) {
        const next = lifecycle.expireIfDue(sub, now);
        if (!next) continue;
        store.saveSubscription(next);
        result.expired.push(sub.userId);
      }

      for (const sub of store.listSubscriptionsByStatus('paused')) {
        const next = lifecycle.resumeIfDue(sub, now);
        if (!next) continue;
        store.saveSubscription(next);
        result.resumed.push(sub.userId);
        // Resuming into a lapsed period counts as an expiry too
        if (next.status === 'expired') result.expired.push(sub.userId);
      }

      if (result.expired.length > 0 || result.resumed.length > 0) {
        logger.info({ expired: result.expired.length, resumed: result.resumed.length }, 'Subscription sweep');
      }
      return result;
    },

    eligibleUserIds(now = new Date()) {
      const ids: string[] = [];
      for (const sub of store.listSubscriptionsByStatus('active')) {
        const user = store.getUser(sub.userId);
        if (user && lifecycle.isEligible(user.blocked, sub, now)) ids.push(sub.userId);
      }
      return ids;
    },

    isAutoApprove() {
      const stored = store.getSetting(AUTO_APPROVE_KEY);
      return stored === null ? options.autoApprove : stored === 'true';
    },

    setAutoApprove(enabled) {
      store.setSetting(AUTO_APPROVE_KEY, enabled ? 'true' : 'false');
      logger.info({ enabled }, 'Auto-approve toggled');
    },

    stats() {
      const byStatus = store.countByStatus();
      const total = byStatus.trial + byStatus.active + byStatus.expired + byStatus.paused;
      return { total, blocked: store.countBlocked(), byStatus };
    },
  };

  return service;
}
