/**
 * Shared domain types
 */

// =============================================================================
// SUBSCRIPTIONS
// =============================================================================

export type SubscriptionStatus = 'trial' | 'active' | 'expired' | 'paused';

/** Status a paused subscription returns to */
export type UnpausedStatus = Exclude<SubscriptionStatus, 'paused'>;

export const SUBSCRIPTION_STATUSES: readonly SubscriptionStatus[] = ['trial', 'active', 'expired', 'paused'];

export interface User {
  /** Telegram chat id of the user's private chat */
  id: string;
  username: string | null;
  /** Pincode the user wants alerts for */
  location: string | null;
  /** Admin overlay, independent of subscription status */
  blocked: boolean;
  registeredAt: Date;
}

export interface Subscription {
  userId: string;
  status: SubscriptionStatus;
  approved: boolean;
  expiresAt: Date | null;
  pausedUntil: Date | null;
  resumeStatus: UnpausedStatus | null;
  updatedAt: Date;
}

// =============================================================================
// ALERT SETTINGS
// =============================================================================

export type Cadence = 'instant' | 'hourly' | 'daily';

export const CADENCES: readonly Cadence[] = ['instant', 'hourly', 'daily'];

export interface QuietHours {
  /** Hour of day 0-23, inclusive */
  start: number;
  /** Hour of day 0-23, exclusive */
  end: number;
}

export interface AlertSettings {
  userId: string;
  cadence: Cadence;
  quietHours: QuietHours | null;
}

/** Everything the matcher and digest need to know about one user */
export interface Subscriber {
  user: User;
  subscription: Subscription;
  settings: AlertSettings;
  preferences: string[];
}

// =============================================================================
// AVAILABILITY & ALERTS
// =============================================================================

export interface AvailabilityReading {
  productId: string;
  location: string;
  available: boolean;
  observedAt: Date;
}

export interface PendingAlert {
  id: number;
  userId: string;
  productId: string;
  location: string;
  detectedAt: Date;
}

// =============================================================================
// ERRORS
// =============================================================================

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** Input rejected before it reaches the store (bad pincode, unknown product, ...) */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}
