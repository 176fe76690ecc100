/**
 * Alert message text. Product ids and pincodes are escaped for Telegram
 * Markdown.
 */

import { escapeMarkdown } from '../channels/base-adapter';
import type { PendingAlert } from '../types';

export function renderInstantAlert(productId: string, location: string): string {
  return `🔔 *${escapeMarkdown(productId)}* is back in stock at ${escapeMarkdown(location)}.`;
}

/**
 * One line per distinct (product, location), in the order the alerts are
 * given (the queue hands them out by product, then detection time).
 */
export function renderDigest(alerts: PendingAlert[]): string {
  const seen = new Set<string>();
  const lines: string[] = [];

  for (const alert of alerts) {
    const key = `${alert.productId}\u0000${alert.location}`;
    if (seen.has(key)) continue;
    seen.add(key);
    lines.push(`• *${escapeMarkdown(alert.productId)}* at ${escapeMarkdown(alert.location)}`);
  }

  const noun = lines.length === 1 ? 'product is' : 'products are';
  return [`🔔 ${lines.length} ${noun} back in stock:`, ...lines].join('\n');
}
