/**
 * Availability Oracle - answers "is this product in stock at this pincode?"
 *
 * The HTTP oracle fetches the product page for a location and treats the
 * presence of a sold-out marker as unavailable.
 */

import { createLogger } from '../utils/logger';

const logger = createLogger('oracle');

export interface OracleReading {
  available: boolean;
  observedAt: Date;
}

export interface AvailabilityOracle {
  /** Throws OracleError when availability cannot be determined */
  check(productId: string, location: string): Promise<OracleReading>;
}

export class OracleError extends Error {
  readonly productId: string;
  readonly location: string;

  constructor(productId: string, location: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OracleError';
    this.productId = productId;
    this.location = location;
  }
}

export interface HttpOracleOptions {
  /** URL with {product} and optional {location} placeholders */
  urlTemplate: string;
  soldOutMarker: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
  now?: () => Date;
}

export function buildProductUrl(template: string, productId: string, location: string): string {
  return template
    .replaceAll('{product}', encodeURIComponent(productId))
    .replaceAll('{location}', encodeURIComponent(location));
}

export function createHttpOracle(options: HttpOracleOptions): AvailabilityOracle {
  const fetchImpl = options.fetchImpl ?? fetch;
  const now = options.now ?? (() => new Date());

  return {
    async check(productId, location) {
      const url = buildProductUrl(options.urlTemplate, productId, location);

      let body: string;
      try {
        const res = await fetchImpl(url, {
          headers: { Accept: 'text/html', Cookie: `pincode=${location}` },
          signal: AbortSignal.timeout(options.timeoutMs),
        });
        if (!res.ok) {
          throw new OracleError(productId, location, `HTTP ${res.status} for ${url}`);
        }
        body = await res.text();
      } catch (err) {
        if (err instanceof OracleError) throw err;
        const reason = err instanceof Error && err.name === 'TimeoutError'
          ? `timed out after ${options.timeoutMs}ms`
          : err instanceof Error ? err.message : String(err);
        throw new OracleError(productId, location, `Fetch failed for ${url}: ${reason}`, { cause: err });
      }

      const available = !body.includes(options.soldOutMarker);
      logger.debug({ productId, location, available }, 'Availability checked');
      return { available, observedAt: now() };
    },
  };
}
