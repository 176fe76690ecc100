import { describe, it, expect, vi } from 'vitest';
import { buildProductUrl, createHttpOracle, OracleError } from './index';

const NOW = new Date('2024-06-01T06:00:00Z');
const TEMPLATE = 'https://shop.example.com/products/{product}?pincode={location}';

function oracle(fetchImpl: typeof fetch) {
  return createHttpOracle({
    urlTemplate: TEMPLATE,
    soldOutMarker: 'Notify Me',
    timeoutMs: 1000,
    fetchImpl,
    now: () => NOW,
  });
}

describe('buildProductUrl', () => {
  it('fills and encodes both placeholders', () => {
    expect(buildProductUrl(TEMPLATE, 'high protein milk', '411001')).toBe(
      'https://shop.example.com/products/high%20protein%20milk?pincode=411001',
    );
  });
});

describe('createHttpOracle', () => {
  it('reports available when the sold-out marker is absent', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('<button>Add to Cart</button>'));

    await expect(oracle(fetchImpl).check('milk', '411001')).resolves.toEqual({ available: true, observedAt: NOW });
    expect(fetchImpl.mock.calls[0]?.[0]).toBe('https://shop.example.com/products/milk?pincode=411001');
  });

  it('reports unavailable when the page carries the marker', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('<button>Notify Me</button>'));

    await expect(oracle(fetchImpl).check('milk', '411001')).resolves.toEqual({ available: false, observedAt: NOW });
  });

  it('throws OracleError on non-2xx responses', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('busy', { status: 503 }));

    await expect(oracle(fetchImpl).check('milk', '411001')).rejects.toThrow(OracleError);
    await expect(oracle(fetchImpl).check('milk', '411001')).rejects.toThrow(/HTTP 503/);
  });

  it('wraps transport failures', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });

    const err = await oracle(fetchImpl).check('milk', '411001').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(OracleError);
    expect(err instanceof OracleError && err.location).toBe('411001');
    expect(err instanceof Error && err.message).toBe(
      'Fetch failed for https://shop.example.com/products/milk?pincode=411001: fetch failed',
    );
  });
});
