import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const store = vi.hoisted(() => new Map<string, unknown>());

vi.mock('../../config/redis.js', () => ({
  cache: {
    get: vi.fn(async (key: string) => store.get(key) ?? null),
    set: vi.fn(async (key: string, value: unknown) => {
      store.set(key, value);
    }),
  },
}));

import { PancakeSwapClient } from './PancakeSwapClient.js';

const POOL = '0xAbCdEf0000000000000000000000000000000001';

const poolBody = {
  id: POOL.toLowerCase(),
  token0: { id: '0x5555555555555555555555555555555555555555', symbol: 'BRT', decimals: '18' },
  token1: { id: '0x55d398326f99059ff775485246999027b3197955', symbol: 'USDT', decimals: 18 },
  tvlToken0: '1749.219988',
  tvlToken1: '26486311.017817',
  tvlUSD: '52972622.03',
  feeTier: '2500',
};

describe('PancakeSwapClient', () => {
  const fetchMock = vi.fn<typeof fetch>();
  let client: PancakeSwapClient;

  beforeEach(() => {
    store.clear();
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    client = new PancakeSwapClient({ apiUrl: 'https://explorer.test/api/', maxRetries: 2, retryDelayMs: 1 });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should map token0 to base and token1 to quote', async () => {
    fetchMock.mockImplementation(async () => new Response(JSON.stringify(poolBody), { status: 200 }));

    const pool = await client.getPool('bsc', POOL);

    expect(pool).toEqual({
      chain: 'bsc',
      poolAddress: POOL,
      base: { address: '0x5555555555555555555555555555555555555555', symbol: 'BRT', decimals: 18 },
      quote: { address: '0x55d398326f99059ff775485246999027b3197955', symbol: 'USDT', decimals: 18 },
      reserveBase: 1749.219988,
      reserveQuote: 26486311.017817,
      tvlUsd: 52972622.03,
      feeTier: 2500,
    });
    expect(fetchMock.mock.calls[0][0]).toBe(`https://explorer.test/api/cached/pools/v3/bsc/${POOL}`);
  });

  it('should use the requested protocol in the path', async () => {
    fetchMock.mockImplementation(async () => new Response(JSON.stringify(poolBody), { status: 200 }));

    await client.getPool('ethereum', POOL, 'v2');

    expect(fetchMock.mock.calls[0][0]).toBe(`https://explorer.test/api/cached/pools/v2/ethereum/${POOL}`);
  });

  it('should return null for an unknown pool', async () => {
    fetchMock.mockImplementation(async () => new Response('', { status: 404 }));

    await expect(client.getPool('bsc', POOL)).resolves.toBeNull();
    expect(store.size).toBe(0);
  });

  it('should cache pools by lowercased address', async () => {
    fetchMock.mockImplementation(async () => new Response(JSON.stringify(poolBody), { status: 200 }));

    await client.getPool('bsc', POOL);
    const again = await client.getPool('bsc', POOL.toLowerCase());

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(again?.reserveQuote).toBe(26486311.017817);
  });
});
