import { z } from 'zod';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { cache } from '../../config/redis.js';
import { withRetry } from '../../utils/retry.js';
import { CACHE_TTL } from '../../types/index.js';
import type { PoolSnapshot } from '../../types/pool.js';
import { buildUrl, getJson } from './http.js';

export type PoolProtocol = 'v2' | 'v3' | 'stable';

export interface PancakeSwapClientOptions {
  apiUrl?: string;
  maxRetries?: number;
  retryDelayMs?: number;
}

const poolTokenSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  decimals: z.coerce.number().optional(),
});

// API response shape for /cached/pools/{protocol}/{chain}/{address}
const poolResponseSchema = z.object({
  id: z.string().optional(),
  token0: poolTokenSchema,
  token1: poolTokenSchema,
  tvlToken0: z.coerce.number(),
  tvlToken1: z.coerce.number(),
  tvlUSD: z.coerce.number().default(0),
  feeTier: z.coerce.number().optional(),
});

export class PancakeSwapClient {
  private apiUrl: string;
  private maxRetries: number;
  private retryDelayMs: number;
  private static readonly CACHE_PREFIX = 'pancakeswap:pool:';

  constructor(options?: PancakeSwapClientOptions) {
    this.apiUrl = options?.apiUrl || config.pancakeswap.apiUrl;
    this.maxRetries = options?.maxRetries || 3;
    this.retryDelayMs = options?.retryDelayMs || 1000;
  }

  /**
   * Pool tokens and reserves. token0 is reported as base, token1 as quote.
   */
  async getPool(
    chain: string,
    poolAddress: string,
    protocol: PoolProtocol = 'v3'
  ): Promise<PoolSnapshot | null> {
    const cacheKey = `${PancakeSwapClient.CACHE_PREFIX}${protocol}:${chain}:${poolAddress.toLowerCase()}`;
    const cached = await cache.get<PoolSnapshot>(cacheKey);

    if (cached) {
      return cached;
    }

    const url = buildUrl(
      this.apiUrl,
      `/cached/pools/${protocol}/${encodeURIComponent(chain)}/${encodeURIComponent(poolAddress)}`
    );

    const snapshot = await withRetry(async () => {
      const body = await getJson('PancakeSwap', url);

      if (body === null) {
        return null;
      }

      const pool = poolResponseSchema.parse(body);
      const result: PoolSnapshot = {
        chain,
        poolAddress,
        base: { address: pool.token0.id, symbol: pool.token0.symbol, decimals: pool.token0.decimals },
        quote: { address: pool.token1.id, symbol: pool.token1.symbol, decimals: pool.token1.decimals },
        reserveBase: pool.tvlToken0,
        reserveQuote: pool.tvlToken1,
        tvlUsd: pool.tvlUSD,
        feeTier: pool.feeTier,
      };
      return result;
    }, `getPool(${chain}, ${poolAddress})`, {
      maxRetries: this.maxRetries,
      retryDelayMs: this.retryDelayMs,
    });

    if (!snapshot) {
      logger.warn('Pool not found on PancakeSwap explorer', { chain, poolAddress });
      return null;
    }

    await cache.set(cacheKey, snapshot, CACHE_TTL.POOL_INFO);

    logger.debug('Pool fetched from PancakeSwap explorer', {
      chain,
      poolAddress,
      pair: `${snapshot.base.symbol}/${snapshot.quote.symbol}`,
    });

    return snapshot;
  }
}

// Export singleton instance
export const pancakeSwapClient = new PancakeSwapClient();

export default PancakeSwapClient;
