import { z } from 'zod';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { cache } from '../../config/redis.js';
import { withRetry } from '../../utils/retry.js';
import { CACHE_TTL } from '../../types/index.js';
import type { AssetPlatform, TokenMarketData } from '../../types/pool.js';
import { buildUrl, getJson } from './http.js';

export interface CoinGeckoClientOptions {
  apiUrl?: string;
  apiKey?: string;
  maxRetries?: number;
  retryDelayMs?: number;
}

const assetPlatformsSchema = z.array(
  z.object({
    id: z.string(),
    chain_identifier: z.number().nullish(),
    name: z.string(),
    shortname: z.string().nullish(),
  })
);

const tokenPriceSchema = z.record(
  z.object({
    usd: z.number(),
    usd_market_cap: z.number().nullish(),
  })
);

export class CoinGeckoClient {
  private apiUrl: string;
  private apiKey: string;
  private maxRetries: number;
  private retryDelayMs: number;

  constructor(options?: CoinGeckoClientOptions) {
    this.apiUrl = options?.apiUrl || config.coingecko.apiUrl;
    this.apiKey = options?.apiKey || config.coingecko.apiKey;
    this.maxRetries = options?.maxRetries || 3;
    this.retryDelayMs = options?.retryDelayMs || 1000;

    if (!this.apiKey) {
      logger.warn('CoinGecko API key is not configured');
    }
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  private headers(): Record<string, string> {
    return this.apiKey ? { 'x-cg-api-key': this.apiKey } : {};
  }

  /**
   * Platforms accepted by getTokenData
   */
  async getAssetPlatforms(): Promise<AssetPlatform[]> {
    const cacheKey = 'coingecko:asset_platforms';
    const cached = await cache.get<AssetPlatform[]>(cacheKey);

    if (cached) {
      return cached;
    }

    const platforms = await withRetry(async () => {
      const body = await getJson('CoinGecko', buildUrl(this.apiUrl, '/asset_platforms'), this.headers());
      return assetPlatformsSchema.parse(body ?? []).map<AssetPlatform>(platform => ({
        id: platform.id,
        chainIdentifier: platform.chain_identifier ?? null,
        name: platform.name,
        shortname: platform.shortname ?? '',
      }));
    }, 'getAssetPlatforms', {
      maxRetries: this.maxRetries,
      retryDelayMs: this.retryDelayMs,
    });

    await cache.set(cacheKey, platforms, CACHE_TTL.ASSET_PLATFORMS);
    return platforms;
  }

  /**
   * USD price and market cap of a token; supply is derived from the two
   */
  async getTokenData(tokenAddress: string, platform: string): Promise<TokenMarketData | null> {
    const key = tokenAddress.toLowerCase();
    const cacheKey = `coingecko:token:${platform}:${key}`;
    const cached = await cache.get<TokenMarketData>(cacheKey);

    if (cached) {
      return cached;
    }

    const url = buildUrl(this.apiUrl, `/simple/token_price/${encodeURIComponent(platform)}`, {
      contract_addresses: tokenAddress,
      vs_currencies: 'usd',
      include_market_cap: 'true',
    });

    const data = await withRetry(async () => {
      const body = await getJson('CoinGecko', url, this.headers());
      return body === null ? null : tokenPriceSchema.parse(body);
    }, `getTokenData(${platform}, ${tokenAddress})`, {
      maxRetries: this.maxRetries,
      retryDelayMs: this.retryDelayMs,
    });

    const entry = data?.[key] ?? data?.[tokenAddress];

    if (!entry) {
      logger.warn('Token not listed on CoinGecko', { platform, tokenAddress });
      return null;
    }

    const marketCapUsd = entry.usd_market_cap ?? null;
    const result: TokenMarketData = {
      address: tokenAddress,
      platform,
      priceUsd: entry.usd,
      marketCapUsd,
      supply: marketCapUsd !== null && entry.usd > 0 ? marketCapUsd / entry.usd : null,
    };

    await cache.set(cacheKey, result, CACHE_TTL.TOKEN_PRICE);
    return result;
  }
}

// Export singleton instance
export const coinGeckoClient = new CoinGeckoClient();

export default CoinGeckoClient;
