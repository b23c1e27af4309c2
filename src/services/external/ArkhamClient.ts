import { z } from 'zod';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { cache } from '../../config/redis.js';
import { withRetry } from '../../utils/retry.js';
import { CACHE_TTL } from '../../types/index.js';
import type { HolderRecord } from '../../types/holder.js';
import { buildUrl, getJson } from './http.js';

export interface ArkhamClientOptions {
  apiUrl?: string;
  apiKey?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  cacheTtl?: number;
}

// API response shape for /token/holders
const arkhamHolderSchema = z.object({
  address: z.object({
    address: z.string(),
    chain: z.string().optional(),
    arkhamEntity: z
      .object({
        name: z.string().optional(),
        type: z.string().optional(),
      })
      .nullish(),
    arkhamLabel: z
      .object({
        name: z.string().optional(),
      })
      .nullish(),
  }),
  balance: z.coerce.number(),
  usd: z.number().nullish(),
  pctOfCap: z.number().nullish(),
});

const arkhamHoldersResponseSchema = z.object({
  addressTopHolders: z.record(z.array(arkhamHolderSchema)).nullish(),
});

export type ArkhamHolder = z.infer<typeof arkhamHolderSchema>;

export function toHolderRecord(row: ArkhamHolder, chain: string): HolderRecord {
  return {
    address: row.address.address,
    balance: row.balance,
    entityName: row.address.arkhamEntity?.name,
    entityLabel: row.address.arkhamLabel?.name,
    entityType: row.address.arkhamEntity?.type,
    chain: row.address.chain ?? chain,
  };
}

export class ArkhamClient {
  private apiUrl: string;
  private apiKey: string;
  private maxRetries: number;
  private retryDelayMs: number;
  private cacheTtl: number;
  private static readonly CACHE_PREFIX = 'arkham:holders:';

  constructor(options?: ArkhamClientOptions) {
    this.apiUrl = options?.apiUrl || config.arkham.apiUrl;
    this.apiKey = options?.apiKey || config.arkham.apiKey;
    this.maxRetries = options?.maxRetries || 3;
    this.retryDelayMs = options?.retryDelayMs || 1000;
    this.cacheTtl = options?.cacheTtl || CACHE_TTL.HOLDERS;

    if (!this.apiKey) {
      logger.warn('Arkham API key is not configured');
    }
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  /**
   * Top holders of a token grouped by chain, as returned by the provider
   */
  async getTopHoldersByChain(tokenId: string): Promise<Record<string, ArkhamHolder[]> | null> {
    const url = buildUrl(this.apiUrl, `/token/holders/${encodeURIComponent(tokenId)}`, {
      groupByEntity: 'false',
    });

    return withRetry(async () => {
      const body = await getJson('Arkham', url, { 'API-Key': this.apiKey });

      if (body === null) {
        return null;
      }

      const parsed = arkhamHoldersResponseSchema.parse(body);
      return parsed.addressTopHolders ?? {};
    }, `getTopHoldersByChain(${tokenId})`, {
      maxRetries: this.maxRetries,
      retryDelayMs: this.retryDelayMs,
    });
  }

  /**
   * Labeled holder rows of a token on one chain
   */
  async fetchTokenHolders(tokenId: string, chain: string): Promise<HolderRecord[] | null> {
    const cacheKey = `${ArkhamClient.CACHE_PREFIX}${tokenId}:${chain}`;
    const cached = await cache.get<HolderRecord[]>(cacheKey);

    if (cached) {
      return cached;
    }

    const byChain = await this.getTopHoldersByChain(tokenId);

    if (!byChain) {
      logger.warn('Token not found on Arkham', { tokenId });
      return null;
    }

    const rows = byChain[chain];

    if (!rows) {
      logger.warn('No Arkham holders for chain', {
        tokenId,
        chain,
        availableChains: Object.keys(byChain),
      });
      return [];
    }

    const records = rows.map(row => toHolderRecord(row, chain));

    await cache.set(cacheKey, records, this.cacheTtl);

    logger.debug('Holders fetched from Arkham', {
      tokenId,
      chain,
      count: records.length,
    });

    return records;
  }

  async invalidateCache(tokenId: string, chain: string): Promise<void> {
    await cache.del(`${ArkhamClient.CACHE_PREFIX}${tokenId}:${chain}`);
  }
}

// Export singleton instance
export const arkhamClient = new ArkhamClient();

export default ArkhamClient;
