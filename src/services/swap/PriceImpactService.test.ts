import { describe, it, expect, vi } from 'vitest';
import { PriceImpactService, resolveDirection, resolveFeeRate, type PoolSource } from './PriceImpactService.js';
import type { PoolSnapshot } from '../../types/pool.js';

const BASE = '0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa';
const QUOTE = '0xbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb';

const pool: PoolSnapshot = {
  chain: 'bsc',
  poolAddress: '0xcccccccccccccccccccccccccccccccccccccccc',
  base: { address: BASE, symbol: 'AAA', decimals: 18 },
  quote: { address: QUOTE, symbol: 'BBB', decimals: 18 },
  reserveBase: 1000,
  reserveQuote: 1000,
  tvlUsd: 2000,
  feeTier: 2500,
};

function createService(snapshot: PoolSnapshot | null = pool) {
  const poolSource: PoolSource = {
    getPool: vi.fn(async () => snapshot),
  };
  return { poolSource, service: new PriceImpactService({ poolSource }) };
}

describe('PriceImpactService', () => {
  describe('resolveDirection', () => {
    it('should match pool tokens case-insensitively', () => {
      expect(resolveDirection(pool, BASE.toUpperCase().replace('0X', '0x'))).toBe('baseToQuote');
      expect(resolveDirection(pool, QUOTE)).toBe('quoteToBase');
    });

    it('should reject a token outside the pool', () => {
      expect(() => resolveDirection(pool, '0xdddddddddddddddddddddddddddddddddddddddd')).toThrow(
        expect.objectContaining({ code: 'UnknownPoolToken' })
      );
    });
  });

  describe('resolveFeeRate', () => {
    it('should prefer an explicit fee rate', () => {
      expect(resolveFeeRate(pool, 0)).toBe(0);
    });

    it('should fall back to the pool fee tier', () => {
      expect(resolveFeeRate(pool)).toBe(0.0025);
    });

    it('should require a fee when the pool reports none', () => {
      expect(() => resolveFeeRate({ ...pool, feeTier: undefined })).toThrow(
        expect.objectContaining({ code: 'InvalidFee' })
      );
    });
  });

  describe('calculatePriceImpact', () => {
    it('should simulate against the live reserves', async () => {
      const { poolSource, service } = createService();

      const outcome = await service.calculatePriceImpact('bsc', pool.poolAddress, BASE, 1000, 0);

      expect(poolSource.getPool).toHaveBeenCalledWith('bsc', pool.poolAddress, undefined);
      expect(outcome?.result.amountOut).toBe(500);
      expect(outcome?.result.priceImpact).toBe(50);
      expect(outcome?.report).toEqual([
        'Pool: AAA/BBB',
        'Current Price: 1 AAA = 1.000000 BBB',
        'TVL: $2,000.00',
        'Initial Reserves: 1000.000000 AAA / 1000.000000 BBB',
        'New Reserves After Swap: 2000.000000 AAA / 500.000000 BBB',
        'Amount In: 1000.000000 AAA',
        'Fee: 0.000000 AAA (0.00%)',
        'Amount Out: 500.000000 BBB',
        'Trade Price: 1 AAA = 0.500000 BBB',
        'Price Impact: 50.000000%',
      ]);
    });

    it('should use the pool fee tier when no fee is given', async () => {
      const { service } = createService();

      const outcome = await service.calculatePriceImpact('bsc', pool.poolAddress, QUOTE, 10);

      expect(outcome?.result.direction).toBe('quoteToBase');
      expect(outcome?.result.feeRate).toBe(0.0025);
    });

    it('should look the pool up under the requested protocol', async () => {
      const { poolSource, service } = createService();

      await service.calculatePriceImpact('bsc', pool.poolAddress, BASE, 10, 0, 'v2');

      expect(poolSource.getPool).toHaveBeenCalledWith('bsc', pool.poolAddress, 'v2');
    });

    it('should resolve to null for an unknown pool', async () => {
      const { service } = createService(null);

      await expect(service.calculatePriceImpact('bsc', pool.poolAddress, BASE, 1, 0)).resolves.toBeNull();
    });
  });
});
