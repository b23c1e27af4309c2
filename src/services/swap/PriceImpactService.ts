import { logger } from '../../utils/logger.js';
import { AnalysisError } from '../../utils/errors.js';
import { isSameAddress } from '../../utils/address.js';
import { formatUsd } from '../../utils/math.js';
import { pancakeSwapClient } from '../external/PancakeSwapClient.js';
import type { PoolProtocol } from '../external/PancakeSwapClient.js';
import { simulatePriceImpact, formatSwapReport } from './SwapSimulator.js';
import type { PoolSnapshot, SwapDirection, SwapResult } from '../../types/pool.js';

// PancakeSwap v3 fee tiers are quoted in hundredths of a basis point
const FEE_TIER_DENOMINATOR = 1_000_000;

export interface PoolSource {
  getPool(chain: string, poolAddress: string, protocol?: PoolProtocol): Promise<PoolSnapshot | null>;
}

export interface PriceImpactServiceOptions {
  poolSource?: PoolSource;
}

export interface PriceImpactResult {
  pool: PoolSnapshot;
  result: SwapResult;
  report: string[];
}

export function resolveDirection(pool: PoolSnapshot, tokenIn: string): SwapDirection {
  if (isSameAddress(tokenIn, pool.base.address)) return 'baseToQuote';
  if (isSameAddress(tokenIn, pool.quote.address)) return 'quoteToBase';

  throw new AnalysisError(
    'UnknownPoolToken',
    `Token ${tokenIn} is neither ${pool.base.symbol} nor ${pool.quote.symbol} in pool ${pool.poolAddress}`
  );
}

export function resolveFeeRate(pool: PoolSnapshot, feeRate?: number): number {
  if (feeRate !== undefined) return feeRate;
  if (pool.feeTier !== undefined) return pool.feeTier / FEE_TIER_DENOMINATOR;

  throw new AnalysisError('InvalidFee', `Pool ${pool.poolAddress} reports no fee tier; pass a fee rate`);
}

/**
 * Price impact of selling `tokenIn` into a live pool
 */
export class PriceImpactService {
  private poolSource: PoolSource;

  constructor(options?: PriceImpactServiceOptions) {
    this.poolSource = options?.poolSource || pancakeSwapClient;
  }

  async calculatePriceImpact(
    chain: string,
    poolAddress: string,
    tokenIn: string,
    amountIn: number,
    feeRate?: number,
    protocol?: PoolProtocol
  ): Promise<PriceImpactResult | null> {
    const pool = await this.poolSource.getPool(chain, poolAddress, protocol);

    if (!pool) {
      return null;
    }

    const direction = resolveDirection(pool, tokenIn);
    const result = simulatePriceImpact(
      { reserveBase: pool.reserveBase, reserveQuote: pool.reserveQuote, feeRate: 0 },
      amountIn,
      direction,
      resolveFeeRate(pool, feeRate)
    );

    const report = formatSwapReport(result, { base: pool.base.symbol, quote: pool.quote.symbol });
    report.splice(2, 0, `TVL: ${formatUsd(pool.tvlUsd)}`);

    logger.info('Price impact simulated', {
      chain,
      poolAddress,
      protocol: protocol ?? 'v3',
      direction,
      amountIn,
      amountOut: result.amountOut,
      priceImpact: `${result.priceImpact.toFixed(6)}%`,
    });
    for (const line of report) {
      logger.debug(line);
    }

    return { pool, result, report };
  }
}

export const priceImpactService = new PriceImpactService();

export default PriceImpactService;
