export interface PoolState {
  reserveBase: number;
  reserveQuote: number;
  feeRate: number;
}

/** Which reserve the input token maps to */
export type SwapDirection = 'baseToQuote' | 'quoteToBase';

export interface PoolReserves {
  base: number;
  quote: number;
}

export interface SwapResult {
  direction: SwapDirection;
  amountIn: number;
  feeRate: number;
  feeAmount: number;
  effectiveAmountIn: number;
  amountOut: number;
  reservesBefore: PoolReserves;
  reservesAfter: PoolReserves;
  kBefore: number;
  kAfter: number;
  spotPriceBefore: number;
  spotPriceAfter: number;
  executionPrice: number;
  effectivePrice: number;
  priceImpact: number;
}

export interface PoolToken {
  address: string;
  symbol: string;
  decimals?: number;
}

/** Pool snapshot as reported by a market-data provider */
export interface PoolSnapshot {
  chain: string;
  poolAddress: string;
  base: PoolToken;
  quote: PoolToken;
  reserveBase: number;
  reserveQuote: number;
  tvlUsd: number;
  feeTier?: number;
}

export interface TokenMarketData {
  address: string;
  platform: string;
  priceUsd: number;
  marketCapUsd: number | null;
  supply: number | null;
}

export interface AssetPlatform {
  id: string;
  chainIdentifier: number | null;
  name: string;
  shortname: string;
}
