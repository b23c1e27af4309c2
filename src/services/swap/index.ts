// Constant-product swap simulation
export {
  simulatePriceImpact,
  quoteExactOutput,
  applySwap,
  reverseDirection,
  formatSwapReport,
} from './SwapSimulator.js';
export type { SwapReportSymbols } from './SwapSimulator.js';

export {
  PriceImpactService,
  priceImpactService,
  resolveDirection,
  resolveFeeRate,
} from './PriceImpactService.js';
export type { PoolSource, PriceImpactResult, PriceImpactServiceOptions } from './PriceImpactService.js';
