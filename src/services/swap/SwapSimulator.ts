import { AnalysisError } from '../../utils/errors.js';
import { calculateSpotPrice } from '../../utils/math.js';
import type { PoolReserves, PoolState, SwapDirection, SwapResult } from '../../types/pool.js';

interface OrientedReserves {
  reserveIn: number;
  reserveOut: number;
}

export interface SwapReportSymbols {
  base: string;
  quote: string;
}

function validatePool(pool: PoolState): void {
  const { reserveBase, reserveQuote } = pool;
  if (!Number.isFinite(reserveBase) || !Number.isFinite(reserveQuote) || reserveBase <= 0 || reserveQuote <= 0) {
    throw new AnalysisError(
      'InvalidReserves',
      `Pool reserves must be positive, got ${reserveBase} / ${reserveQuote}`
    );
  }
}

function validateFee(feeRate: number): void {
  if (!Number.isFinite(feeRate) || feeRate < 0 || feeRate >= 1) {
    throw new AnalysisError('InvalidFee', `Fee rate must be within [0, 1), got ${feeRate}`);
  }
}

function validateAmount(amount: number, label: string): void {
  if (!Number.isFinite(amount) || amount <= 0) {
    throw new AnalysisError('InvalidAmount', `${label} must be positive, got ${amount}`);
  }
}

function orient(pool: PoolState, direction: SwapDirection): OrientedReserves {
  return direction === 'baseToQuote'
    ? { reserveIn: pool.reserveBase, reserveOut: pool.reserveQuote }
    : { reserveIn: pool.reserveQuote, reserveOut: pool.reserveBase };
}

function toPoolReserves(direction: SwapDirection, reserveIn: number, reserveOut: number): PoolReserves {
  return direction === 'baseToQuote'
    ? { base: reserveIn, quote: reserveOut }
    : { base: reserveOut, quote: reserveIn };
}

export function reverseDirection(direction: SwapDirection): SwapDirection {
  return direction === 'baseToQuote' ? 'quoteToBase' : 'baseToQuote';
}

/**
 * Simulate an exact-input swap against a constant-product pool.
 *
 * The fee is taken from the input before the invariant is applied; only the
 * fee-adjusted input enters the pool, so k is unchanged. Price impact is in
 * percent and measures curve slippage on the fee-adjusted input against the
 * pre-trade spot price.
 */
export function simulatePriceImpact(
  pool: PoolState,
  amountIn: number,
  direction: SwapDirection,
  feeRate: number = pool.feeRate
): SwapResult {
  validatePool(pool);
  validateAmount(amountIn, 'Amount in');
  validateFee(feeRate);

  const { reserveIn, reserveOut } = orient(pool, direction);

  const effectiveAmountIn = amountIn * (1 - feeRate);
  const kBefore = reserveIn * reserveOut;
  const newReserveOut = kBefore / (reserveIn + effectiveAmountIn);
  const amountOut = reserveOut - newReserveOut;

  // 0 < amountOut < reserveOut holds exactly in real arithmetic; reject trades
  // that double precision cannot represent on either side.
  if (!(amountOut > 0) || !(amountOut < reserveOut)) {
    throw new AnalysisError(
      'InvalidAmount',
      `Amount in ${amountIn} is outside the range this pool can price`
    );
  }

  const newReserveIn = reserveIn + effectiveAmountIn;
  const spotPriceBefore = calculateSpotPrice(reserveIn, reserveOut);
  const effectivePrice = amountOut / effectiveAmountIn;

  return {
    direction,
    amountIn,
    feeRate,
    feeAmount: amountIn - effectiveAmountIn,
    effectiveAmountIn,
    amountOut,
    reservesBefore: toPoolReserves(direction, reserveIn, reserveOut),
    reservesAfter: toPoolReserves(direction, newReserveIn, newReserveOut),
    kBefore,
    kAfter: newReserveIn * newReserveOut,
    spotPriceBefore,
    spotPriceAfter: calculateSpotPrice(newReserveIn, newReserveOut),
    executionPrice: amountOut / amountIn,
    effectivePrice,
    priceImpact: (1 - effectivePrice / spotPriceBefore) * 100,
  };
}

/**
 * Input required to receive exactly `amountOut` from the pool
 */
export function quoteExactOutput(
  pool: PoolState,
  amountOut: number,
  direction: SwapDirection,
  feeRate: number = pool.feeRate
): number {
  validatePool(pool);
  validateAmount(amountOut, 'Amount out');
  validateFee(feeRate);

  const { reserveIn, reserveOut } = orient(pool, direction);

  if (amountOut >= reserveOut) {
    throw new AnalysisError(
      'InsufficientLiquidity',
      `Requested ${amountOut} but the pool only holds ${reserveOut}`
    );
  }

  const effectiveIn = (reserveIn * amountOut) / (reserveOut - amountOut);
  return effectiveIn / (1 - feeRate);
}

/**
 * Pool state after a simulated swap, keeping the fee rate
 */
export function applySwap(pool: PoolState, result: SwapResult): PoolState {
  return {
    reserveBase: result.reservesAfter.base,
    reserveQuote: result.reservesAfter.quote,
    feeRate: pool.feeRate,
  };
}

/**
 * Human-readable summary of a simulated swap
 */
export function formatSwapReport(result: SwapResult, symbols: SwapReportSymbols): string[] {
  const inSymbol = result.direction === 'baseToQuote' ? symbols.base : symbols.quote;
  const outSymbol = result.direction === 'baseToQuote' ? symbols.quote : symbols.base;
  const { reservesBefore: before, reservesAfter: after } = result;

  return [
    `Pool: ${symbols.base}/${symbols.quote}`,
    `Current Price: 1 ${inSymbol} = ${result.spotPriceBefore.toFixed(6)} ${outSymbol}`,
    `Initial Reserves: ${before.base.toFixed(6)} ${symbols.base} / ${before.quote.toFixed(6)} ${symbols.quote}`,
    `New Reserves After Swap: ${after.base.toFixed(6)} ${symbols.base} / ${after.quote.toFixed(6)} ${symbols.quote}`,
    `Amount In: ${result.amountIn.toFixed(6)} ${inSymbol}`,
    `Fee: ${result.feeAmount.toFixed(6)} ${inSymbol} (${(result.feeRate * 100).toFixed(2)}%)`,
    `Amount Out: ${result.amountOut.toFixed(6)} ${outSymbol}`,
    `Trade Price: 1 ${inSymbol} = ${result.effectivePrice.toFixed(6)} ${outSymbol}`,
    `Price Impact: ${result.priceImpact.toFixed(6)}%`,
  ];
}
