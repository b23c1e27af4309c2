/**
 * Mathematical utility functions for concentration and pool calculations
 */

/**
 * Spot price of the input token in output-token terms
 * Based on Constant Product Formula: x * y = k
 */
export function calculateSpotPrice(reserveIn: number, reserveOut: number): number {
  if (reserveIn === 0) return 0;
  return reserveOut / reserveIn;
}

/**
 * Sum of the first n shares of an already ranked list
 */
export function cumulativeShare(rankedShares: readonly number[], n: number): number {
  let sum = 0;
  const limit = Math.min(n, rankedShares.length);
  for (let i = 0; i < limit; i++) {
    sum += rankedShares[i];
  }
  return sum;
}

/**
 * Herfindahl-Hirschman Index on the 0-10,000 scale.
 * Shares are fractions; each is squared as a percentage.
 */
export function herfindahlIndex(shares: readonly number[]): number {
  return shares.reduce((sum, share) => sum + Math.pow(share * 100, 2), 0);
}

/**
 * Format a fraction as a percentage string
 */
export function formatPercent(fraction: number, digits: number = 2): string {
  return `${(fraction * 100).toFixed(digits)}%`;
}

/**
 * Format large numbers with appropriate suffix (K, M, B, T)
 */
export function formatLargeNumber(num: number): string {
  if (num >= 1e12) return `${(num / 1e12).toFixed(2)}T`;
  if (num >= 1e9) return `${(num / 1e9).toFixed(2)}B`;
  if (num >= 1e6) return `${(num / 1e6).toFixed(2)}M`;
  if (num >= 1e3) return `${(num / 1e3).toFixed(2)}K`;
  return num.toFixed(2);
}

/**
 * Format a USD amount with thousands separators
 */
export function formatUsd(amount: number): string {
  return `$${amount.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

/**
 * Sleep utility
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
