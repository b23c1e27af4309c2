import { AnalysisError } from '../../utils/errors.js';
import { normalizeAddress } from '../../utils/address.js';
import { cumulativeShare, herfindahlIndex } from '../../utils/math.js';
import {
  EXCLUDED_CATEGORIES,
  type CirculatingSupplyContext,
  type ClassifiedHolder,
  type ConcentrationReport,
  type RankedHolder,
} from '../../types/holder.js';
import { DEFAULT_WHALE_THRESHOLD } from '../../types/index.js';

/**
 * Circulating supply = total minus explicitly locked allocations
 */
export function getCirculatingSupply(context: CirculatingSupplyContext): number {
  const { totalSupply, lockedSupply } = context;

  if (!Number.isFinite(totalSupply) || totalSupply <= 0) {
    throw new AnalysisError('InvalidContext', `Total supply must be positive, got ${totalSupply}`);
  }

  if (!Number.isFinite(lockedSupply) || lockedSupply < 0 || lockedSupply > totalSupply) {
    throw new AnalysisError(
      'InvalidContext',
      `Locked supply must be within [0, ${totalSupply}], got ${lockedSupply}`
    );
  }

  const circulatingSupply = totalSupply - lockedSupply;

  if (circulatingSupply <= 0) {
    throw new AnalysisError('InvalidContext', 'Circulating supply must be positive');
  }

  return circulatingSupply;
}

// Balance descending, then normalized address ascending
function compareHolders(
  a: { balance: number; key: string },
  b: { balance: number; key: string }
): number {
  if (b.balance !== a.balance) return b.balance - a.balance;
  if (a.key < b.key) return -1;
  if (a.key > b.key) return 1;
  return 0;
}

function validateParameters(topNs: Iterable<number>, whaleThreshold: number): number[] {
  const cuts = [...new Set(topNs)].sort((a, b) => a - b);

  for (const n of cuts) {
    if (!Number.isInteger(n) || n <= 0) {
      throw new AnalysisError('InvalidContext', `Top-N cut must be a positive integer, got ${n}`);
    }
  }

  if (!Number.isFinite(whaleThreshold) || whaleThreshold <= 0 || whaleThreshold > 1) {
    throw new AnalysisError(
      'InvalidContext',
      `Whale threshold must be within (0, 1], got ${whaleThreshold}`
    );
  }

  return cuts;
}

function validateHolders(classified: readonly ClassifiedHolder[]): void {
  const seen = new Set<string>();

  for (const holder of classified) {
    if (!Number.isFinite(holder.balance) || holder.balance <= 0) {
      throw new AnalysisError(
        'InvalidHolder',
        `Balance of ${holder.address} must be a positive number, got ${holder.balance}`
      );
    }

    const key = normalizeAddress(holder.address);
    if (seen.has(key)) {
      throw new AnalysisError('DuplicateHolder', `Holder ${holder.address} appears more than once`);
    }
    seen.add(key);
  }
}

/**
 * Compute circulating shares, Top-N shares, HHI and whale flags.
 *
 * Locked and burn wallets are dropped before ranking. Exchange and
 * market-maker wallets stay in the ranking and can be flagged.
 */
export function analyze(
  classified: readonly ClassifiedHolder[],
  context: CirculatingSupplyContext,
  topNs: Iterable<number>,
  whaleThreshold: number = DEFAULT_WHALE_THRESHOLD
): ConcentrationReport {
  const circulatingSupply = getCirculatingSupply(context);
  const cuts = validateParameters(topNs, whaleThreshold);
  validateHolders(classified);

  const included = classified.filter(holder => !EXCLUDED_CATEGORIES.has(holder.category));

  if (included.length === 0) {
    throw new AnalysisError('EmptyInput', 'No circulating holders left after exclusions');
  }

  const ranked: RankedHolder[] = included
    .map(holder => ({ holder, key: normalizeAddress(holder.address), balance: holder.balance }))
    .sort(compareHolders)
    .map(({ holder }, index) => {
      const share = holder.balance / circulatingSupply;
      return {
        ...holder,
        rank: index + 1,
        share,
        flagged: share > whaleThreshold,
      };
    });

  const shares = ranked.map(holder => holder.share);

  const perHolderShare: Record<string, number> = {};
  for (const holder of ranked) {
    perHolderShare[holder.address] = holder.share;
  }

  const topNShares: Record<number, number> = {};
  for (const n of cuts) {
    topNShares[n] = cumulativeShare(shares, n);
  }

  return {
    circulatingSupply,
    whaleThreshold,
    holders: ranked,
    perHolderShare,
    topNShares,
    hhi: herfindahlIndex(shares),
    flagged: ranked.filter(holder => holder.flagged).map(holder => holder.address),
    excluded: {
      locked: classified.filter(holder => holder.category === 'LockedTeamVesting').length,
      burn: classified.filter(holder => holder.category === 'Burn').length,
    },
  };
}
