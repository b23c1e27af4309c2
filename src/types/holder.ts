/**
 * A single holder row as reported by a labeling provider
 */
export interface HolderRecord {
  address: string;
  balance: number;
  entityName?: string;
  entityLabel?: string;
  entityType?: string;
  chain?: string;
}

export type HolderCategory =
  | 'Exchange'
  | 'LockedTeamVesting'
  | 'MarketMaker'
  | 'Burn'
  | 'Unclassified';

/** Categories removed from the float before any share is computed */
export const EXCLUDED_CATEGORIES: ReadonlySet<HolderCategory> = new Set<HolderCategory>([
  'LockedTeamVesting',
  'Burn',
]);

export interface ClassifiedHolder extends HolderRecord {
  category: HolderCategory;
}

export interface CirculatingSupplyContext {
  totalSupply: number;
  lockedSupply: number;
  lockedAddresses: Iterable<string>;
  marketMakerAddresses?: Iterable<string>;
  burnAddresses?: Iterable<string>;
}

export interface RankedHolder extends ClassifiedHolder {
  rank: number;
  share: number;
  flagged: boolean;
}

export interface ConcentrationReport {
  circulatingSupply: number;
  whaleThreshold: number;
  holders: RankedHolder[];
  perHolderShare: Record<string, number>;
  topNShares: Record<number, number>;
  hhi: number;
  flagged: string[];
  excluded: {
    locked: number;
    burn: number;
  };
}

export interface HolderTableRow {
  rank: number;
  address: string;
  entityName: string;
  entityLabel: string;
  category: HolderCategory;
  balance: number;
  share: number;
  flagged: boolean;
}

export interface HolderTables {
  full: HolderTableRow[];
  filtered: HolderTableRow[];
}
