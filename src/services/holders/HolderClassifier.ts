import { config } from '../../config/index.js';
import { BURN_ADDRESSES, normalizeAddress, toAddressSet } from '../../utils/address.js';
import type {
  CirculatingSupplyContext,
  ClassifiedHolder,
  HolderCategory,
  HolderRecord,
} from '../../types/holder.js';

export type HolderPredicate = (record: HolderRecord) => boolean;

export interface ClassificationRule {
  name: string;
  category: HolderCategory;
  predicate: HolderPredicate;
}

export interface ClassifierOptions {
  /** Provider entity types that mark an exchange wallet */
  exchangeEntityTypes?: Iterable<string>;
  /** Label/name patterns that mark an exchange wallet */
  exchangeLabelPatterns?: readonly RegExp[];
  /** Extra rules evaluated after the built-in address rules, before the exchange rule */
  extraRules?: readonly ClassificationRule[];
}

// Sub-labels providers attach to exchange-operated wallets
const EXCHANGE_WALLET_LABELS = ['hot wallet', 'cold wallet', 'deposit', 'withdrawal'];

// Exchange brands seen in entity names when the provider sets no type
const EXCHANGE_BRANDS = [
  'binance',
  'coinbase',
  'okx',
  'bybit',
  'kraken',
  'kucoin',
  'gate.io',
  'bitget',
  'htx',
  'huobi',
  'mexc',
  'crypto.com',
  'upbit',
  'bithumb',
  'bitfinex',
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export const DEFAULT_EXCHANGE_PATTERNS: readonly RegExp[] = [
  ...EXCHANGE_WALLET_LABELS.map(label => new RegExp(escapeRegExp(label), 'i')),
  ...EXCHANGE_BRANDS.map(brand => new RegExp(`\\b${escapeRegExp(brand)}\\b`, 'i')),
];

export function addressInSet(addresses: Iterable<string> | undefined): HolderPredicate {
  const set = toAddressSet(addresses);
  return (record) => set.has(normalizeAddress(record.address));
}

export function entityTypeIn(types: Iterable<string>): HolderPredicate {
  const set = new Set([...types].map(t => t.trim().toLowerCase()));
  return (record) => record.entityType !== undefined && set.has(record.entityType.toLowerCase());
}

export function labelMatches(patterns: readonly RegExp[]): HolderPredicate {
  return (record) => {
    const texts = [record.entityLabel, record.entityName].filter(
      (text): text is string => text !== undefined
    );
    return texts.some(text => patterns.some(pattern => pattern.test(text)));
  };
}

export function anyOf(...predicates: HolderPredicate[]): HolderPredicate {
  return (record) => predicates.some(predicate => predicate(record));
}

/**
 * Build the ordered rule list for a context. First match wins, so locked
 * wallets outrank every label-based rule.
 */
export function buildRules(
  context: CirculatingSupplyContext,
  options: ClassifierOptions = {}
): ClassificationRule[] {
  const exchangeTypes = options.exchangeEntityTypes ?? config.analysis.exchangeEntityTypes;
  const exchangePatterns = options.exchangeLabelPatterns ?? DEFAULT_EXCHANGE_PATTERNS;

  return [
    {
      name: 'locked-address',
      category: 'LockedTeamVesting',
      predicate: addressInSet(context.lockedAddresses),
    },
    {
      name: 'burn-address',
      category: 'Burn',
      predicate: addressInSet(context.burnAddresses ?? BURN_ADDRESSES),
    },
    {
      name: 'market-maker-address',
      category: 'MarketMaker',
      predicate: addressInSet(context.marketMakerAddresses),
    },
    ...(options.extraRules ?? []),
    {
      name: 'exchange-entity',
      category: 'Exchange',
      predicate: anyOf(entityTypeIn(exchangeTypes), labelMatches(exchangePatterns)),
    },
  ];
}

export function categorize(record: HolderRecord, rules: readonly ClassificationRule[]): HolderCategory {
  for (const rule of rules) {
    if (rule.predicate(record)) {
      return rule.category;
    }
  }
  return 'Unclassified';
}

/**
 * Tag every record with a category. Output keeps input order.
 */
export function classify(
  records: readonly HolderRecord[],
  context: CirculatingSupplyContext,
  options: ClassifierOptions = {}
): ClassifiedHolder[] {
  const rules = buildRules(context, options);
  return records.map(record => ({
    ...record,
    category: categorize(record, rules),
  }));
}
