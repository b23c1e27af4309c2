import { isAddress } from 'viem';

/**
 * Address helpers shared by the holder store, classifier and provider clients
 */

/**
 * Well-known sink addresses that hold burned supply
 */
export const BURN_ADDRESSES = [
  '0x0000000000000000000000000000000000000000',
  '0x000000000000000000000000000000000000dEaD',
] as const;

/**
 * Check whether an address is an EVM hex address (checksum not enforced)
 */
export function isEvmAddress(address: string): boolean {
  return isAddress(address, { strict: false });
}

/**
 * Canonical form used for comparisons.
 * EVM addresses are case-insensitive; other formats (base58, bech32) are not.
 */
export function normalizeAddress(address: string): string {
  const trimmed = address.trim();
  return isEvmAddress(trimmed) ? trimmed.toLowerCase() : trimmed;
}

/**
 * Build a lookup set of normalized addresses
 */
export function toAddressSet(addresses: Iterable<string> = []): Set<string> {
  const set = new Set<string>();
  for (const address of addresses) {
    set.add(normalizeAddress(address));
  }
  return set;
}

export function isSameAddress(a: string, b: string): boolean {
  return normalizeAddress(a) === normalizeAddress(b);
}

/**
 * Shorten address for display
 */
export function shortenAddress(address: string, chars: number = 4): string {
  return `${address.slice(0, chars + 2)}...${address.slice(-chars)}`;
}
