import { logger } from '../../utils/logger.js';
import { AnalysisError } from '../../utils/errors.js';
import { normalizeAddress } from '../../utils/address.js';
import type { HolderRecord } from '../../types/holder.js';

/**
 * In-memory table of holder rows for a single snapshot.
 * Keyed by normalized address; iteration follows insertion order.
 */
export class HolderRecordStore {
  private rows = new Map<string, HolderRecord>();

  static fromRecords(records: Iterable<HolderRecord>): HolderRecordStore {
    const store = new HolderRecordStore();
    for (const record of records) {
      store.add(record);
    }
    return store;
  }

  /**
   * Validate and insert a row. Returns false when the row carries no balance.
   */
  add(record: HolderRecord): boolean {
    const address = record.address?.trim() ?? '';

    if (!address) {
      throw new AnalysisError('InvalidHolder', 'Holder address is empty');
    }

    if (!Number.isFinite(record.balance) || record.balance < 0) {
      throw new AnalysisError(
        'InvalidHolder',
        `Holder ${address} has invalid balance ${record.balance}`
      );
    }

    const key = normalizeAddress(address);

    if (this.rows.has(key)) {
      throw new AnalysisError('DuplicateHolder', `Holder ${address} appears more than once`);
    }

    if (record.balance === 0) {
      logger.warn('Skipping zero-balance holder row', { address });
      return false;
    }

    this.rows.set(key, {
      address,
      balance: record.balance,
      entityName: cleanText(record.entityName),
      entityLabel: cleanText(record.entityLabel),
      entityType: cleanText(record.entityType)?.toLowerCase(),
      chain: cleanText(record.chain),
    });

    return true;
  }

  get(address: string): HolderRecord | undefined {
    return this.rows.get(normalizeAddress(address));
  }

  has(address: string): boolean {
    return this.rows.has(normalizeAddress(address));
  }

  get size(): number {
    return this.rows.size;
  }

  records(): HolderRecord[] {
    return [...this.rows.values()];
  }
}

function cleanText(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export default HolderRecordStore;
