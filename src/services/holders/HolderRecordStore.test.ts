import { describe, it, expect } from 'vitest';
import { HolderRecordStore } from './HolderRecordStore.js';
import { AnalysisError } from '../../utils/errors.js';

const ALICE = '0xA11CE0000000000000000000000000000000A11C';
const BOB = '0xb0b0000000000000000000000000000000000b0b';

describe('HolderRecordStore', () => {
  it('should keep insertion order', () => {
    const store = HolderRecordStore.fromRecords([
      { address: BOB, balance: 10 },
      { address: ALICE, balance: 20 },
    ]);

    expect(store.size).toBe(2);
    expect(store.records().map(r => r.address)).toEqual([BOB, ALICE]);
  });

  it('should look up addresses checksum-insensitively', () => {
    const store = HolderRecordStore.fromRecords([{ address: ALICE, balance: 1 }]);

    expect(store.has(ALICE.toLowerCase())).toBe(true);
    expect(store.get(ALICE.toUpperCase().replace('0X', '0x'))?.balance).toBe(1);
  });

  it('should reject duplicate addresses in any case', () => {
    const store = new HolderRecordStore();
    store.add({ address: ALICE, balance: 1 });

    expect(() => store.add({ address: ALICE.toLowerCase(), balance: 2 })).toThrowError(
      expect.objectContaining({ code: 'DuplicateHolder' })
    );
  });

  it('should reject negative and non-finite balances', () => {
    const store = new HolderRecordStore();

    expect(() => store.add({ address: ALICE, balance: -1 })).toThrow(AnalysisError);
    expect(() => store.add({ address: ALICE, balance: Number.NaN })).toThrowError(
      expect.objectContaining({ code: 'InvalidHolder' })
    );
    expect(() => store.add({ address: ALICE, balance: Number.POSITIVE_INFINITY })).toThrowError(
      expect.objectContaining({ code: 'InvalidHolder' })
    );
    expect(store.size).toBe(0);
  });

  it('should reject empty addresses', () => {
    const store = new HolderRecordStore();
    expect(() => store.add({ address: '   ', balance: 5 })).toThrowError(
      expect.objectContaining({ code: 'InvalidHolder' })
    );
  });

  it('should skip zero-balance rows', () => {
    const store = new HolderRecordStore();

    expect(store.add({ address: ALICE, balance: 0 })).toBe(false);
    expect(store.add({ address: BOB, balance: 3 })).toBe(true);
    expect(store.size).toBe(1);
  });

  it('should trim text fields and lower-case the entity type', () => {
    const store = HolderRecordStore.fromRecords([
      {
        address: `  ${BOB} `,
        balance: 7,
        entityName: ' Binance ',
        entityLabel: '',
        entityType: 'CEX',
      },
    ]);

    expect(store.get(BOB)).toEqual({
      address: BOB,
      balance: 7,
      entityName: 'Binance',
      entityLabel: undefined,
      entityType: 'cex',
      chain: undefined,
    });
  });
});
