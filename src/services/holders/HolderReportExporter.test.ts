import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { buildHolderTables, toDelimited, exportHolderTables } from './HolderReportExporter.js';
import { analyze } from './ConcentrationAnalyzer.js';
import type { ClassifiedHolder, HolderTableRow } from '../../types/holder.js';

const classified: ClassifiedHolder[] = [
  { address: '0x03', balance: 100, category: 'Exchange', entityName: 'Kraken' },
  { address: '0x01', balance: 600, category: 'Exchange', entityName: 'Binance', entityLabel: 'Hot Wallet, main' },
  { address: '0x02', balance: 300, category: 'Unclassified', entityLabel: 'He said "hi"' },
];

const report = analyze(
  classified,
  { totalSupply: 1000, lockedSupply: 0, lockedAddresses: [] },
  [10],
  0.5
);

describe('HolderReportExporter', () => {
  describe('buildHolderTables', () => {
    it('should list every ranked holder in the full table', () => {
      const { full } = buildHolderTables(report);

      expect(full).toEqual([
        { rank: 1, address: '0x01', entityName: 'Binance', entityLabel: 'Hot Wallet, main', category: 'Exchange', balance: 600, share: 0.6, flagged: true },
        { rank: 2, address: '0x02', entityName: '', entityLabel: 'He said "hi"', category: 'Unclassified', balance: 300, share: 0.3, flagged: false },
        { rank: 3, address: '0x03', entityName: 'Kraken', entityLabel: '', category: 'Exchange', balance: 100, share: 0.1, flagged: false },
      ]);
    });

    it('should keep only flagged or unclassified holders in the filtered table', () => {
      const { filtered } = buildHolderTables(report);
      expect(filtered.map(row => row.address)).toEqual(['0x01', '0x02']);
    });
  });

  describe('toDelimited', () => {
    it('should quote fields containing delimiters and quotes', () => {
      const { full } = buildHolderTables(report);

      expect(toDelimited(full)).toBe(
        'rank,address,entity_name,entity_label,category,balance,share,flagged\n' +
        '1,0x01,Binance,"Hot Wallet, main",Exchange,600,0.6,true\n' +
        '2,0x02,,"He said ""hi""",Unclassified,300,0.3,false\n' +
        '3,0x03,Kraken,,Exchange,100,0.1,false\n'
      );
    });

    it('should quote embedded newlines', () => {
      const row: HolderTableRow = {
        rank: 1,
        address: '0x09',
        entityName: 'Line one\nline two',
        entityLabel: '',
        category: 'Unclassified',
        balance: 1,
        share: 1,
        flagged: true,
      };

      expect(toDelimited([row]).split('\n')[1]).toBe('1,0x09,"Line one');
    });

    it('should honour a custom delimiter', () => {
      const { filtered } = buildHolderTables(report);
      const lines = toDelimited(filtered, '\t').trimEnd().split('\n');

      expect(lines[0]).toBe('rank\taddress\tentity_name\tentity_label\tcategory\tbalance\tshare\tflagged');
      expect(lines[1]).toBe('1\t0x01\tBinance\tHot Wallet, main\tExchange\t600\t0.6\ttrue');
    });

    it('should emit only the header for an empty table', () => {
      expect(toDelimited([])).toBe('rank,address,entity_name,entity_label,category,balance,share,flagged\n');
    });
  });

  describe('exportHolderTables', () => {
    let dir: string | null = null;

    afterEach(async () => {
      if (dir) {
        await rm(dir, { recursive: true, force: true });
        dir = null;
      }
    });

    it('should write both tables named after the token', async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), 'holder-export-'));
      const outputDir = path.join(dir, 'nested');
      const tables = buildHolderTables(report);

      const files = await exportHolderTables('bedrock-token', tables, outputDir);

      expect(files).toEqual({
        fullPath: path.join(outputDir, 'bedrock-token_holders.csv'),
        filteredPath: path.join(outputDir, 'bedrock-token_filtered_holders.csv'),
      });
      expect(await readFile(files.fullPath, 'utf8')).toBe(toDelimited(tables.full));
      expect((await readFile(files.filteredPath, 'utf8')).trimEnd().split('\n')).toHaveLength(3);
    });

    it('should refuse tokens that would write outside the output directory', async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), 'holder-export-'));
      const outputDir = path.join(dir, 'nested');
      const tables = buildHolderTables(report);

      for (const token of ['../escape', '..', 'a/b', '']) {
        await expect(exportHolderTables(token, tables, outputDir)).rejects.toMatchObject({
          code: 'InvalidToken',
        });
      }
      await expect(readdir(dir)).resolves.toEqual([]);
    });
  });
});
