import { describe, it, expect, vi, beforeEach } from 'vitest';
import type pg from 'pg';

vi.mock('../../config/database.js', () => ({
  query: vi.fn(),
}));

import { query } from '../../config/database.js';
import { HolderReportRepository } from './HolderReportRepository.js';
import type { ConcentrationReport } from '../../types/holder.js';

const queryMock = vi.mocked(query);

function result(rows: pg.QueryResultRow[]): pg.QueryResult {
  return { rows, rowCount: rows.length, command: 'SELECT', oid: 0, fields: [] };
}

const report: ConcentrationReport = {
  circulatingSupply: 1000,
  whaleThreshold: 0.05,
  holders: [
    { address: '0x01', balance: 600, category: 'Exchange', rank: 1, share: 0.6, flagged: true },
    { address: '0x02', balance: 400, category: 'Unclassified', rank: 2, share: 0.4, flagged: true },
  ],
  perHolderShare: { '0x01': 0.6, '0x02': 0.4 },
  topNShares: { 10: 1 },
  hhi: 5200,
  flagged: ['0x01', '0x02'],
  excluded: { locked: 0, burn: 0 },
};

describe('HolderReportRepository', () => {
  const repository = new HolderReportRepository();

  beforeEach(() => {
    queryMock.mockReset();
  });

  describe('insertSnapshot', () => {
    it('should store the report as JSON columns', async () => {
      queryMock.mockResolvedValue(result([{ id: '42' }]));

      const id = await repository.insertSnapshot('bedrock-token', 'bsc', report);

      expect(id).toBe(42);
      const [sql, params] = queryMock.mock.calls[0];
      expect(sql).toContain('INSERT INTO holder_concentration_snapshots');
      expect(params).toEqual([
        'bedrock-token',
        'bsc',
        1000,
        0.05,
        5200,
        '{"10":1}',
        '["0x01","0x02"]',
        JSON.stringify(report.holders),
      ]);
    });

    it('should return null when the insert fails', async () => {
      queryMock.mockRejectedValue(new Error('connection refused'));

      await expect(repository.insertSnapshot('bedrock-token', 'bsc', report)).resolves.toBeNull();
    });
  });

  describe('getLatestSnapshot', () => {
    it('should convert numeric columns and top-N keys', async () => {
      const snapshotTime = new Date('2026-01-02T03:04:05Z');
      queryMock.mockResolvedValue(
        result([
          {
            id: '7',
            token: 'bedrock-token',
            chain: 'bsc',
            circulating_supply: '1000',
            whale_threshold: '0.05',
            hhi: '5200.000000',
            top_n_shares: { '10': 1, '20': 1 },
            flagged: ['0x01'],
            holders: report.holders,
            snapshot_time: snapshotTime,
          },
        ])
      );

      const snapshot = await repository.getLatestSnapshot('bedrock-token', 'bsc');

      expect(snapshot).toEqual({
        id: 7,
        token: 'bedrock-token',
        chain: 'bsc',
        circulatingSupply: 1000,
        whaleThreshold: 0.05,
        hhi: 5200,
        topNShares: { 10: 1, 20: 1 },
        flagged: ['0x01'],
        holders: report.holders,
        snapshotTime,
      });
      expect(queryMock.mock.calls[0][1]).toEqual(['bedrock-token', 'bsc']);
    });

    it('should return null when there is no snapshot', async () => {
      queryMock.mockResolvedValue(result([]));

      await expect(repository.getLatestSnapshot('bedrock-token', 'bsc')).resolves.toBeNull();
    });
  });

  describe('getSnapshotHistory', () => {
    it('should pass the limit through', async () => {
      queryMock.mockResolvedValue(result([]));

      await repository.getSnapshotHistory('bedrock-token', 'bsc', 5);

      expect(queryMock.mock.calls[0][1]).toEqual(['bedrock-token', 'bsc', 5]);
    });

    it('should return an empty list on failure', async () => {
      queryMock.mockRejectedValue(new Error('connection refused'));

      await expect(repository.getSnapshotHistory('bedrock-token', 'bsc')).resolves.toEqual([]);
    });
  });
});
