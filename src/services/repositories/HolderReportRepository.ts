import { query } from '../../config/database.js';
import { logger } from '../../utils/logger.js';
import type { ConcentrationReport, RankedHolder } from '../../types/holder.js';

export interface ConcentrationSnapshotRecord {
  id: number;
  token: string;
  chain: string;
  circulatingSupply: number;
  whaleThreshold: number;
  hhi: number;
  topNShares: Record<number, number>;
  flagged: string[];
  holders: RankedHolder[];
  snapshotTime: Date;
}

interface SnapshotRow {
  id: string;
  token: string;
  chain: string;
  circulating_supply: string;
  whale_threshold: string;
  hhi: string;
  top_n_shares: Record<string, number>;
  flagged: string[];
  holders: RankedHolder[];
  snapshot_time: Date;
}

const SNAPSHOT_COLUMNS = `id, token, chain, circulating_supply, whale_threshold, hhi,
                top_n_shares, flagged, holders, snapshot_time`;

function toTopNShares(json: Record<string, number>): Record<number, number> {
  const shares: Record<number, number> = {};
  for (const [n, share] of Object.entries(json)) {
    shares[parseInt(n, 10)] = share;
  }
  return shares;
}

function toRecord(row: SnapshotRow): ConcentrationSnapshotRecord {
  return {
    id: parseInt(row.id, 10),
    token: row.token,
    chain: row.chain,
    circulatingSupply: parseFloat(row.circulating_supply),
    whaleThreshold: parseFloat(row.whale_threshold),
    hhi: parseFloat(row.hhi),
    topNShares: toTopNShares(row.top_n_shares),
    flagged: row.flagged,
    holders: row.holders,
    snapshotTime: row.snapshot_time,
  };
}

export class HolderReportRepository {
  /**
   * Insert a concentration snapshot
   */
  async insertSnapshot(token: string, chain: string, report: ConcentrationReport): Promise<number | null> {
    try {
      const result = await query<{ id: string }>(
        `INSERT INTO holder_concentration_snapshots (
           token, chain, circulating_supply, whale_threshold, hhi,
           top_n_shares, flagged, holders
         )
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING id`,
        [
          token,
          chain,
          report.circulatingSupply,
          report.whaleThreshold,
          report.hhi,
          JSON.stringify(report.topNShares),
          JSON.stringify(report.flagged),
          JSON.stringify(report.holders),
        ]
      );

      const id = result.rows[0]?.id;
      return id === undefined ? null : parseInt(id, 10);
    } catch (error) {
      logger.error('Failed to insert concentration snapshot', {
        token,
        chain,
        error: (error as Error).message,
      });
      return null;
    }
  }

  /**
   * Get the latest snapshot of a token on a chain
   */
  async getLatestSnapshot(token: string, chain: string): Promise<ConcentrationSnapshotRecord | null> {
    try {
      const result = await query<SnapshotRow>(
        `SELECT ${SNAPSHOT_COLUMNS}
         FROM holder_concentration_snapshots
         WHERE token = $1 AND chain = $2
         ORDER BY snapshot_time DESC
         LIMIT 1`,
        [token, chain]
      );

      const row = result.rows[0];
      return row ? toRecord(row) : null;
    } catch (error) {
      logger.error('Failed to get latest concentration snapshot', {
        token,
        chain,
        error: (error as Error).message,
      });
      return null;
    }
  }

  /**
   * Get snapshot history, newest first
   */
  async getSnapshotHistory(
    token: string,
    chain: string,
    limit: number = 20
  ): Promise<ConcentrationSnapshotRecord[]> {
    try {
      const result = await query<SnapshotRow>(
        `SELECT ${SNAPSHOT_COLUMNS}
         FROM holder_concentration_snapshots
         WHERE token = $1 AND chain = $2
         ORDER BY snapshot_time DESC
         LIMIT $3`,
        [token, chain, limit]
      );

      return result.rows.map(toRecord);
    } catch (error) {
      logger.error('Failed to get concentration snapshot history', {
        token,
        chain,
        error: (error as Error).message,
      });
      return [];
    }
  }
}

export const holderReportRepository = new HolderReportRepository();

export default HolderReportRepository;
