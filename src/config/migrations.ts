export const SCHEMA_SQL = `
-- 홀더 집중도 스냅샷
CREATE TABLE IF NOT EXISTS holder_concentration_snapshots (
    id BIGSERIAL PRIMARY KEY,
    token VARCHAR(128) NOT NULL,
    chain VARCHAR(64) NOT NULL,
    circulating_supply NUMERIC(38, 8) NOT NULL,
    whale_threshold NUMERIC(10, 8) NOT NULL,
    hhi NUMERIC(16, 6) NOT NULL,
    top_n_shares JSONB NOT NULL DEFAULT '{}'::jsonb,
    flagged JSONB NOT NULL DEFAULT '[]'::jsonb,
    holders JSONB NOT NULL DEFAULT '[]'::jsonb,
    snapshot_time TIMESTAMP WITH TIME ZONE DEFAULT NOW()
);

-- 인덱스
CREATE INDEX IF NOT EXISTS idx_concentration_token_chain_time
    ON holder_concentration_snapshots(token, chain, snapshot_time DESC);
`;

export interface MigrationClient {
  query(text: string): Promise<{ rows: Array<Record<string, unknown>> }>;
  release(): void;
}

export interface MigrationPool {
  connect(): Promise<MigrationClient>;
}

/**
 * Apply the schema on one pooled client and list the public tables.
 * The client goes back to the pool whether or not the schema applies.
 */
export async function applySchema(pool: MigrationPool): Promise<string[]> {
  const client = await pool.connect();

  try {
    await client.query(SCHEMA_SQL);

    const result = await client.query(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
      ORDER BY table_name
    `);

    return result.rows.map(row => String(row.table_name));
  } finally {
    client.release();
  }
}
