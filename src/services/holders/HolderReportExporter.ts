import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { logger } from '../../utils/logger.js';
import { AnalysisError } from '../../utils/errors.js';
import type {
  ConcentrationReport,
  HolderTableRow,
  HolderTables,
} from '../../types/holder.js';

const COLUMNS: ReadonlyArray<{ header: string; value: (row: HolderTableRow) => string }> = [
  { header: 'rank', value: row => String(row.rank) },
  { header: 'address', value: row => row.address },
  { header: 'entity_name', value: row => row.entityName },
  { header: 'entity_label', value: row => row.entityLabel },
  { header: 'category', value: row => row.category },
  { header: 'balance', value: row => String(row.balance) },
  { header: 'share', value: row => String(row.share) },
  { header: 'flagged', value: row => String(row.flagged) },
];

export interface ExportedFiles {
  fullPath: string;
  filteredPath: string;
}

/**
 * Full ranked table plus the filtered view of flagged or unclassified holders
 */
export function buildHolderTables(report: ConcentrationReport): HolderTables {
  const full = report.holders.map<HolderTableRow>(holder => ({
    rank: holder.rank,
    address: holder.address,
    entityName: holder.entityName ?? '',
    entityLabel: holder.entityLabel ?? '',
    category: holder.category,
    balance: holder.balance,
    share: holder.share,
    flagged: holder.flagged,
  }));

  return {
    full,
    filtered: full.filter(row => row.flagged || row.category === 'Unclassified'),
  };
}

function escapeField(value: string, delimiter: string): string {
  if (value.includes(delimiter) || value.includes('"') || /[\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Render rows as delimited text with a header line (RFC 4180 quoting)
 */
export function toDelimited(rows: readonly HolderTableRow[], delimiter: string = ','): string {
  const lines = [COLUMNS.map(column => column.header).join(delimiter)];

  for (const row of rows) {
    lines.push(COLUMNS.map(column => escapeField(column.value(row), delimiter)).join(delimiter));
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Write both tables as CSV files named after the token
 */
export async function exportHolderTables(
  token: string,
  tables: HolderTables,
  outputDir: string
): Promise<ExportedFiles> {
  const fileStem = path.basename(token);

  if (fileStem !== token || fileStem === '' || fileStem.includes('..')) {
    throw new AnalysisError('InvalidToken', `Token ${JSON.stringify(token)} cannot name an export file`);
  }

  const root = path.resolve(outputDir);
  const fullPath = path.join(root, `${fileStem}_holders.csv`);
  const filteredPath = path.join(root, `${fileStem}_filtered_holders.csv`);

  for (const file of [fullPath, filteredPath]) {
    if (path.dirname(file) !== root) {
      throw new AnalysisError('InvalidToken', `Export path ${file} leaves ${root}`);
    }
  }

  await mkdir(root, { recursive: true });

  await Promise.all([
    writeFile(fullPath, toDelimited(tables.full), 'utf8'),
    writeFile(filteredPath, toDelimited(tables.filtered), 'utf8'),
  ]);

  logger.info('Holder tables exported', {
    token,
    fullPath,
    filteredPath,
    rows: tables.full.length,
    filteredRows: tables.filtered.length,
  });

  return { fullPath, filteredPath };
}
