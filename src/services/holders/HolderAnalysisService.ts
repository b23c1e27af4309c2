import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { formatLargeNumber, formatPercent } from '../../utils/math.js';
import { shortenAddress } from '../../utils/address.js';
import { arkhamClient } from '../external/ArkhamClient.js';
import { holderReportRepository } from '../repositories/HolderReportRepository.js';
import type { ConcentrationSnapshotRecord } from '../repositories/HolderReportRepository.js';
import { HolderRecordStore } from './HolderRecordStore.js';
import { classify, type ClassifierOptions } from './HolderClassifier.js';
import { analyze } from './ConcentrationAnalyzer.js';
import { buildHolderTables, exportHolderTables, type ExportedFiles } from './HolderReportExporter.js';
import type {
  CirculatingSupplyContext,
  ConcentrationReport,
  HolderRecord,
  HolderTables,
} from '../../types/holder.js';

export interface HolderSource {
  fetchTokenHolders(tokenId: string, chain: string): Promise<HolderRecord[] | null>;
  invalidateCache?(tokenId: string, chain: string): Promise<void>;
}

export interface SnapshotStore {
  insertSnapshot(token: string, chain: string, report: ConcentrationReport): Promise<number | null>;
  getLatestSnapshot(token: string, chain: string): Promise<ConcentrationSnapshotRecord | null>;
  getSnapshotHistory(token: string, chain: string, limit?: number): Promise<ConcentrationSnapshotRecord[]>;
}

export interface HolderAnalysisServiceOptions {
  holderSource?: HolderSource;
  snapshotStore?: SnapshotStore;
  classifierOptions?: ClassifierOptions;
  exportDir?: string;
}

export interface AnalysisParameters {
  topNs?: readonly number[];
  whaleThreshold?: number;
}

export interface HolderAnalysis {
  report: ConcentrationReport;
  tables: HolderTables;
}

export interface SnapshotRequest extends AnalysisParameters {
  token: string;
  chain: string;
  context: CirculatingSupplyContext;
  exportCsv?: boolean;
  // Drop cached provider rows before fetching
  refresh?: boolean;
}

export interface SnapshotResult extends HolderAnalysis {
  token: string;
  chain: string;
  snapshotId: number | null;
  files: ExportedFiles | null;
}

/**
 * Runs the holder pipeline: ingest → classify → analyze → tables,
 * and for provider-backed snapshots also persist and export.
 */
export class HolderAnalysisService {
  private holderSource: HolderSource;
  private snapshotStore: SnapshotStore;
  private classifierOptions: ClassifierOptions;
  private exportDir: string;

  constructor(options?: HolderAnalysisServiceOptions) {
    this.holderSource = options?.holderSource || arkhamClient;
    this.snapshotStore = options?.snapshotStore || holderReportRepository;
    this.classifierOptions = options?.classifierOptions || {};
    this.exportDir = options?.exportDir || config.analysis.exportDir;
  }

  analyzeRecords(
    records: readonly HolderRecord[],
    context: CirculatingSupplyContext,
    parameters: AnalysisParameters = {}
  ): HolderAnalysis {
    const store = HolderRecordStore.fromRecords(records);
    const classified = classify(store.records(), context, this.classifierOptions);
    const report = analyze(
      classified,
      context,
      parameters.topNs ?? config.analysis.topNs,
      parameters.whaleThreshold ?? config.analysis.whaleThreshold
    );

    return { report, tables: buildHolderTables(report) };
  }

  /**
   * Fetch labeled holders, analyze and store a snapshot.
   * Resolves to null when the provider does not know the token.
   */
  async createSnapshot(request: SnapshotRequest): Promise<SnapshotResult | null> {
    const { token, chain } = request;

    if (request.refresh && this.holderSource.invalidateCache) {
      await this.holderSource.invalidateCache(token, chain);
    }

    const records = await this.holderSource.fetchTokenHolders(token, chain);

    if (!records) {
      return null;
    }

    const { report, tables } = this.analyzeRecords(records, request.context, request);
    const snapshotId = await this.snapshotStore.insertSnapshot(token, chain, report);
    const files = request.exportCsv ? await exportHolderTables(token, tables, this.exportDir) : null;

    logger.info('Holder concentration snapshot created', {
      token,
      chain,
      snapshotId,
      circulatingSupply: formatLargeNumber(report.circulatingSupply),
      holders: report.holders.length,
      topNShares: Object.fromEntries(
        Object.entries(report.topNShares).map(([n, share]) => [`top${n}`, formatPercent(share)])
      ),
      hhi: report.hhi.toFixed(2),
      flagged: report.flagged.map(address => shortenAddress(address)),
    });

    return { token, chain, report, tables, snapshotId, files };
  }

  async getLatestSnapshot(token: string, chain: string): Promise<ConcentrationSnapshotRecord | null> {
    return this.snapshotStore.getLatestSnapshot(token, chain);
  }

  async getSnapshotHistory(token: string, chain: string, limit?: number): Promise<ConcentrationSnapshotRecord[]> {
    return this.snapshotStore.getSnapshotHistory(token, chain, limit);
  }
}

export const holderAnalysisService = new HolderAnalysisService();

export default HolderAnalysisService;
