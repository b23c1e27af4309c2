// Holder concentration analysis
export { HolderRecordStore } from './HolderRecordStore.js';

export {
  buildRules,
  categorize,
  classify,
  addressInSet,
  entityTypeIn,
  labelMatches,
  anyOf,
  DEFAULT_EXCHANGE_PATTERNS,
} from './HolderClassifier.js';
export type { ClassificationRule, ClassifierOptions, HolderPredicate } from './HolderClassifier.js';

export { analyze, getCirculatingSupply } from './ConcentrationAnalyzer.js';

export { buildHolderTables, toDelimited, exportHolderTables } from './HolderReportExporter.js';
export type { ExportedFiles } from './HolderReportExporter.js';

export { HolderAnalysisService, holderAnalysisService } from './HolderAnalysisService.js';
export type {
  AnalysisParameters,
  HolderAnalysis,
  HolderAnalysisServiceOptions,
  HolderSource,
  SnapshotRequest,
  SnapshotResult,
  SnapshotStore,
} from './HolderAnalysisService.js';
