// Database repositories
export { HolderReportRepository, holderReportRepository } from './HolderReportRepository.js';
export type { ConcentrationSnapshotRecord } from './HolderReportRepository.js';
