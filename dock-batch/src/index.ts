export * from "./types/pipeline.js";
export * from "./errors.js";
export { PipelineConfigSchema, loadConfig, parseConfig, type PipelineConfig, type PipelineConfigInput } from "./config.js";
export {
  ligandDatabaseFromText,
  loadLigandDatabase,
  getLigandRecord,
  readLigandRecords,
  RecordIndexer,
  RECORD_SEPARATOR,
  type LoadOptions,
} from "./sdf/database.js";
export { splitDatabase, BatchPlan, batchLabel } from "./sdf/split.js";
export {
  LigandPreparer,
  ObabelConverter,
  fileListText,
  type LigandConverter,
  type LigandPreparerOptions,
} from "./prepare/ligands.js";
export {
  AutoGridReceptorPreparer,
  buildGridParameterFile,
  gridMapNames,
  normalizeStructureId,
  receptorAtomTypes,
  atomCentroid,
  type ReceptorPreparer,
  type GridParameters,
} from "./prepare/receptor.js";
export { AutoDockGpuEngine, type DockingEngine, type DockingRequest } from "./dock/engine.js";
export { parseRankingLines, rankOnePose, readBatchReports, expectedReportPath } from "./dock/report.js";
export { GpuJobScheduler, backoffDelay, type SchedulerOptions, type BackoffOptions } from "./dock/scheduler.js";
export { ResultAggregator, aggregate, isBetter } from "./results/aggregate.js";
export { createRunLayout, defaultRunId, type RunLayout } from "./run/layout.js";
export { StatusLog, type StatusLogEntry } from "./run/statusLog.js";
export { PipelineCoordinator, createDefaultCollaborators, type Collaborators, type RunRequest } from "./run/coordinator.js";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./utils/log.js";
export { WarningCollector } from "./utils/warnings.js";
export { withDeadline, type DeadlineOptions } from "./utils/deadline.js";
