/** Random access to the raw bytes of a ligand database. */
export interface RecordSource {
  read(start: number, end: number): Promise<Buffer>;
}

export interface LigandDatabase {
  name: string;
  path?: string;
  source: RecordSource;
  byteLength: number;
  recordCount: number;
  /** CSR-like record index in bytes: record i spans [recordStart[i], recordEnd[i]) of the source */
  recordStart: Float64Array;
  recordEnd: Float64Array;
  warnings: string[];
}

export interface LigandRecord {
  /** zero-based position in the source database */
  index: number;
  ligandId: string;
  text: string; // includes the trailing separator line when present
}

export interface BatchBounds {
  index: number;
  label: string; // "batch_<index>"
  firstRecord: number;
  size: number;
}

export interface Batch extends BatchBounds {
  records: LigandRecord[];
}

export interface Receptor {
  id: string;
  directory: string;
  structurePath: string; // cleaned .pdb
  nativePath: string;    // .pdbqt
  gridDescriptorPath: string; // <id>.maps.fld
  mapPaths: string[];    // one per ligand atom type, then e, d
}

export interface PreparedLigand {
  ligandId: string;
  recordIndex: number;
  /** position within the batch */
  ordinal: number;
  nativePath: string;
}

export interface SkippedLigand {
  ligandId: string;
  recordIndex: number;
  reason: string;
}

export interface WorkList {
  batch: BatchBounds;
  directory: string;
  fileListPath: string;
  reportDirectory: string;
  ligands: PreparedLigand[];
  skipped: SkippedLigand[];
}

export type FailureReason = "EngineError" | "MissingReport" | "ConversionFailed" | "PreparationFailed" | "Cancelled";

export type JobStatus = "queued" | "running" | "succeeded" | "failed";

export interface RankedPose {
  rank: number;
  subRank: number;
  run: number;
  energy: number;
}

export interface LigandReport {
  ligandId: string;
  ordinal: number;
  reportPath: string;
  poses: RankedPose[];
}

export interface JobReport {
  batchIndex: number;
  ligands: LigandReport[];
}

export interface JobFailure {
  reason: FailureReason;
  message: string;
}

export interface DockingJob {
  id: string; // "<runId>/batch_<index>"
  batchIndex: number;
  status: JobStatus;
  attempts: number;
  reports: string[];
  report?: JobReport;
  failure?: JobFailure;
  /** attempt errors in order, including retried ones */
  history: string[];
}

export interface LigandResult {
  ligandId: string;
  batchIndex: number;
  ordinal: number;
  energy: number; // kcal/mol, more negative is better
}

export type RunResult =
  | { kind: "best"; best: LigandResult; leaders: LigandResult[] }
  | { kind: "no-favorable-binding" };

export interface BatchStatus {
  batchIndex: number;
  label: string;
  status: "succeeded" | "failed";
  reason?: FailureReason;
  message?: string;
  attempts: number;
  ligands: number;
  skippedLigands: number;
}

export interface RunReport {
  runId: string;
  receptorId: string;
  database: string;
  status: "completed" | "cancelled";
  batchCount: number;
  result: RunResult;
  batches: BatchStatus[];
  failedBatches: BatchStatus[];
  skippedLigands: SkippedLigand[];
  statusLogPath: string;
}
