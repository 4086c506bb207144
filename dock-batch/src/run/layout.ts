import { join, resolve } from "node:path";
import { batchLabel } from "../sdf/split.js";

// <workDir>/<runId>/{receptor/, batch_<i>/{ligand_<r>.pdbqt, filelist, reports/}, status.jsonl}
export interface RunLayout {
  runId: string;
  root: string;
  receptorDirectory: string;
  statusLogPath: string;
  batchDirectory(index: number): string;
  fileListPath(index: number): string;
  reportDirectory(index: number): string;
  ligandPath(batchIndex: number, recordIndex: number): string;
}

const SAFE_SEGMENT = /[^A-Za-z0-9._-]+/g;

export function sanitizeSegment(value: string): string {
  const cleaned = value.replace(SAFE_SEGMENT, "_").replace(/^\.+/, "_");
  return cleaned || "_";
}

export function defaultRunId(receptorId: string, databaseName: string): string {
  return `${sanitizeSegment(receptorId.toLowerCase())}_${sanitizeSegment(databaseName)}`;
}

export function createRunLayout(workDir: string, runId: string): RunLayout {
  const safeId = sanitizeSegment(runId);
  const root = join(resolve(workDir), safeId);
  const batchDirectory = (index: number) => join(root, batchLabel(index));
  return {
    runId: safeId,
    root,
    receptorDirectory: join(root, "receptor"),
    statusLogPath: join(root, "status.jsonl"),
    batchDirectory,
    fileListPath: (index) => join(batchDirectory(index), "filelist"),
    reportDirectory: (index) => join(batchDirectory(index), "reports"),
    ligandPath: (batchIndex, recordIndex) => join(batchDirectory(batchIndex), `ligand_${recordIndex}.pdbqt`),
  };
}
