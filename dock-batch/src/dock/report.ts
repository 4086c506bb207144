import { readFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import type { JobReport, LigandReport, PreparedLigand, RankedPose, WorkList } from "../types/pipeline.js";
import { MissingReportError } from "../errors.js";

export const REPORT_EXTENSION = ".dlg";

export function expectedReportPath(workList: Pick<WorkList, "reportDirectory">, ligand: PreparedLigand): string {
  return join(workList.reportDirectory, basename(ligand.nativePath, extname(ligand.nativePath)) + REPORT_EXTENSION);
}

function parseNumber(s: string | undefined): number | null {
  if (s == null) return null;
  const v = Number(s);
  return Number.isFinite(v) ? v : null;
}

/**
 * Cluster table rows of a docking log:
 *   rank  subRank  run  energy  clusterRmsd  referenceRmsd  RANKING
 */
export function parseRankingLines(text: string): RankedPose[] {
  const out: RankedPose[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line.endsWith("RANKING")) continue;
    const [rank, subRank, run, energy] = line.split(/\s+/).map((t) => parseNumber(t));
    if (rank == null || subRank == null || run == null || energy == null) continue;
    out.push({ rank, subRank, run, energy });
  }
  return out;
}

/** Best pose of the top-ranked cluster, or null when the log has none. */
export function rankOnePose(poses: RankedPose[]): RankedPose | null {
  let best: RankedPose | null = null;
  for (const p of poses) {
    if (p.rank !== 1) continue;
    if (!best || p.energy < best.energy) best = p;
  }
  return best;
}

export async function readBatchReports(workList: WorkList): Promise<JobReport> {
  const ligands: LigandReport[] = [];
  for (const ligand of workList.ligands) {
    const reportPath = expectedReportPath(workList, ligand);
    let text: string;
    try {
      text = await readFile(reportPath, "utf8");
    } catch {
      throw new MissingReportError(workList.batch.index, reportPath, `no report for ${ligand.ligandId}`);
    }
    const poses = parseRankingLines(text);
    if (!rankOnePose(poses)) {
      throw new MissingReportError(workList.batch.index, reportPath, `report for ${ligand.ligandId} has no rank-1 entry`);
    }
    ligands.push({ ligandId: ligand.ligandId, ordinal: ligand.ordinal, reportPath, poses });
  }
  return { batchIndex: workList.batch.index, ligands };
}
