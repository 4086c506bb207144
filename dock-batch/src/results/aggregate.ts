import type { JobReport, LigandResult, RunResult } from "../types/pipeline.js";
import { rankOnePose } from "../dock/report.js";

/** Strictly better: lower energy, then earlier batch, then earlier position in the batch. */
export function isBetter(a: LigandResult, b: LigandResult): boolean {
  if (a.energy !== b.energy) return a.energy < b.energy;
  if (a.batchIndex !== b.batchIndex) return a.batchIndex < b.batchIndex;
  return a.ordinal < b.ordinal;
}

/**
 * Streaming reduction of job reports to the most favourable rank-1 energy.
 * Reports may arrive in any order; the outcome only depends on their content.
 */
export class ResultAggregator {
  private leaders: LigandResult[] = [];
  private ligandsSeen = 0;
  private candidates = 0;
  private reportsSeen = 0;

  constructor(private readonly topN = 1) {
    if (!Number.isInteger(topN) || topN < 1) throw new RangeError(`topN must be a positive integer, got ${topN}`);
  }

  add(report: JobReport): void {
    this.reportsSeen++;
    for (const ligand of report.ligands) {
      this.ligandsSeen++;
      const pose = rankOnePose(ligand.poses);
      // only favourable (negative) energies qualify
      if (!pose || !(pose.energy < 0)) continue;
      this.candidates++;
      this.offer({ ligandId: ligand.ligandId, batchIndex: report.batchIndex, ordinal: ligand.ordinal, energy: pose.energy });
    }
  }

  private offer(r: LigandResult) {
    const L = this.leaders;
    if (L.length === this.topN && !isBetter(r, L[L.length - 1])) return;
    let i = L.length;
    while (i > 0 && isBetter(r, L[i - 1])) i--;
    L.splice(i, 0, r);
    if (L.length > this.topN) L.pop();
  }

  get stats(): { reports: number; ligands: number; candidates: number } {
    return { reports: this.reportsSeen, ligands: this.ligandsSeen, candidates: this.candidates };
  }

  result(): RunResult {
    if (this.leaders.length === 0) return { kind: "no-favorable-binding" };
    return { kind: "best", best: this.leaders[0], leaders: this.leaders.slice() };
  }
}

export async function aggregate(
  reports: Iterable<JobReport> | AsyncIterable<JobReport>,
  topN = 1,
): Promise<RunResult> {
  const agg = new ResultAggregator(topN);
  for await (const r of reports) agg.add(r);
  return agg.result();
}
