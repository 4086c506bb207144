import type {
  BatchStatus,
  DockingJob,
  FailureReason,
  LigandDatabase,
  Receptor,
  RunReport,
  SkippedLigand,
  WorkList,
} from "../types/pipeline.js";
import type { PipelineConfig } from "../config.js";
import { DockBatchError, ReceptorPreparationFailedError, RunFailedError, errorMessage } from "../errors.js";
import { loadLigandDatabase } from "../sdf/database.js";
import { batchLabel, splitDatabase } from "../sdf/split.js";
import { LigandPreparer, ObabelConverter, type LigandConverter } from "../prepare/ligands.js";
import { AutoGridReceptorPreparer, normalizeStructureId, type ReceptorPreparer } from "../prepare/receptor.js";
import { AutoDockGpuEngine, type DockingEngine } from "../dock/engine.js";
import { GpuJobScheduler } from "../dock/scheduler.js";
import { ResultAggregator } from "../results/aggregate.js";
import { createRunLayout, defaultRunId } from "./layout.js";
import { StatusLog } from "./statusLog.js";
import { withDeadline } from "../utils/deadline.js";
import { silentLogger, type Logger } from "../utils/log.js";

export interface Collaborators {
  receptorPreparer: ReceptorPreparer;
  converter: LigandConverter;
  engine: DockingEngine;
}

export interface RunRequest {
  receptorId: string;
  /** loaded database, or a path to an SDF file */
  database: LigandDatabase | string;
  signal?: AbortSignal;
}

export function createDefaultCollaborators(config: PipelineConfig, log: Logger = silentLogger): Collaborators {
  const t = config.tools;
  return {
    receptorPreparer: new AutoGridReceptorPreparer({
      obabel: t.obabel,
      autogrid: t.autogrid,
      prepareReceptor: t.prepareReceptor,
      ligandTypes: config.ligandTypes,
      gridCenter: config.gridCenter,
      parameterFile: config.parameterFile,
      log: log.child("receptor"),
    }),
    converter: new ObabelConverter(t.obabel),
    engine: new AutoDockGpuEngine(t.autodockGpu),
  };
}

function statusOf(job: DockingJob, workList: WorkList): BatchStatus {
  return {
    batchIndex: workList.batch.index,
    label: workList.batch.label,
    status: job.status === "succeeded" ? "succeeded" : "failed",
    reason: job.failure?.reason,
    message: job.failure?.message,
    attempts: job.attempts,
    ligands: workList.ligands.length,
    skippedLigands: workList.skipped.length,
  };
}

/**
 * Runs one receptor against one ligand database:
 * receptor -> split -> (prepare -> dock) per batch -> aggregate.
 */
export class PipelineCoordinator {
  private readonly log: Logger;

  constructor(
    private readonly config: PipelineConfig,
    private readonly collaborators: Collaborators,
    log?: Logger,
  ) {
    this.log = log ?? silentLogger;
  }

  async run(req: RunRequest): Promise<RunReport> {
    const { config, collaborators } = this;
    // input validation happens before anything touches the disk
    const receptorId = normalizeStructureId(req.receptorId);
    const database = typeof req.database === "string" ? await loadLigandDatabase(req.database) : req.database;
    const plan = splitDatabase(database, config.batchSize);
    for (const w of database.warnings) this.log.warn(w);

    const layout = createRunLayout(config.workDir, config.runId ?? defaultRunId(receptorId, database.name));
    const statusLog = new StatusLog(layout.statusLogPath, layout.runId);
    await statusLog.reset();
    this.log.info(
      `Run ${layout.runId}: ${database.recordCount} ligands in ${plan.count} batches of ${plan.batchSize}, ` +
        `pool width ${config.poolWidth}`,
    );

    const signal = req.signal;
    const statuses: BatchStatus[] = [];
    const skipped: SkippedLigand[] = [];
    const aggregator = new ResultAggregator(config.topN);
    const report = (status: RunReport["status"]): RunReport => {
      statuses.sort((a, b) => a.batchIndex - b.batchIndex);
      return {
        runId: layout.runId,
        receptorId,
        database: database.name,
        status,
        batchCount: plan.count,
        result: aggregator.result(),
        batches: statuses.slice(),
        failedBatches: statuses.filter((s) => s.status === "failed"),
        skippedLigands: skipped.sort((a, b) => a.recordIndex - b.recordIndex),
        statusLogPath: layout.statusLogPath,
      };
    };
    const settle = async (s: BatchStatus) => {
      statuses.push(s);
      try {
        await statusLog.record(s);
      } catch (e) {
        this.log.warn(`${s.label}: status log write failed (${errorMessage(e)})`);
      }
    };
    const failedBeforeDocking = (i: number, reason: FailureReason, message: string): BatchStatus => ({
      batchIndex: i,
      label: batchLabel(i),
      status: "failed",
      reason,
      message,
      attempts: 0,
      ligands: 0,
      skippedLigands: 0,
    });
    const recordCancelled = async (from: number) => {
      for (let i = from; i < plan.count; i++) {
        await settle(failedBeforeDocking(i, "Cancelled", "run cancelled before preparation"));
      }
    };

    let receptor: Receptor;
    try {
      const prepare = (s: AbortSignal) => collaborators.receptorPreparer.prepare(receptorId, layout.receptorDirectory, s);
      receptor = await withDeadline(prepare, {
        timeoutMs: config.receptorTimeoutMs,
        signal,
        onTimeout: () => new ReceptorPreparationFailedError(receptorId, `timed out after ${config.receptorTimeoutMs} ms`),
      });
    } catch (e) {
      if (signal?.aborted) {
        await recordCancelled(0);
        return report("cancelled");
      }
      if (e instanceof DockBatchError) throw e;
      throw new ReceptorPreparationFailedError(receptorId, errorMessage(e), { cause: e });
    }

    const schedulerLog = this.log.child("scheduler");
    const scheduler = new GpuJobScheduler(collaborators.engine, receptor, {
      runId: layout.runId,
      poolWidth: config.poolWidth,
      retryBudget: config.retryBudget,
      timeoutMs: config.timeoutMs,
      backoff: config.backoff,
      log: schedulerLog,
      onTransition: (job) => {
        schedulerLog.debug(`${job.id} -> ${job.status}${job.failure ? ` (${job.failure.reason})` : ""}`);
      },
    });
    const onAbort = () => scheduler.cancel();
    signal?.addEventListener("abort", onAbort, { once: true });

    const preparer = new LigandPreparer(collaborators.converter, layout, receptor, {
      timeoutMs: config.prepareTimeoutMs,
      log: this.log.child("prepare"),
    });
    const inflight = new Set<Promise<void>>();
    let nextBatch = 0;
    try {
      for (const bounds of plan) {
        // keep preparation at most one pool ahead of docking
        while (scheduler.queuedCount >= config.poolWidth && inflight.size > 0) await Promise.race(inflight);
        if (signal?.aborted) break;

        let workList: WorkList;
        try {
          workList = await preparer.prepare(await plan.batchAt(bounds.index), signal);
        } catch (e) {
          if (signal?.aborted) break;
          // a batch that cannot be staged is excluded; the others go on
          nextBatch = bounds.index + 1;
          this.log.warn(`${bounds.label} excluded: PreparationFailed ${errorMessage(e)}`);
          await settle(failedBeforeDocking(bounds.index, "PreparationFailed", errorMessage(e)));
          continue;
        }
        nextBatch = bounds.index + 1;
        skipped.push(...workList.skipped);
        const settled: Promise<void> = scheduler
          .submit(workList)
          .then((job) => {
            const s = statusOf(job, workList);
            if (job.status === "succeeded" && job.report) aggregator.add(job.report);
            else this.log.warn(`${s.label} excluded: ${s.reason ?? "unknown"} ${s.message ?? ""}`.trimEnd());
            return settle(s);
          })
          .finally(() => inflight.delete(settled));
        inflight.add(settled);
      }
      await Promise.all(inflight);
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }

    if (signal?.aborted) await recordCancelled(nextBatch);
    await statusLog.flush();

    const out = report(signal?.aborted ? "cancelled" : "completed");
    const { candidates, ligands } = aggregator.stats;
    const docked = out.batches.length - out.failedBatches.length;
    const best = out.result.kind === "best" ? `best ${out.result.best.energy} (${out.result.best.ligandId})` : "no favourable binding";
    this.log.info(
      `Run ${out.runId} ${out.status}: ${docked}/${out.batchCount} batches docked, ` +
        `${ligands} ligands scored, ${candidates} favourable, ${best}`,
    );
    if (out.status === "completed" && out.failedBatches.length === out.batchCount) {
      throw new RunFailedError(out.runId, out.failedBatches);
    }
    return out;
  }
}
