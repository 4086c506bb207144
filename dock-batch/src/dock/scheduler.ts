import { mkdir, rm } from "node:fs/promises";
import type { DockingJob, FailureReason, JobReport, Receptor, WorkList } from "../types/pipeline.js";
import { EngineError, InvalidInputError, MissingReportError, errorMessage } from "../errors.js";
import { withDeadline } from "../utils/deadline.js";
import { silentLogger, type Logger } from "../utils/log.js";
import type { DockingEngine } from "./engine.js";
import { readBatchReports } from "./report.js";

export interface BackoffOptions {
  initialDelayMs: number;
  factor: number; // 1 = fixed delay
  maxDelayMs: number;
}

export interface SchedulerOptions {
  runId: string;
  /** GPU execution slots */
  poolWidth: number;
  /** retries after the first attempt; a job runs at most retryBudget + 1 times */
  retryBudget: number;
  timeoutMs: number;
  backoff?: BackoffOptions;
  log?: Logger;
  onTransition?: (job: DockingJob) => void;
}

interface Entry {
  seq: number;
  job: DockingJob;
  workList: WorkList;
  resolve: (job: DockingJob) => void;
  retryTimer?: ReturnType<typeof setTimeout>;
}

type AttemptOutcome =
  | { ok: true; reports: string[]; report: JobReport }
  | { ok: false; reason: FailureReason; message: string; retryable: boolean };

export function backoffDelay(b: BackoffOptions, retry: number): number {
  return Math.min(b.maxDelayMs, b.initialDelayMs * Math.pow(b.factor, Math.max(0, retry - 1)));
}

function snapshot(job: DockingJob): DockingJob {
  return { ...job, reports: job.reports.slice(), history: job.history.slice() };
}

/**
 * Fixed-width pool of docking slots. Admission is FIFO by submission sequence;
 * a retried job goes back to its original place in line.
 */
export class GpuJobScheduler {
  private readonly queue: Entry[] = [];
  private readonly backingOff = new Set<Entry>();
  private readonly backoff: BackoffOptions;
  private readonly log: Logger;
  private running = 0;
  private peak = 0;
  private seq = 0;
  private cancelled = false;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly engine: DockingEngine,
    private readonly receptor: Receptor,
    private readonly opts: SchedulerOptions,
  ) {
    const issues: string[] = [];
    if (!Number.isInteger(opts.poolWidth) || opts.poolWidth < 1) issues.push(`poolWidth=${opts.poolWidth}`);
    if (!Number.isInteger(opts.retryBudget) || opts.retryBudget < 0) issues.push(`retryBudget=${opts.retryBudget}`);
    if (!(opts.timeoutMs > 0)) issues.push(`timeoutMs=${opts.timeoutMs}`);
    if (issues.length) throw new InvalidInputError("Invalid scheduler options", issues);
    this.backoff = opts.backoff ?? { initialDelayMs: 1000, factor: 2, maxDelayMs: 60_000 };
    this.log = opts.log ?? silentLogger;
  }

  get runningCount(): number {
    return this.running;
  }

  /** highest number of simultaneously running jobs seen so far */
  get peakRunning(): number {
    return this.peak;
  }

  get queuedCount(): number {
    return this.queue.length + this.backingOff.size;
  }

  submit(workList: WorkList): Promise<DockingJob> {
    const job: DockingJob = {
      id: `${this.opts.runId}/${workList.batch.label}`,
      batchIndex: workList.batch.index,
      status: "queued",
      attempts: 0,
      reports: [],
      history: [],
    };
    return new Promise<DockingJob>((resolve) => {
      const entry: Entry = { seq: this.seq++, job, workList, resolve };
      if (this.cancelled) return this.finish(entry, { reason: "Cancelled", message: "run cancelled before admission" });
      if (workList.ligands.length === 0) {
        return this.finish(entry, {
          reason: "ConversionFailed",
          message: `no ligand in ${workList.batch.label} could be converted`,
        });
      }
      this.notify(job);
      this.enqueue(entry);
      this.pump();
    });
  }

  /** Submit several batches at once; ties are sequenced by batch index. */
  submitAll(workLists: WorkList[]): Array<Promise<DockingJob>> {
    return workLists
      .slice()
      .sort((a, b) => a.batch.index - b.batch.index)
      .map((w) => this.submit(w));
  }

  /** Stop admitting work. Queued jobs fail as Cancelled; running jobs are left to finish or time out. */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    const pending = [...this.queue.splice(0), ...this.backingOff];
    this.backingOff.clear();
    for (const entry of pending) {
      if (entry.retryTimer) clearTimeout(entry.retryTimer);
      this.finish(entry, { reason: "Cancelled", message: "run cancelled" });
    }
    this.log.info(`Cancelled: ${pending.length} queued jobs dropped, ${this.running} still running`);
    this.checkIdle();
  }

  idle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  private isIdle(): boolean {
    return this.running === 0 && this.queue.length === 0 && this.backingOff.size === 0;
  }

  private checkIdle() {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const w of waiters) w();
  }

  private enqueue(entry: Entry) {
    let i = this.queue.length;
    while (i > 0 && this.queue[i - 1].seq > entry.seq) i--;
    this.queue.splice(i, 0, entry);
  }

  private pump() {
    while (!this.cancelled && this.running < this.opts.poolWidth && this.queue.length > 0) {
      const entry = this.queue.shift();
      if (!entry) break;
      void this.execute(entry);
    }
  }

  private notify(job: DockingJob) {
    this.opts.onTransition?.(snapshot(job));
  }

  private finish(entry: Entry, failure?: { reason: FailureReason; message: string }) {
    const job = entry.job;
    if (failure) {
      job.status = "failed";
      job.failure = failure;
    } else {
      job.status = "succeeded";
    }
    this.notify(job);
    entry.resolve(snapshot(job));
  }

  private async execute(entry: Entry): Promise<void> {
    const job = entry.job;
    this.running++;
    this.peak = Math.max(this.peak, this.running);
    job.status = "running";
    job.attempts++;
    this.notify(job);
    this.log.debug(`${job.id} attempt ${job.attempts} started (${this.running}/${this.opts.poolWidth} slots)`);

    let outcome: AttemptOutcome;
    try {
      outcome = await this.attempt(entry);
    } catch (e) {
      outcome = { ok: false, reason: "EngineError", message: errorMessage(e), retryable: true };
    }
    this.running--;

    if (outcome.ok) {
      job.reports = outcome.reports;
      job.report = outcome.report;
      this.finish(entry);
      this.log.debug(`${job.id} succeeded after ${job.attempts} attempt(s)`);
    } else {
      job.history.push(`${outcome.reason}: ${outcome.message}`);
      if (outcome.retryable && job.attempts <= this.opts.retryBudget && !this.cancelled) {
        this.scheduleRetry(entry);
      } else {
        this.finish(entry, { reason: outcome.reason, message: outcome.message });
        this.log.warn(`${job.id} failed (${outcome.reason}) after ${job.attempts} attempt(s): ${outcome.message}`);
      }
    }
    this.pump();
    this.checkIdle();
  }

  private async attempt(entry: Entry): Promise<AttemptOutcome> {
    const { job, workList } = entry;
    if (job.attempts > 1) {
      await rm(workList.reportDirectory, { recursive: true, force: true });
      await mkdir(workList.reportDirectory, { recursive: true });
    }

    let reports: string[];
    try {
      reports = await withDeadline(
        (signal) => this.engine.dock({ workList, receptor: this.receptor, attempt: job.attempts, signal }),
        {
          timeoutMs: this.opts.timeoutMs,
          onTimeout: () => new EngineError(`${job.id} timed out after ${this.opts.timeoutMs} ms`),
        },
      );
    } catch (e) {
      return { ok: false, reason: "EngineError", message: errorMessage(e), retryable: true };
    }

    try {
      const report = await readBatchReports(workList);
      return { ok: true, reports, report };
    } catch (e) {
      if (e instanceof MissingReportError) {
        return { ok: false, reason: "MissingReport", message: e.message, retryable: false };
      }
      throw e;
    }
  }

  private scheduleRetry(entry: Entry) {
    const job = entry.job;
    const delay = backoffDelay(this.backoff, job.attempts);
    job.status = "queued";
    this.notify(job);
    this.log.info(`${job.id} retry ${job.attempts}/${this.opts.retryBudget} in ${delay} ms`);
    this.backingOff.add(entry);
    entry.retryTimer = setTimeout(() => {
      entry.retryTimer = undefined;
      this.backingOff.delete(entry);
      this.enqueue(entry);
      this.pump();
    }, delay);
  }
}
