import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { DockingEngine, DockingRequest } from "../src/dock/engine.js";
import { expectedReportPath } from "../src/dock/report.js";
import { ConversionFailedError, EngineError } from "../src/errors.js";
import type { LigandConverter } from "../src/prepare/ligands.js";
import type { ReceptorPreparer } from "../src/prepare/receptor.js";
import type { LigandRecord, Receptor } from "../src/types/pipeline.js";
import type { Logger } from "../src/utils/log.js";

export function sdfRecord(title: string): string {
  return `${title}\n  test-mol\n\n  1  0  0  0  0  0            999 V2000\nM  END\n$$$$\n`;
}

export function makeSdf(count: number, prefix = "LIG"): string {
  let out = "";
  for (let i = 0; i < count; i++) out += sdfRecord(`${prefix}${i}`);
  return out;
}

export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), "dock-batch-"));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

export function rankingLine(rank: number, subRank: number, run: number, energy: number): string {
  return `   ${rank}      ${subRank}      ${run}      ${energy.toFixed(2)}      0.00     12.34           RANKING`;
}

/** Docking log with the given energies as cluster ranks 1..n. */
export function dlgText(energies: number[]): string {
  const rows = energies.map((e, i) => rankingLine(i + 1, 1, i + 3, e));
  return ["    CLUSTERING HISTOGRAM", "", ...rows, "", "Run time 1.2 sec"].join("\n") + "\n";
}

export function fakeReceptor(dir: string, id = "1abc"): Receptor {
  return {
    id,
    directory: dir,
    structurePath: join(dir, `${id}.pdb`),
    nativePath: join(dir, `${id}.pdbqt`),
    gridDescriptorPath: join(dir, `${id}.maps.fld`),
    mapPaths: [join(dir, `${id}.C.map`), join(dir, `${id}.e.map`), join(dir, `${id}.d.map`)],
  };
}

export class FakeReceptorPreparer implements ReceptorPreparer {
  calls = 0;
  constructor(
    private readonly fail = false,
    private readonly hang = false,
  ) {}

  async prepare(structureId: string, directory: string): Promise<Receptor> {
    this.calls++;
    if (this.fail) throw new Error("grid tool crashed");
    if (this.hang) await new Promise<never>(() => undefined);
    await mkdir(directory, { recursive: true });
    const r = fakeReceptor(directory, structureId);
    await writeFile(r.gridDescriptorPath, "# fld\n", "utf8");
    return r;
  }
}

export interface FakeConverterOptions {
  /** ids whose conversion never settles, signal or not */
  hang?: string[];
  /** runs before each conversion */
  before?: (record: LigandRecord) => Promise<void>;
}

export class FakeConverter implements LigandConverter {
  constructor(
    private readonly unconvertible: Set<string> = new Set(),
    private readonly opts: FakeConverterOptions = {},
  ) {}

  async convert(record: LigandRecord): Promise<string> {
    await this.opts.before?.(record);
    if (this.opts.hang?.includes(record.ligandId)) await new Promise<never>(() => undefined);
    if (this.unconvertible.has(record.ligandId)) throw new ConversionFailedError(record.ligandId, "bad valence");
    return `REMARK ${record.ligandId}\nROOT\nENDROOT\nTORSDOF 0\n`;
  }
}

export interface FakeEngineOptions {
  /** rank-1 energy per ligand id; missing ids get -1 */
  energies?: Record<string, number>;
  /** number of leading attempts that throw, per batch index */
  failures?: Record<number, number>;
  /** batches whose reports are never written */
  withoutReports?: number[];
  /** batches that never settle unless aborted */
  hang?: number[];
  delayMs?: number;
}

export class FakeEngine implements DockingEngine {
  active = 0;
  maxActive = 0;
  readonly started: number[] = [];
  readonly attempts = new Map<number, number>();

  constructor(private readonly opts: FakeEngineOptions = {}) {}

  async dock({ workList, signal }: DockingRequest): Promise<string[]> {
    const b = workList.batch.index;
    this.started.push(b);
    const n = (this.attempts.get(b) ?? 0) + 1;
    this.attempts.set(b, n);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.opts.hang?.includes(b)) {
        await new Promise<void>((_, reject) => {
          signal.addEventListener("abort", () => reject(new Error("killed")), { once: true });
        });
      }
      await new Promise((r) => setTimeout(r, this.opts.delayMs ?? 5));
      if (n <= (this.opts.failures?.[b] ?? 0)) throw new EngineError(`engine crash on batch_${b} attempt ${n}`);
      if (this.opts.withoutReports?.includes(b)) return [];
      const paths: string[] = [];
      for (const l of workList.ligands) {
        const p = expectedReportPath(workList, l);
        const energy = this.opts.energies?.[l.ligandId] ?? -1;
        await writeFile(p, dlgText([energy, energy + 1.5]), "utf8");
        paths.push(p);
      }
      return paths;
    } finally {
      this.active--;
    }
  }
}

/** Keeps every message as "<level> <message>"; children share the same list. */
export class RecordingLogger implements Logger {
  readonly lines: string[] = [];

  debug(message: string): void {
    this.lines.push(`debug ${message}`);
  }
  info(message: string): void {
    this.lines.push(`info ${message}`);
  }
  warn(message: string): void {
    this.lines.push(`warn ${message}`);
  }
  error(message: string): void {
    this.lines.push(`error ${message}`);
  }
  child(): Logger {
    return this;
  }
}
