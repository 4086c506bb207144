import { mkdir, rm, writeFile } from "node:fs/promises";
import type { Batch, LigandRecord, PreparedLigand, Receptor, SkippedLigand, WorkList } from "../types/pipeline.js";
import { ConversionFailedError, errorMessage } from "../errors.js";
import type { RunLayout } from "../run/layout.js";
import { runTool } from "../utils/exec.js";
import { withDeadline } from "../utils/deadline.js";
import { silentLogger, type Logger } from "../utils/log.js";

/** Turns one SDF record into docking-native (PDBQT) text. */
export interface LigandConverter {
  convert(record: LigandRecord, signal?: AbortSignal): Promise<string>;
}

export class ObabelConverter implements LigandConverter {
  constructor(private readonly obabel = "obabel", private readonly extraArgs: string[] = ["-p", "7"]) {}

  async convert(record: LigandRecord, signal?: AbortSignal): Promise<string> {
    let stdout: string;
    try {
      ({ stdout } = await runTool(this.obabel, ["-isdf", "-opdbqt", ...this.extraArgs], { input: record.text, signal }));
    } catch (e) {
      throw new ConversionFailedError(record.ligandId, errorMessage(e), { cause: e });
    }
    if (!stdout.trim()) throw new ConversionFailedError(record.ligandId, "converter produced no output");
    return stdout;
  }
}

export function fileListText(gridDescriptorPath: string, ligands: PreparedLigand[]): string {
  return [gridDescriptorPath, ...ligands.map((l) => l.nativePath)].join("\n") + "\n";
}

export interface LigandPreparerOptions {
  /** per-ligand conversion limit; a ligand that runs over is skipped */
  timeoutMs?: number;
  log?: Logger;
}

export class LigandPreparer {
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(
    private readonly converter: LigandConverter,
    private readonly layout: RunLayout,
    private readonly receptor: Pick<Receptor, "gridDescriptorPath">,
    opts: LigandPreparerOptions = {},
  ) {
    this.timeoutMs = opts.timeoutMs ?? 60_000;
    this.log = opts.log ?? silentLogger;
  }

  async prepare(batch: Batch, signal?: AbortSignal): Promise<WorkList> {
    const directory = this.layout.batchDirectory(batch.index);
    const reportDirectory = this.layout.reportDirectory(batch.index);
    await mkdir(directory, { recursive: true });
    // reports from an earlier run of the same batch must not be mistaken for fresh ones
    await rm(reportDirectory, { recursive: true, force: true });
    await mkdir(reportDirectory, { recursive: true });

    const ligands: PreparedLigand[] = [];
    const skipped: SkippedLigand[] = [];
    for (const record of batch.records) {
      signal?.throwIfAborted();
      let native: string;
      try {
        native = await withDeadline((s) => this.converter.convert(record, s), {
          timeoutMs: this.timeoutMs,
          signal,
          onTimeout: () => new ConversionFailedError(record.ligandId, `timed out after ${this.timeoutMs} ms`),
        });
      } catch (e) {
        if (signal?.aborted) throw e;
        const reason = errorMessage(e);
        skipped.push({ ligandId: record.ligandId, recordIndex: record.index, reason });
        this.log.warn(`${batch.label}: skipping ${record.ligandId} (${reason})`);
        continue;
      }
      const nativePath = this.layout.ligandPath(batch.index, record.index);
      await writeFile(nativePath, native, "utf8");
      const ordinal = record.index - batch.firstRecord;
      ligands.push({ ligandId: record.ligandId, recordIndex: record.index, ordinal, nativePath });
    }

    const fileListPath = this.layout.fileListPath(batch.index);
    await writeFile(fileListPath, fileListText(this.receptor.gridDescriptorPath, ligands), "utf8");
    this.log.debug(`${batch.label}: ${ligands.length} ligands prepared, ${skipped.length} skipped`);

    return {
      batch: { index: batch.index, label: batch.label, firstRecord: batch.firstRecord, size: batch.size },
      directory,
      fileListPath,
      reportDirectory,
      ligands,
      skipped,
    };
  }
}
