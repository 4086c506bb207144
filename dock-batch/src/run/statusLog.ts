import { appendFile, mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { BatchStatus } from "../types/pipeline.js";

export interface StatusLogEntry extends BatchStatus {
  runId: string;
  at: string; // ISO timestamp
}

/** Append-only JSON-lines record of per-batch terminal states. */
export class StatusLog {
  private chain: Promise<void> = Promise.resolve();

  constructor(readonly path: string, private readonly runId: string, private readonly now: () => Date = () => new Date()) {}

  async reset(): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, "", "utf8");
  }

  /**
   * Writes are serialized so lines never interleave. A failed append rejects
   * its own promise only; later appends still run.
   */
  record(status: BatchStatus): Promise<void> {
    const entry: StatusLogEntry = { runId: this.runId, at: this.now().toISOString(), ...status };
    const line = JSON.stringify(entry) + "\n";
    const write = this.chain.then(() => appendFile(this.path, line, "utf8"));
    this.chain = write.then(
      () => undefined,
      () => undefined,
    );
    return write;
  }

  /** Resolves once every pending append has settled. */
  flush(): Promise<void> {
    return this.chain;
  }
}
