import type { Batch, BatchBounds, LigandDatabase } from "../types/pipeline.js";
import { InvalidInputError } from "../errors.js";
import { readLigandRecords } from "./database.js";

export function batchLabel(index: number): string {
  return `batch_${index}`;
}

/**
 * Lazy, restartable view of a database cut into batches of `batchSize` records.
 * Boundaries depend only on the separator count, so the same database and size
 * always give the same batches. Iterating yields bounds only; record text is
 * read from the source when a batch is materialized.
 */
export class BatchPlan implements Iterable<BatchBounds> {
  readonly count: number;
  /** first record index of each batch, plus a final sentinel = recordCount */
  private readonly offsets: Uint32Array;

  constructor(readonly database: LigandDatabase, readonly batchSize: number) {
    const offsets: number[] = [0];
    let seen = 0;
    for (let r = 0; r < database.recordCount; r++) {
      seen++;
      if (seen === batchSize) {
        offsets.push(r + 1);
        seen = 0;
      }
    }
    // flush the short tail
    if (seen > 0) offsets.push(database.recordCount);
    this.offsets = Uint32Array.from(offsets);
    this.count = offsets.length - 1;
  }

  boundsAt(index: number): BatchBounds {
    if (!Number.isInteger(index) || index < 0 || index >= this.count) {
      throw new RangeError(`Batch ${index} out of range [0, ${this.count})`);
    }
    const first = this.offsets[index];
    return { index, label: batchLabel(index), firstRecord: first, size: this.offsets[index + 1] - first };
  }

  async batchAt(index: number): Promise<Batch> {
    const bounds = this.boundsAt(index);
    return { ...bounds, records: await readLigandRecords(this.database, bounds.firstRecord, bounds.size) };
  }

  /** Raw bytes of one batch, exactly as they appear in the database. */
  async payload(index: number): Promise<Buffer> {
    const b = this.boundsAt(index);
    const db = this.database;
    return db.source.read(db.recordStart[b.firstRecord], db.recordEnd[b.firstRecord + b.size - 1]);
  }

  *[Symbol.iterator](): Iterator<BatchBounds> {
    for (let i = 0; i < this.count; i++) yield this.boundsAt(i);
  }

  async *batches(): AsyncGenerator<Batch> {
    for (let i = 0; i < this.count; i++) yield await this.batchAt(i);
  }
}

export function splitDatabase(database: LigandDatabase, batchSize: number): BatchPlan {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new InvalidInputError(`Batch size must be a positive integer, got ${batchSize}`);
  }
  if (database.recordCount === 0) {
    throw new InvalidInputError(`Ligand database ${database.name} contains no records`);
  }
  return new BatchPlan(database, batchSize);
}
