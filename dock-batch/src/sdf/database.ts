import { createReadStream } from "node:fs";
import { open } from "node:fs/promises";
import { basename, extname } from "node:path";
import type { LigandDatabase, LigandRecord, RecordSource } from "../types/pipeline.js";
import { InvalidInputError, errorMessage } from "../errors.js";
import { WarningCollector } from "../utils/warnings.js";

/** SDF record terminator; any line containing it closes a record. */
export const RECORD_SEPARATOR = "$$$$";

const NEWLINE = 0x0a;

function isBlank(buf: Buffer, from: number, to: number): boolean {
  for (let i = from; i < to; i++) {
    const c = buf[i];
    // space, \t, \r, \v, \f
    if (c !== 0x20 && (c < 0x09 || c > 0x0d)) return false;
  }
  return true;
}

/**
 * Incremental record index over a byte stream. Chunks may split lines anywhere;
 * only the unfinished tail line is carried between pushes.
 */
export class RecordIndexer {
  private readonly W = new WarningCollector();
  private readonly starts: number[] = [];
  private readonly ends: number[] = [];
  private carry: Buffer = Buffer.alloc(0);
  private offset = 0; // byte offset of carry[0]
  private recordStart = 0;
  private pendingContent = false;
  private lineNum = 0;

  push(chunk: Buffer): void {
    const buf = this.carry.length ? Buffer.concat([this.carry, chunk]) : chunk;
    let i = 0;
    for (let j = buf.indexOf(NEWLINE, i); j !== -1; j = buf.indexOf(NEWLINE, i)) {
      this.line(buf, i, j, this.offset + j + 1);
      i = j + 1;
    }
    this.carry = buf.subarray(i);
    this.offset += i;
  }

  private line(buf: Buffer, from: number, to: number, next: number) {
    this.lineNum++;
    const line = buf.subarray(from, to);
    if (line.includes(RECORD_SEPARATOR)) {
      this.starts.push(this.recordStart);
      this.ends.push(next);
      this.recordStart = next;
      this.pendingContent = false;
    } else if (!this.pendingContent && !isBlank(buf, from, to)) {
      this.pendingContent = true;
    }
  }

  finish(): { recordStart: Float64Array; recordEnd: Float64Array; byteLength: number; warnings: string[] } {
    if (this.carry.length) {
      const end = this.offset + this.carry.length;
      this.line(this.carry, 0, this.carry.length, end);
      this.offset = end;
      this.carry = Buffer.alloc(0);
    }
    // Trailing record without a terminator still counts; pure whitespace does not.
    if (this.pendingContent) {
      this.W.add(`Record ${this.starts.length} (ends at line ${this.lineNum}) has no ${RECORD_SEPARATOR} terminator`);
      this.starts.push(this.recordStart);
      this.ends.push(this.offset);
      this.pendingContent = false;
    }
    return {
      recordStart: Float64Array.from(this.starts),
      recordEnd: Float64Array.from(this.ends),
      byteLength: this.offset,
      warnings: this.W.toArray(),
    };
  }
}

class BufferSource implements RecordSource {
  constructor(private readonly buf: Buffer) {}

  async read(start: number, end: number): Promise<Buffer> {
    return this.buf.subarray(start, end);
  }
}

/** Reads byte ranges on demand; the file is never held in memory as a whole. */
class FileSource implements RecordSource {
  constructor(private readonly path: string) {}

  async read(start: number, end: number): Promise<Buffer> {
    const out = Buffer.alloc(end - start);
    const fh = await open(this.path, "r");
    try {
      let filled = 0;
      while (filled < out.length) {
        const { bytesRead } = await fh.read(out, filled, out.length - filled, start + filled);
        if (bytesRead === 0) throw new Error(`${this.path} shrank while reading bytes ${start}-${end}`);
        filled += bytesRead;
      }
    } finally {
      await fh.close();
    }
    return out;
  }
}

export function ligandDatabaseFromText(name: string, text: string, path?: string): LigandDatabase {
  const buf = Buffer.from(text, "utf8");
  const ix = new RecordIndexer();
  ix.push(buf);
  const index = ix.finish();
  return { name, path, source: new BufferSource(buf), recordCount: index.recordStart.length, ...index };
}

export interface LoadOptions {
  /** defaults to the file name without its extension */
  name?: string;
  /** read-stream chunk size in bytes */
  chunkSize?: number;
}

/** Indexes an SDF file in one streamed pass; records are read back by byte range. */
export async function loadLigandDatabase(path: string, opts: LoadOptions = {}): Promise<LigandDatabase> {
  const ix = new RecordIndexer();
  try {
    for await (const chunk of createReadStream(path, { highWaterMark: opts.chunkSize ?? 1 << 20 })) {
      if (Buffer.isBuffer(chunk)) ix.push(chunk);
    }
  } catch (e) {
    throw new InvalidInputError(`Cannot read ligand database ${path}`, [errorMessage(e)]);
  }
  const index = ix.finish();
  return {
    name: opts.name ?? basename(path, extname(path)),
    path,
    source: new FileSource(path),
    recordCount: index.recordStart.length,
    ...index,
  };
}

function checkRange(db: LigandDatabase, first: number, count: number) {
  if (!Number.isInteger(first) || !Number.isInteger(count) || first < 0 || count < 1 || first + count > db.recordCount) {
    throw new RangeError(`Records [${first}, ${first + count}) out of range [0, ${db.recordCount})`);
  }
}

/** Reads `count` consecutive records with a single range read. */
export async function readLigandRecords(db: LigandDatabase, first: number, count: number): Promise<LigandRecord[]> {
  checkRange(db, first, count);
  const base = db.recordStart[first];
  const bytes = await db.source.read(base, db.recordEnd[first + count - 1]);
  const records: LigandRecord[] = [];
  for (let r = first; r < first + count; r++) {
    const text = bytes.subarray(db.recordStart[r] - base, db.recordEnd[r] - base).toString("utf8");
    records.push({ index: r, ligandId: ligandIdOf(db.name, r, text), text });
  }
  return records;
}

export async function getLigandRecord(db: LigandDatabase, index: number): Promise<LigandRecord> {
  const [record] = await readLigandRecords(db, index, 1);
  return record;
}

function ligandIdOf(dbName: string, index: number, recordText: string): string {
  const nl = recordText.indexOf("\n");
  const title = (nl === -1 ? recordText : recordText.substring(0, nl)).trim();
  // A record consisting of the separator alone has no usable title
  if (!title || title.includes(RECORD_SEPARATOR)) return `${dbName}_${index}`;
  return title;
}
