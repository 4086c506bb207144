import type { BatchStatus } from "./types/pipeline.js";

export type ErrorCode =
  | "InvalidInput"
  | "ConversionFailed"
  | "EngineError"
  | "MissingReport"
  | "ReceptorPreparationFailed"
  | "RunFailed";

export class DockBatchError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DockBatchError";
  }
}

export class InvalidInputError extends DockBatchError {
  constructor(message: string, public readonly issues: string[] = []) {
    super("InvalidInput", issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "InvalidInputError";
  }
}

export class ConversionFailedError extends DockBatchError {
  constructor(public readonly ligandId: string, detail: string, options?: { cause?: unknown }) {
    super("ConversionFailed", `Cannot convert ligand ${ligandId}: ${detail}`, options);
    this.name = "ConversionFailedError";
  }
}

export class EngineError extends DockBatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EngineError", message, options);
    this.name = "EngineError";
  }
}

export class MissingReportError extends DockBatchError {
  constructor(public readonly batchIndex: number, public readonly path: string, detail: string) {
    super("MissingReport", `batch_${batchIndex}: ${detail} (${path})`);
    this.name = "MissingReportError";
  }
}

export class ReceptorPreparationFailedError extends DockBatchError {
  constructor(public readonly structureId: string, detail: string, options?: { cause?: unknown }) {
    super("ReceptorPreparationFailed", `Receptor ${structureId} could not be prepared: ${detail}`, options);
    this.name = "ReceptorPreparationFailedError";
  }
}

export class RunFailedError extends DockBatchError {
  constructor(public readonly runId: string, public readonly failures: BatchStatus[]) {
    super(
      "RunFailed",
      `Run ${runId} failed: ${failures.map((f) => `${f.label}=${f.reason ?? "unknown"}`).join(", ")}`,
    );
    this.name = "RunFailedError";
  }
}

export function formatError(err: unknown): string {
  if (err instanceof Error) return err.stack || err.message || err.name;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
