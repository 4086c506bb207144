import { describe, it, expect } from "vitest";
import { access, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { parseConfig, type PipelineConfigInput } from "../src/config.js";
import { InvalidInputError, ReceptorPreparationFailedError, RunFailedError } from "../src/errors.js";
import { PipelineCoordinator, type Collaborators } from "../src/run/coordinator.js";
import type { StatusLogEntry } from "../src/run/statusLog.js";
import { ligandDatabaseFromText } from "../src/sdf/database.js";
import type { LigandRecord } from "../src/types/pipeline.js";
import type { Logger } from "../src/utils/log.js";
import {
  FakeConverter,
  FakeEngine,
  FakeReceptorPreparer,
  RecordingLogger,
  makeSdf,
  makeTempDir,
  type FakeEngineOptions,
} from "./helpers.js";

interface Setup {
  engine?: FakeEngineOptions;
  config?: PipelineConfigInput;
  converter?: FakeConverter;
  receptorPreparer?: FakeReceptorPreparer;
  log?: Logger;
}

function setup(workDir: string, opts: Setup = {}) {
  const collaborators = {
    receptorPreparer: opts.receptorPreparer ?? new FakeReceptorPreparer(),
    converter: opts.converter ?? new FakeConverter(),
    engine: new FakeEngine(opts.engine),
  } satisfies Collaborators;
  const cfg = parseConfig({
    workDir,
    batchSize: 10,
    poolWidth: 1,
    retryBudget: 2,
    timeoutMs: 5_000,
    backoff: { initialDelayMs: 0, factor: 2, maxDelayMs: 0 },
    logLevel: "silent",
    ...opts.config,
  });
  return { collaborators, coordinator: new PipelineCoordinator(cfg, collaborators, opts.log) };
}

async function readStatusLog(path: string): Promise<StatusLogEntry[]> {
  const text = await readFile(path, "utf8");
  return text
    .split("\n")
    .filter((l) => l.trim())
    .map((l): StatusLogEntry => JSON.parse(l))
    .sort((a, b) => a.batchIndex - b.batchIndex);
}

const db = () => ligandDatabaseFromText("db", makeSdf(25));

describe("PipelineCoordinator", () => {
  it("docks every batch and reports the most favourable ligand", async () => {
    const { dir, cleanup } = await makeTempDir();
    try {
      const { coordinator, collaborators } = setup(dir, { engine: { energies: { LIG7: -9.1, LIG18: -8.0 } } });
      const report = await coordinator.run({ receptorId: "1ABC", database: db() });

      expect(report.runId).toBe("1abc_db");
      expect(report.receptorId).toBe("1abc");
      expect(report.status).toBe("completed");
      expect(report.batchCount).toBe(3);
      expect(report.result).toEqual({
        kind: "best",
        best: { ligandId: "LIG7", batchIndex: 0, ordinal: 7, energy: -9.1 },
        leaders: [{ ligandId: "LIG7", batchIndex: 0, ordinal: 7, energy: -9.1 }],
      });
      expect(report.batches.map((b) => [b.label, b.status, b.ligands])).toEqual([
        ["batch_0", "succeeded", 10],
        ["batch_1", "succeeded", 10],
        ["batch_2", "succeeded", 5],
      ]);
      expect(report.failedBatches).toEqual([]);
      expect(collaborators.receptorPreparer.calls).toBe(1);
      expect(report.statusLogPath).toBe(join(dir, "1abc_db", "status.jsonl"));

      const entries = await readStatusLog(report.statusLogPath);
      expect(entries.map((e) => [e.runId, e.label, e.status, e.attempts])).toEqual([
        ["1abc_db", "batch_0", "succeeded", 1],
        ["1abc_db", "batch_1", "succeeded", 1],
        ["1abc_db", "batch_2", "succeeded", 1],
      ]);
    } finally {
      await cleanup();
    }
  });

  it("excludes a batch that keeps failing and still returns a result", async () => {
    const { dir, cleanup } = await makeTempDir();
    try {
      const { coordinator, collaborators } = setup(dir, { engine: { failures: { 1: 3 }, energies: { LIG12: -20, LIG21: -4.4 } } });
      const report = await coordinator.run({ receptorId: "1abc", database: db() });

      expect(report.status).toBe("completed");
      expect(report.result.kind === "best" && report.result.best.ligandId).toBe("LIG21");
      expect(report.failedBatches.map((b) => [b.label, b.reason, b.attempts])).toEqual([["batch_1", "EngineError", 3]]);
      expect(collaborators.engine.attempts.get(1)).toBe(3);

      const entries = await readStatusLog(report.statusLogPath);
      expect(entries.map((e) => `${e.label}:${e.status}`)).toEqual(["batch_0:succeeded", "batch_1:failed", "batch_2:succeeded"]);
    } finally {
      await cleanup();
    }
  });

  it("reports skipped ligands alongside the result", async () => {
    const { dir, cleanup } = await makeTempDir();
    try {
      const { coordinator } = setup(dir, { converter: new FakeConverter(new Set(["LIG3", "LIG20"])) });
      const report = await coordinator.run({ receptorId: "1abc", database: db() });
      expect(report.skippedLigands.map((s) => [s.ligandId, s.recordIndex])).toEqual([["LIG3", 3], ["LIG20", 20]]);
      expect(report.batches.map((b) => b.skippedLigands)).toEqual([1, 0, 1]);
      expect(report.batches[2].ligands).toBe(4);
    } finally {
      await cleanup();
    }
  });

  it("gives the same answer when run again in the same directory", async () => {
    const { dir, cleanup } = await makeTempDir();
    try {
      const first = await setup(dir, { engine: { energies: { LIG11: -6.6 } } }).coordinator.run({ receptorId: "1abc", database: db() });
      const second = await setup(dir, { engine: { energies: { LIG11: -6.6 } } }).coordinator.run({ receptorId: "1abc", database: db() });
      expect(second.result).toEqual(first.result);
      expect(await readStatusLog(second.statusLogPath)).toHaveLength(3);
    } finally {
      await cleanup();
    }
  });

  it("stops the run when the receptor cannot be prepared", async () => {
    const { dir, cleanup } = await makeTempDir();
    try {
      const { coordinator, collaborators } = setup(dir, { receptorPreparer: new FakeReceptorPreparer(true) });
      const run = coordinator.run({ receptorId: "1abc", database: db() });
      await expect(run).rejects.toBeInstanceOf(ReceptorPreparationFailedError);
      await expect(run).rejects.toThrow("Receptor 1abc could not be prepared: grid tool crashed");
      expect(collaborators.engine.started).toEqual([]);
    } finally {
      await cleanup();
    }
  });

  it("validates inputs before touching the disk", async () => {
    const { dir, cleanup } = await makeTempDir();
    try {
      const workDir = join(dir, "work");
      const { coordinator, collaborators } = setup(workDir);
      await expect(coordinator.run({ receptorId: "not-a-structure", database: db() })).rejects.toBeInstanceOf(InvalidInputError);
      await expect(coordinator.run({ receptorId: "1abc", database: ligandDatabaseFromText("empty", "") })).rejects.toBeInstanceOf(
        InvalidInputError,
      );
      await expect(coordinator.run({ receptorId: "1abc", database: join(dir, "missing.sdf") })).rejects.toBeInstanceOf(
        InvalidInputError,
      );
      await expect(access(workDir)).rejects.toThrow();
      expect(collaborators.receptorPreparer.calls).toBe(0);
    } finally {
      await cleanup();
    }
  });

  it("fails the run when every batch fails", async () => {
    const { dir, cleanup } = await makeTempDir();
    try {
      const { coordinator } = setup(dir, { engine: { withoutReports: [0, 1, 2] } });
      const run = coordinator.run({ receptorId: "1abc", database: db() });
      await expect(run).rejects.toBeInstanceOf(RunFailedError);
      await expect(run).rejects.toThrow("Run 1abc_db failed: batch_0=MissingReport, batch_1=MissingReport, batch_2=MissingReport");
    } finally {
      await cleanup();
    }
  });

  it("records untouched batches as cancelled when aborted before docking", async () => {
    const { dir, cleanup } = await makeTempDir();
    try {
      const { coordinator, collaborators } = setup(dir);
      const controller = new AbortController();
      controller.abort();
      const report = await coordinator.run({ receptorId: "1abc", database: db(), signal: controller.signal });
      expect(report.status).toBe("cancelled");
      expect(report.result).toEqual({ kind: "no-favorable-binding" });
      expect(report.failedBatches.map((b) => `${b.label}:${b.reason}`)).toEqual([
        "batch_0:Cancelled",
        "batch_1:Cancelled",
        "batch_2:Cancelled",
      ]);
      expect(collaborators.engine.started).toEqual([]);
    } finally {
      await cleanup();
    }
  });

  it("lets running batches finish when cancelled mid-run", async () => {
    const { dir, cleanup } = await makeTempDir();
    try {
      const controller = new AbortController();
      class AbortingConverter extends FakeConverter {
        override async convert(record: LigandRecord): Promise<string> {
          if (record.ligandId === "LIG10") controller.abort();
          return super.convert(record);
        }
      }
      const { coordinator, collaborators } = setup(dir, {
        engine: { energies: { LIG2: -5.5 }, delayMs: 20 },
        converter: new AbortingConverter(),
      });
      const report = await coordinator.run({ receptorId: "1abc", database: db(), signal: controller.signal });

      expect(report.status).toBe("cancelled");
      expect(report.batches.map((b) => `${b.label}:${b.status}:${b.reason ?? ""}`)).toEqual([
        "batch_0:succeeded:",
        "batch_1:failed:Cancelled",
        "batch_2:failed:Cancelled",
      ]);
      expect(report.result.kind === "best" && report.result.best.ligandId).toBe("LIG2");
      expect(collaborators.engine.started).toEqual([0]);
    } finally {
      await cleanup();
    }
  });

  it("records a batch that cannot be staged and docks the rest", async () => {
    const { dir, cleanup } = await makeTempDir();
    try {
      // a plain file where batch_1's directory should go
      const converter = new FakeConverter(new Set(), {
        before: async (record) => {
          if (record.ligandId === "LIG3") await writeFile(join(dir, "1abc_db", "batch_1"), "in the way", "utf8");
        },
      });
      const { coordinator, collaborators } = setup(dir, { converter, engine: { energies: { LIG3: -9 } } });
      const report = await coordinator.run({ receptorId: "1abc", database: db() });

      expect(report.status).toBe("completed");
      expect(report.result).toMatchObject({ kind: "best", best: { ligandId: "LIG3", batchIndex: 0, ordinal: 3, energy: -9 } });
      expect(report.batches.map((b) => `${b.label}:${b.status}:${b.reason ?? ""}`)).toEqual([
        "batch_0:succeeded:",
        "batch_1:failed:PreparationFailed",
        "batch_2:succeeded:",
      ]);
      expect(report.failedBatches[0]).toMatchObject({ attempts: 0, ligands: 0, skippedLigands: 0 });
      expect(report.failedBatches[0].message).toMatch(/EEXIST|ENOTDIR/);
      expect(collaborators.engine.started).toEqual([0, 2]);

      const entries = await readStatusLog(report.statusLogPath);
      expect(entries.map((e) => `${e.label}:${e.status}:${e.reason ?? ""}`)).toEqual([
        "batch_0:succeeded:",
        "batch_1:failed:PreparationFailed",
        "batch_2:succeeded:",
      ]);
    } finally {
      await cleanup();
    }
  });

  it("finishes the run when the status log can no longer be written", async () => {
    const { dir, cleanup } = await makeTempDir();
    try {
      const statusLogPath = join(dir, "1abc_db", "status.jsonl");
      const converter = new FakeConverter(new Set(), {
        before: async (record) => {
          if (record.ligandId !== "LIG0") return;
          await rm(statusLogPath, { force: true });
          await mkdir(statusLogPath);
        },
      });
      const log = new RecordingLogger();
      const { coordinator } = setup(dir, { converter, log, engine: { energies: { LIG14: -3.25 } } });
      const report = await coordinator.run({ receptorId: "1abc", database: db() });

      expect(report.status).toBe("completed");
      expect(report.batches.map((b) => b.status)).toEqual(["succeeded", "succeeded", "succeeded"]);
      expect(report.result.kind === "best" && report.result.best.ligandId).toBe("LIG14");
      const failedWrites = log.lines.filter((l) => l.includes("status log write failed"));
      expect(failedWrites.map((l) => l.split(":")[0])).toEqual(["warn batch_0", "warn batch_1", "warn batch_2"]);
    } finally {
      await cleanup();
    }
  });

  it("docks at most poolWidth batches at once", async () => {
    const { dir, cleanup } = await makeTempDir();
    try {
      const { coordinator, collaborators } = setup(dir, {
        config: { poolWidth: 2, batchSize: 5 },
        engine: { delayMs: 100, energies: { LIG22: -7 } },
      });
      const report = await coordinator.run({ receptorId: "1abc", database: db() });

      expect(report.batchCount).toBe(5);
      expect(collaborators.engine.maxActive).toBe(2);
      expect(report.batches.map((b) => `${b.label}:${b.status}:${b.ligands}`)).toEqual([
        "batch_0:succeeded:5",
        "batch_1:succeeded:5",
        "batch_2:succeeded:5",
        "batch_3:succeeded:5",
        "batch_4:succeeded:5",
      ]);
      expect(report.result).toMatchObject({ kind: "best", best: { ligandId: "LIG22", batchIndex: 4, ordinal: 2, energy: -7 } });
      expect(await readStatusLog(report.statusLogPath)).toHaveLength(5);
    } finally {
      await cleanup();
    }
  });

  it("gives up on a receptor that takes too long to prepare", async () => {
    const { dir, cleanup } = await makeTempDir();
    try {
      const { coordinator, collaborators } = setup(dir, {
        receptorPreparer: new FakeReceptorPreparer(false, true),
        config: { receptorTimeoutMs: 30 },
      });
      const run = coordinator.run({ receptorId: "1abc", database: db() });
      await expect(run).rejects.toBeInstanceOf(ReceptorPreparationFailedError);
      await expect(run).rejects.toThrow("Receptor 1abc could not be prepared: timed out after 30 ms");
      expect(collaborators.engine.started).toEqual([]);
    } finally {
      await cleanup();
    }
  });
});
