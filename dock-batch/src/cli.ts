#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import { loadConfig, type PipelineConfigInput } from "./config.js";
import { DockBatchError, formatError } from "./errors.js";
import { loadLigandDatabase } from "./sdf/database.js";
import { splitDatabase } from "./sdf/split.js";
import { PipelineCoordinator, createDefaultCollaborators, type Collaborators } from "./run/coordinator.js";
import { createLogger } from "./utils/log.js";

const USAGE = `usage:
  dock-batch run --receptor <pdbid> --database <file.sdf> [--batch-size n] [--pool-width p]
                 [--retries r] [--timeout-ms t] [--work-dir dir] [--run-id id] [--top n]
  dock-batch split --database <file.sdf> --batch-size n`;

export const EXIT = { ok: 0, runFailed: 1, invalidInput: 2, cancelled: 130 } as const;

export interface CliIo {
  env: NodeJS.ProcessEnv;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  signal?: AbortSignal;
  collaborators?: Collaborators;
}

function intOption(v: string | undefined): number | undefined {
  return v === undefined ? undefined : Number(v);
}

const OPTIONS = {
  receptor: { type: "string" },
  database: { type: "string" },
  "batch-size": { type: "string" },
  "pool-width": { type: "string" },
  retries: { type: "string" },
  "timeout-ms": { type: "string" },
  "work-dir": { type: "string" },
  "run-id": { type: "string" },
  top: { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

function parseCli(argv: string[]) {
  return parseArgs({ args: argv, allowPositionals: true, options: OPTIONS });
}

export async function main(argv: string[], io: CliIo): Promise<number> {
  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli(argv);
  } catch (e) {
    io.stderr(`${e instanceof Error ? e.message : String(e)}\n${USAGE}`);
    return EXIT.invalidInput;
  }
  const { values, positionals } = parsed;
  const command = positionals[0];
  if (values.help || (command !== "run" && command !== "split")) {
    io.stderr(USAGE);
    return values.help ? EXIT.ok : EXIT.invalidInput;
  }

  try {
    const overrides: PipelineConfigInput = {
      batchSize: intOption(values["batch-size"]),
      poolWidth: intOption(values["pool-width"]),
      retryBudget: intOption(values.retries),
      timeoutMs: intOption(values["timeout-ms"]),
      topN: intOption(values.top),
      workDir: values["work-dir"],
      runId: values["run-id"],
    };
    const config = loadConfig(io.env, overrides);
    if (!values.database) {
      io.stderr(`--database is required\n${USAGE}`);
      return EXIT.invalidInput;
    }
    const database = await loadLigandDatabase(values.database);

    if (command === "split") {
      io.stdout(String(splitDatabase(database, config.batchSize).count));
      return EXIT.ok;
    }

    if (!values.receptor) {
      io.stderr(`--receptor is required\n${USAGE}`);
      return EXIT.invalidInput;
    }
    const log = createLogger("dock-batch", { level: config.logLevel });
    const coordinator = new PipelineCoordinator(config, io.collaborators ?? createDefaultCollaborators(config, log), log);
    const report = await coordinator.run({ receptorId: values.receptor, database, signal: io.signal });
    io.stdout(JSON.stringify(report, null, 2));
    return report.status === "cancelled" ? EXIT.cancelled : EXIT.ok;
  } catch (e) {
    if (e instanceof DockBatchError) {
      io.stderr(`[${e.code}] ${e.message}`);
      return e.code === "InvalidInput" ? EXIT.invalidInput : EXIT.runFailed;
    }
    io.stderr(formatError(e));
    return EXIT.runFailed;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());
  main(process.argv.slice(2), {
    env: process.env,
    stdout: (l) => process.stdout.write(l + "\n"),
    stderr: (l) => process.stderr.write(l + "\n"),
    signal: controller.signal,
  }).then(
    (code) => { process.exitCode = code; },
    (e: unknown) => {
      process.stderr.write(formatError(e) + "\n");
      process.exitCode = EXIT.runFailed;
    },
  );
}
