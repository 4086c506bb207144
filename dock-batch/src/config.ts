import { z } from "zod";
import { InvalidInputError } from "./errors.js";

const positiveInt = z.coerce.number().int().positive();

export const BackoffSchema = z.object({
  initialDelayMs: z.coerce.number().min(0).default(1000),
  factor: z.coerce.number().min(1).default(2),
  maxDelayMs: z.coerce.number().min(0).default(60_000),
});

export const ToolsSchema = z.object({
  obabel: z.string().min(1).default("obabel"),
  autogrid: z.string().min(1).default("autogrid4"),
  prepareReceptor: z.string().min(1).default("prepare_receptor4.py"),
  autodockGpu: z.string().min(1).default("autodock_gpu"),
});

export const PipelineConfigSchema = z.object({
  workDir: z.string().min(1).default("./runs"),
  runId: z.string().min(1).optional(),
  batchSize: positiveInt.default(10_000),
  poolWidth: positiveInt.default(1),
  retryBudget: z.coerce.number().int().min(0).default(2),
  timeoutMs: positiveInt.default(3_600_000),
  /** per-ligand conversion limit */
  prepareTimeoutMs: positiveInt.default(60_000),
  receptorTimeoutMs: positiveInt.default(1_800_000),
  topN: positiveInt.default(1),
  backoff: BackoffSchema.default({}),
  ligandTypes: z.array(z.string().min(1)).min(1).default(["A", "C", "HD", "N", "OA", "P", "NA"]),
  gridCenter: z.tuple([z.number(), z.number(), z.number()]).optional(),
  parameterFile: z.string().min(1).optional(),
  tools: ToolsSchema.default({}),
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

function formatIssues(err: z.ZodError): string[] {
  return err.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

export function parseConfig(input: unknown): PipelineConfig {
  const res = PipelineConfigSchema.safeParse(input);
  if (!res.success) throw new InvalidInputError("Invalid pipeline configuration", formatIssues(res.error));
  return res.data;
}

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const v = env[key];
  return v != null && v.trim() !== "" ? v.trim() : undefined;
}

const TOOL_VARIABLES = [
  ["obabel", "DOCK_OBABEL"],
  ["autogrid", "DOCK_AUTOGRID"],
  ["prepareReceptor", "DOCK_PREPARE_RECEPTOR"],
  ["autodockGpu", "DOCK_AUTODOCK_GPU"],
] as const;

/** Environment (DOCK_*) first, explicit overrides on top. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: PipelineConfigInput = {}): PipelineConfig {
  const fromEnv: Record<string, unknown> = {};
  const tools: Record<string, string> = {};
  const set = (key: string, value: string | undefined) => {
    if (value !== undefined) fromEnv[key] = value;
  };

  set("workDir", envValue(env, "DOCK_WORK_DIR"));
  set("runId", envValue(env, "DOCK_RUN_ID"));
  set("batchSize", envValue(env, "DOCK_BATCH_SIZE"));
  set("poolWidth", envValue(env, "DOCK_POOL_WIDTH"));
  set("retryBudget", envValue(env, "DOCK_RETRY_BUDGET"));
  set("timeoutMs", envValue(env, "DOCK_TIMEOUT_MS"));
  set("prepareTimeoutMs", envValue(env, "DOCK_PREPARE_TIMEOUT_MS"));
  set("receptorTimeoutMs", envValue(env, "DOCK_RECEPTOR_TIMEOUT_MS"));
  set("logLevel", envValue(env, "DOCK_LOG_LEVEL"));
  const ligandTypes = envValue(env, "DOCK_LIGAND_TYPES");
  if (ligandTypes) fromEnv.ligandTypes = ligandTypes.split(/[\s,]+/).filter(Boolean);

  for (const [key, name] of TOOL_VARIABLES) {
    const v = envValue(env, name);
    if (v) tools[key] = v;
  }

  const merged: Record<string, unknown> = { ...fromEnv, ...stripUndefined(overrides) };
  merged.tools = { ...tools, ...(overrides.tools ?? {}) };
  return parseConfig(merged);
}

function stripUndefined(o: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(o)) if (v !== undefined) out[k] = v;
  return out;
}
