import { spawn } from "node:child_process";

export interface ExecOptions {
  cwd?: string;
  input?: string;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export class ExecError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    super(message);
    this.name = "ExecError";
  }
}

/** Run an external tool to completion, buffering its output. Rejects on non-zero exit, spawn failure or abort. */
export function runTool(command: string, args: string[], opts: ExecOptions = {}): Promise<ExecResult> {
  return new Promise<ExecResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: opts.cwd,
      env: opts.env ?? process.env,
      signal: opts.signal,
      stdio: ["pipe", "pipe", "pipe"],
    });
    const out: Buffer[] = [];
    const err: Buffer[] = [];
    child.stdout.on("data", (chunk: Buffer) => out.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => err.push(chunk));
    child.on("error", (e) => reject(e));
    // EPIPE when the tool exits before reading its input
    child.stdin.on("error", (e) => reject(e));
    child.on("close", (code, signal) => {
      const stdout = Buffer.concat(out).toString("utf8");
      const stderr = Buffer.concat(err).toString("utf8");
      if (code === 0) resolve({ stdout, stderr });
      else {
        const tail = stderr.trim().split(/\r?\n/).slice(-1)[0] ?? "";
        reject(new ExecError(`${command} exited with ${code ?? signal}${tail ? `: ${tail}` : ""}`, code, stderr));
      }
    });
    if (opts.input != null) child.stdin.end(opts.input);
    else child.stdin.end();
  });
}
