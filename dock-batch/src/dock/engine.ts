import type { Receptor, WorkList } from "../types/pipeline.js";
import { EngineError, errorMessage } from "../errors.js";
import { runTool } from "../utils/exec.js";
import { expectedReportPath } from "./report.js";

export interface DockingRequest {
  workList: WorkList;
  receptor: Receptor;
  attempt: number;
  signal: AbortSignal;
}

/** Opaque long-running docking invocation. Resolves with the report files it wrote. */
export interface DockingEngine {
  dock(request: DockingRequest): Promise<string[]>;
}

export class AutoDockGpuEngine implements DockingEngine {
  constructor(private readonly binary = "autodock_gpu", private readonly extraArgs: string[] = []) {}

  async dock({ workList, signal }: DockingRequest): Promise<string[]> {
    try {
      // logs land in the working directory, named after each ligand file
      await runTool(this.binary, ["--filelist", workList.fileListPath, ...this.extraArgs], {
        cwd: workList.reportDirectory,
        signal,
      });
    } catch (e) {
      throw new EngineError(`${workList.batch.label}: ${errorMessage(e)}`, { cause: e });
    }
    return workList.ligands.map((l) => expectedReportPath(workList, l));
  }
}
