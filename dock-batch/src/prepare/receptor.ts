import { access, copyFile, mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import type { Receptor } from "../types/pipeline.js";
import { DockBatchError, InvalidInputError, ReceptorPreparationFailedError, errorMessage } from "../errors.js";
import { runTool } from "../utils/exec.js";
import { silentLogger, type Logger } from "../utils/log.js";

export interface ReceptorPreparer {
  prepare(structureId: string, directory: string, signal?: AbortSignal): Promise<Receptor>;
}

const STRUCTURE_ID = /^[A-Za-z0-9]{4}$/;

export function normalizeStructureId(id: string): string {
  const t = id.trim();
  if (!STRUCTURE_ID.test(t)) {
    throw new InvalidInputError(`Receptor id must be a 4-character structure identifier, got "${id}"`);
  }
  return t.toLowerCase();
}

export type Vec3 = [number, number, number];

export interface GridParameters {
  structureId: string;
  receptorTypes: string[];
  ligandTypes: string[];
  center: Vec3;
  npts?: Vec3;
  spacing?: number;
  parameterFile?: string;
}

/** Map file names produced by autogrid: one per ligand type, then electrostatics and desolvation. */
export function gridMapNames(structureId: string, ligandTypes: string[]): string[] {
  return [...ligandTypes.map((t) => `${structureId}.${t}.map`), `${structureId}.e.map`, `${structureId}.d.map`];
}

export function buildGridParameterFile(p: GridParameters): string {
  const id = p.structureId;
  const [nx, ny, nz] = p.npts ?? [60, 60, 60];
  const lines = [`npts ${nx} ${ny} ${nz}`];
  if (p.parameterFile) lines.push(`parameter_file ${basename(p.parameterFile)}`);
  lines.push(
    `gridfld ${id}.maps.fld`,
    `spacing ${p.spacing ?? 0.375}`,
    `receptor_types ${p.receptorTypes.join(" ")}`,
    `ligand_types ${p.ligandTypes.join(" ")}`,
    `receptor ${id}.pdbqt`,
    `gridcenter ${p.center.map((c) => c.toFixed(4)).join(" ")}`,
    "smooth 0.5",
  );
  for (const t of p.ligandTypes) lines.push(`map ${id}.${t}.map`);
  lines.push(`elecmap ${id}.e.map`, `dsolvmap ${id}.d.map`, "dielectric -0.1465");
  return lines.join("\n") + "\n";
}

function slice(line: string, start: number, end: number): string {
  return line.length > start ? line.substring(start, Math.min(end, line.length)) : "";
}

function isAtomLine(line: string): boolean {
  return line.startsWith("ATOM") || line.startsWith("HETATM");
}

/** Sorted, de-duplicated AutoDock atom types found in a PDBQT text. */
export function receptorAtomTypes(pdbqt: string): string[] {
  const types = new Set<string>();
  for (const line of pdbqt.split(/\r?\n/)) {
    if (!isAtomLine(line)) continue;
    // the type column sits at 78-79; fall back to the last token for loosely formatted files
    let t = slice(line, 77, 79).trim();
    if (!t) {
      const tokens = line.trim().split(/\s+/);
      t = tokens[tokens.length - 1] ?? "";
    }
    if (t) types.add(t);
  }
  return Array.from(types).sort();
}

function coordinate(line: string, start: number): number | null {
  const s = slice(line, start, start + 8).trim();
  if (!s) return null;
  const v = Number(s);
  return Number.isFinite(v) ? v : null;
}

export function atomCentroid(pdbqt: string): Vec3 | null {
  let sx = 0, sy = 0, sz = 0, n = 0;
  for (const line of pdbqt.split(/\r?\n/)) {
    if (!isAtomLine(line)) continue;
    const x = coordinate(line, 30), y = coordinate(line, 38), z = coordinate(line, 46);
    if (x == null || y == null || z == null) continue;
    sx += x; sy += y; sz += z; n++;
  }
  return n > 0 ? [sx / n, sy / n, sz / n] : null;
}

export interface AutoGridReceptorOptions {
  obabel?: string;
  prepareReceptor?: string;
  autogrid?: string;
  downloadBaseUrl?: string;
  ligandTypes?: string[];
  gridCenter?: Vec3;
  parameterFile?: string;
  log?: Logger;
}

/**
 * Fetches a structure from the RCSB archive, keeps its largest fragment with hydrogens,
 * converts it to PDBQT and generates the autogrid map set around it.
 */
export class AutoGridReceptorPreparer implements ReceptorPreparer {
  private readonly log: Logger;

  constructor(private readonly opts: AutoGridReceptorOptions = {}) {
    this.log = opts.log ?? silentLogger;
  }

  async prepare(structureId: string, directory: string, signal?: AbortSignal): Promise<Receptor> {
    const id = normalizeStructureId(structureId);
    try {
      return await this.prepareInner(id, directory, signal);
    } catch (e) {
      if (e instanceof DockBatchError) throw e;
      throw new ReceptorPreparationFailedError(id, errorMessage(e), { cause: e });
    }
  }

  private async prepareInner(id: string, directory: string, signal?: AbortSignal): Promise<Receptor> {
    const o = this.opts;
    const ligandTypes = o.ligandTypes ?? ["A", "C", "HD", "N", "OA", "P", "NA"];
    await mkdir(directory, { recursive: true });

    const rawPath = join(directory, `${id}.raw.pdb`);
    const structurePath = join(directory, `${id}.pdb`);
    const nativePath = join(directory, `${id}.pdbqt`);

    const url = `${o.downloadBaseUrl ?? "https://files.rcsb.org/download"}/${id}.pdb`;
    this.log.info(`Downloading ${url}`);
    const res = await fetch(url, { signal });
    if (!res.ok) throw new ReceptorPreparationFailedError(id, `download failed with HTTP ${res.status}`);
    await writeFile(rawPath, await res.text(), "utf8");

    // -r keeps the largest fragment, -h adds hydrogens
    await runTool(o.obabel ?? "obabel", [rawPath, "-opdb", "-r", "-h", "-O", structurePath], { signal });
    await runTool(o.prepareReceptor ?? "prepare_receptor4.py", ["-r", structurePath, "-o", nativePath], {
      cwd: directory,
      signal,
    });

    const pdbqt = await readFile(nativePath, "utf8");
    const receptorTypes = receptorAtomTypes(pdbqt);
    if (receptorTypes.length === 0) throw new ReceptorPreparationFailedError(id, "receptor PDBQT contains no typed atoms");
    const center = o.gridCenter ?? atomCentroid(pdbqt);
    if (!center) throw new ReceptorPreparationFailedError(id, "cannot determine grid center");

    if (o.parameterFile) await copyFile(o.parameterFile, join(directory, basename(o.parameterFile)));
    const gpfPath = join(directory, `${id}.gpf`);
    const gpf = buildGridParameterFile({ structureId: id, receptorTypes, ligandTypes, center, parameterFile: o.parameterFile });
    await writeFile(gpfPath, gpf, "utf8");
    await runTool(o.autogrid ?? "autogrid4", ["-p", `${id}.gpf`, "-l", `${id}.glg`], { cwd: directory, signal });

    const gridDescriptorPath = join(directory, `${id}.maps.fld`);
    const mapPaths = gridMapNames(id, ligandTypes).map((m) => join(directory, m));
    for (const p of [gridDescriptorPath, ...mapPaths]) {
      try {
        await access(p);
      } catch {
        throw new ReceptorPreparationFailedError(id, `grid generation did not produce ${basename(p)}`);
      }
    }
    this.log.info(`Receptor ${id} ready: ${mapPaths.length} maps, types ${receptorTypes.join(" ")}`);
    return { id, directory, structurePath, nativePath, gridDescriptorPath, mapPaths };
  }
}
