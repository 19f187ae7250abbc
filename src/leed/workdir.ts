import fs from "node:fs/promises";
import path from "node:path";
import type { EvaluationRequest, Workspace } from "./types.js";
import { InputError } from "./errors.js";
import { writeFitFile } from "./inject.js";
import { INPUT_TEMPLATE_FILE } from "./reference.js";

function pad8(n: number): string {
  return String(n).padStart(8, "0");
}

function assertIndex(label: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InputError(`ERROR: ${label} must be a non-negative integer (got ${value})`);
  }
}

export function formatWorkspaceName(step: number, set: number): string {
  assertIndex("step", step);
  assertIndex("set", set);
  return `Log${pad8(step)}_${pad8(set)}`;
}

/** `<outputDir>/<rank>`: one process directory per framework worker. */
export function resolveProcDir(outputDir: string, rank = 0): string {
  assertIndex("rank", rank);
  return path.join(outputDir, String(rank));
}

/**
 * Materialize the workspace for one evaluation: full copy of the reference directory, then
 * parameter injection into its `tleed5.i`. Paths are explicit; process cwd is never touched.
 */
export async function prepareWorkspace(params: {
  procDir: string;
  baseDir: string;
  request: EvaluationRequest;
  dimension?: number;
}): Promise<Workspace> {
  const { request } = params;
  const name = formatWorkspaceName(request.step, request.set);
  if (params.dimension !== undefined && request.x.length !== params.dimension) {
    throw new InputError(
      `ERROR: expected ${params.dimension} parameters, got ${request.x.length}`,
    );
  }

  const dir = path.join(params.procDir, name);
  // A leftover directory for the same (step, set) would leak stale solver output.
  await fs.rm(dir, { recursive: true, force: true });
  await fs.mkdir(params.procDir, { recursive: true });
  await fs.cp(params.baseDir, dir, { recursive: true });
  await writeFitFile(path.join(dir, INPUT_TEMPLATE_FILE), request.x);

  return { name, dir, step: request.step, set: request.set };
}
