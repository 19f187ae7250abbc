import fs from "node:fs/promises";
import path from "node:path";
import type { SubsystemLogger } from "../logging/subsystem.js";
import type { Workspace } from "./types.js";
import { fileExists } from "../utils.js";
import { ResultExtractionError } from "./errors.js";

/** Written by the second stage only when it produced I-V curves. */
export const MARKER_FILE = "iv 1";
export const SUMMARY_FILE = "search.s";
export const RFACTOR_LABEL = "R-FACTOR";

/**
 * Value of the first `R-FACTOR` line: the text between its first and second `=`.
 * Returns null when no line carries the label.
 */
export function parseRFactor(summary: string, filePath = SUMMARY_FILE): number | null {
  for (const line of summary.split(/\r?\n/)) {
    if (!line.includes(RFACTOR_LABEL)) {
      continue;
    }
    const parts = line.split("=");
    const raw = parts[1]?.trim() ?? "";
    const value = raw ? Number(raw) : Number.NaN;
    if (Number.isNaN(value)) {
      throw new ResultExtractionError(
        `ERROR: cannot parse ${RFACTOR_LABEL} value from line: ${line.trim()}`,
        filePath,
      );
    }
    return value;
  }
  return null;
}

export async function readRFactor(workDir: string): Promise<number> {
  if (!(await fileExists(path.join(workDir, MARKER_FILE)))) {
    return Number.POSITIVE_INFINITY;
  }
  const summaryPath = path.join(workDir, SUMMARY_FILE);
  let summary: string;
  try {
    summary = await fs.readFile(summaryPath, "utf-8");
  } catch (err) {
    throw new ResultExtractionError(
      `ERROR: cannot read ${SUMMARY_FILE} (${summaryPath}): ${String(err)}`,
      summaryPath,
    );
  }
  const value = parseRFactor(summary, summaryPath);
  if (value === null) {
    throw new ResultExtractionError(
      `ERROR: no ${RFACTOR_LABEL} line in ${SUMMARY_FILE} (${summaryPath})`,
      summaryPath,
    );
  }
  return value;
}

/**
 * Read the fitness value, then delete the workspace when `removeWorkDir` is set. On an
 * extraction error the workspace is left in place.
 */
export async function collectResults(params: {
  workspace: Workspace;
  removeWorkDir: boolean;
  log?: SubsystemLogger;
}): Promise<number> {
  const rfactor = await readRFactor(params.workspace.dir);
  if (rfactor === Number.POSITIVE_INFINITY) {
    params.log?.info(`${params.workspace.name}: no "${MARKER_FILE}" output; R-factor = inf`);
  } else {
    params.log?.debug(`${params.workspace.name}: R-factor = ${rfactor}`);
  }
  if (params.removeWorkDir) {
    await fs.rm(params.workspace.dir, { recursive: true, force: true });
  }
  return rfactor;
}
