import JSON5 from "json5";
import fs from "node:fs/promises";
import type { ZodIssue } from "zod";
import type { SolverConfig } from "../leed/types.js";
import { InputError } from "../leed/errors.js";
import { resolveUserPath } from "../utils.js";
import { LeedfitConfigSchema, type LeedfitConfig } from "./schema.js";

function formatIssue(issue: ZodIssue): string {
  const segment = issue.path.length > 0 ? String(issue.path[issue.path.length - 1]) : "config";
  if (issue.code === "unrecognized_keys") {
    return issue.keys.map((key) => `Error: ${key} in ${segment} is not correct keyword.`).join("\n");
  }
  const where = issue.path.length > 0 ? issue.path.join(".") : "config";
  return `Error: ${where}: ${issue.message}`;
}

export function parseConfig(raw: unknown): LeedfitConfig {
  const parsed = LeedfitConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InputError(parsed.error.issues.map(formatIssue).join("\n"));
  }
  return parsed.data;
}

export async function loadConfig(configPath: string): Promise<LeedfitConfig> {
  const resolved = resolveUserPath(configPath);
  let text: string;
  try {
    text = await fs.readFile(resolved, "utf-8");
  } catch (err) {
    throw new InputError(`ERROR: cannot read config (${resolved}): ${String(err)}`);
  }
  let raw: unknown;
  try {
    raw = JSON5.parse(text);
  } catch (err) {
    throw new InputError(`ERROR: invalid config (${resolved}): ${String(err)}`);
  }
  return parseConfig(raw);
}

/**
 * Turn a validated config into adapter settings. `root_dir` resolves against `cwd`;
 * `output_dir` and `path_to_base_dir` resolve against `root_dir`.
 */
export function resolveSolverConfig(cfg: LeedfitConfig, opts?: { cwd?: string }): SolverConfig {
  const cwd = opts?.cwd ?? process.cwd();
  const rootDir = resolveUserPath(cfg.base.root_dir, cwd);
  return {
    firstSolver: cfg.solver.config.path_to_first_solver,
    secondSolver: cfg.solver.config.path_to_second_solver,
    baseDir: resolveUserPath(cfg.solver.reference.path_to_base_dir, rootDir),
    removeWorkDir: cfg.solver.post.remove_work_dir,
    rootDir,
    outputDir: resolveUserPath(cfg.base.output_dir, rootDir),
    dimension: cfg.base.dimension,
    timeoutMs: cfg.solver.config.timeout_ms,
  };
}
