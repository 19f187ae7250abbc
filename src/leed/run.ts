import fs from "node:fs/promises";
import path from "node:path";
import type { SubsystemLogger } from "../logging/subsystem.js";
import type { CommandOptions, SpawnResult } from "../process/exec.js";
import type {
  RunHints,
  SolverRunResult,
  SolverStage,
  SolverStageResult,
  Workspace,
} from "./types.js";
import { runCommandWithTimeout } from "../process/exec.js";
import { tail } from "../utils.js";

export type RunCommand = (argv: string[], options: CommandOptions) => Promise<SpawnResult>;

export const STAGE_OUTPUT_FILE = "stdout";

function describeFailure(stage: SolverStageResult, timeoutMs: number | undefined): string {
  const label = `stage ${stage.stage} (${path.basename(stage.executable)})`;
  if (stage.error) {
    return `${label} failed to start: ${stage.error}`;
  }
  if (stage.timedOut) {
    return `${label} timed out after ${timeoutMs ?? 0}ms`;
  }
  if (stage.signal) {
    return `${label} killed by ${stage.signal}`;
  }
  return `${label} exited with code ${stage.exitCode ?? "unknown"}`;
}

async function runStage(params: {
  stage: SolverStage;
  executable: string;
  workspace: Workspace;
  timeoutMs?: number;
  runCommand: RunCommand;
}): Promise<SolverStageResult> {
  const outputPath = path.join(params.workspace.dir, STAGE_OUTPUT_FILE);
  const started = Date.now();
  let result: SpawnResult;
  try {
    result = await params.runCommand([params.executable], {
      cwd: params.workspace.dir,
      timeoutMs: params.timeoutMs,
    });
  } catch (err) {
    return {
      stage: params.stage,
      executable: params.executable,
      ok: false,
      exitCode: null,
      signal: null,
      timedOut: false,
      durationMs: Date.now() - started,
      outputPath,
      error: err instanceof Error ? err.message : String(err),
    };
  }

  const output = [result.stdout, result.stderr].filter(Boolean).join("");
  // Stage 1 starts the capture file; stage 2 appends to it.
  if (params.stage === 1) {
    await fs.writeFile(outputPath, output, "utf-8");
  } else {
    await fs.appendFile(outputPath, output, "utf-8");
  }

  const ok = result.code === 0 && !result.killed;
  return {
    stage: params.stage,
    executable: params.executable,
    ok,
    exitCode: result.code,
    signal: result.signal,
    timedOut: result.killed,
    durationMs: Date.now() - started,
    outputPath,
    outputTail: ok ? undefined : tail(output) || undefined,
  };
}

/**
 * Run both solver stages, in order, inside the workspace. Stage 2 only runs after stage 1
 * succeeds. Failures are returned, not thrown.
 */
export async function runSolverStages(params: {
  workspace: Workspace;
  executables: readonly [string, string];
  timeoutMs?: number;
  hints?: RunHints;
  runCommand?: RunCommand;
  log?: SubsystemLogger;
}): Promise<SolverRunResult> {
  const runCommand = params.runCommand ?? runCommandWithTimeout;
  const { nprocs = 1, nthreads = 1 } = params.hints ?? {};
  if (nprocs > 1 || nthreads > 1) {
    params.log?.debug(
      `${params.workspace.name}: nprocs=${nprocs} nthreads=${nthreads} ignored; solvers run serially`,
    );
  }

  const stages: SolverStageResult[] = [];
  const plan: Array<[SolverStage, string]> = [
    [1, params.executables[0]],
    [2, params.executables[1]],
  ];
  for (const [stage, executable] of plan) {
    const result = await runStage({
      stage,
      executable,
      workspace: params.workspace,
      timeoutMs: params.timeoutMs,
      runCommand,
    });
    stages.push(result);
    if (!result.ok) {
      const error = describeFailure(result, params.timeoutMs);
      params.log?.warn(`${params.workspace.name}: ${error}`);
      if (result.outputTail) {
        params.log?.debug(`${params.workspace.name}: output tail:\n${result.outputTail}`);
      }
      return { ok: false, failedStage: stage, stages, error };
    }
    params.log?.debug(`${params.workspace.name}: stage ${stage} ok in ${result.durationMs}ms`);
  }
  return { ok: true, stages };
}
