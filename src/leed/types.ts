/** Resolved adapter settings. Built once, never mutated. */
export type SolverConfig = {
  /** Executable names or paths as configured; resolved by `resolveExecutable`. */
  firstSolver: string;
  secondSolver: string;
  /** Absolute path of the reference directory. */
  baseDir: string;
  removeWorkDir: boolean;
  rootDir: string;
  outputDir: string;
  dimension?: number;
  /** Per-stage limit; stages run unbounded when omitted. */
  timeoutMs?: number;
};

export type EvaluationRequest = {
  readonly x: readonly number[];
  readonly step: number;
  readonly set: number;
};

export type Workspace = {
  name: string;
  dir: string;
  step: number;
  set: number;
};

export type RunHints = {
  nprocs?: number;
  nthreads?: number;
};

export type SolverStage = 1 | 2;

export type SolverStageResult = {
  stage: SolverStage;
  executable: string;
  ok: boolean;
  exitCode: number | null;
  signal: string | null;
  timedOut: boolean;
  durationMs: number;
  /** Combined stdout/stderr of the stage, written inside the workspace. */
  outputPath: string;
  /** Last part of the captured output, kept for failed stages only. */
  outputTail?: string;
  /** Set when the executable could not be started. */
  error?: string;
};

export type SolverRunResult =
  | { ok: true; stages: SolverStageResult[] }
  | { ok: false; failedStage: SolverStage; stages: SolverStageResult[]; error: string };

export type EvaluationOutcome =
  | { status: "ok"; rfactor: number; workspace: Workspace; run: SolverRunResult }
  | {
      status: "solver_failed";
      stage: SolverStage;
      rfactor: number;
      workspace: Workspace;
      run: SolverRunResult;
      error: string;
    };
