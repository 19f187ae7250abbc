import fs from "node:fs/promises";
import type { SubsystemLogger } from "../logging/subsystem.js";
import type { RunCommand } from "./run.js";
import type {
  EvaluationOutcome,
  EvaluationRequest,
  RunHints,
  SolverConfig,
  SolverRunResult,
  Workspace,
} from "./types.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { validateReferenceDir } from "./reference.js";
import { resolveExecutable } from "./resolve.js";
import { collectResults } from "./results.js";
import { runSolverStages } from "./run.js";
import { prepareWorkspace, resolveProcDir } from "./workdir.js";

export type LeedSolverDeps = {
  env?: NodeJS.ProcessEnv;
  runCommand?: RunCommand;
  log?: SubsystemLogger;
};

/**
 * Fitness adapter around the two-stage LEED solver (`satl1` then `satl2`).
 *
 * Build it once with `LeedSolver.create`, then per parameter vector call
 * `prepare` → `run` → `getResults`, or `evaluate` for all three. Every call works on the
 * `Workspace` it is handed, so evaluations with distinct (step, set) pairs can run concurrently.
 */
export class LeedSolver {
  readonly name = "leed";
  readonly config: Readonly<SolverConfig>;
  readonly firstSolverPath: string;
  readonly secondSolverPath: string;
  readonly procDir: string;
  private readonly runCommand?: RunCommand;
  private readonly log: SubsystemLogger;

  private constructor(params: {
    config: Readonly<SolverConfig>;
    firstSolverPath: string;
    secondSolverPath: string;
    procDir: string;
    runCommand?: RunCommand;
    log: SubsystemLogger;
  }) {
    this.config = params.config;
    this.firstSolverPath = params.firstSolverPath;
    this.secondSolverPath = params.secondSolverPath;
    this.procDir = params.procDir;
    this.runCommand = params.runCommand;
    this.log = params.log;
  }

  /** Resolves both executables and validates the reference directory; throws `InputError`. */
  static async create(params: {
    config: Readonly<SolverConfig>;
    rank?: number;
    deps?: LeedSolverDeps;
  }): Promise<LeedSolver> {
    const config = Object.freeze({ ...params.config });
    const env = params.deps?.env ?? process.env;
    const log = params.deps?.log ?? createSubsystemLogger("leed/solver");

    const firstSolverPath = await resolveExecutable({
      name: config.firstSolver,
      rootDir: config.rootDir,
      env,
    });
    const secondSolverPath = await resolveExecutable({
      name: config.secondSolver,
      rootDir: config.rootDir,
      env,
    });
    await validateReferenceDir(config.baseDir);

    const procDir = resolveProcDir(config.outputDir, params.rank);
    log.debug(`solvers: ${firstSolverPath}, ${secondSolverPath}; reference: ${config.baseDir}`);

    return new LeedSolver({
      config,
      firstSolverPath,
      secondSolverPath,
      procDir,
      runCommand: params.deps?.runCommand,
      log,
    });
  }

  async prepare(request: EvaluationRequest): Promise<Workspace> {
    const workspace = await prepareWorkspace({
      procDir: this.procDir,
      baseDir: this.config.baseDir,
      request,
      dimension: this.config.dimension,
    });
    this.log.debug(`${workspace.name}: prepared x=[${request.x.join(", ")}]`);
    return workspace;
  }

  async run(workspace: Workspace, hints?: RunHints): Promise<SolverRunResult> {
    return await runSolverStages({
      workspace,
      executables: [this.firstSolverPath, this.secondSolverPath],
      timeoutMs: this.config.timeoutMs,
      hints,
      runCommand: this.runCommand,
      log: this.log,
    });
  }

  async getResults(workspace: Workspace): Promise<number> {
    return await collectResults({
      workspace,
      removeWorkDir: this.config.removeWorkDir,
      log: this.log,
    });
  }

  async evaluate(request: EvaluationRequest, hints?: RunHints): Promise<EvaluationOutcome> {
    const workspace = await this.prepare(request);
    const run = await this.run(workspace, hints);
    if (!run.ok) {
      if (this.config.removeWorkDir) {
        await fs.rm(workspace.dir, { recursive: true, force: true });
      }
      return {
        status: "solver_failed",
        stage: run.failedStage,
        rfactor: Number.POSITIVE_INFINITY,
        workspace,
        run,
        error: run.error,
      };
    }
    const rfactor = await this.getResults(workspace);
    return { status: "ok", rfactor, workspace, run };
  }
}
