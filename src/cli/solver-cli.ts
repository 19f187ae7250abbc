import type { Command } from "commander";
import { loadConfig, resolveSolverConfig } from "../config/config.js";
import { LeedSolver } from "../leed/solver.js";
import { defaultRuntime } from "../runtime.js";
import { shortenHomePath } from "../utils.js";
import { parseNonNegativeInt, parseParameterList, runCommandWithRuntime } from "./cli-utils.js";

type SolverCheckOpts = {
  config: string;
  rank?: string;
  json?: boolean;
};

type SolverEvaluateOpts = SolverCheckOpts & {
  x?: string;
  step?: string;
  set?: string;
};

function formatRFactor(value: number): number | string {
  return Number.isFinite(value) ? value : "inf";
}

async function createSolver(opts: SolverCheckOpts): Promise<LeedSolver> {
  const cfg = await loadConfig(opts.config);
  return await LeedSolver.create({
    config: resolveSolverConfig(cfg),
    rank: parseNonNegativeInt("--rank", opts.rank),
  });
}

export function registerSolverCli(program: Command) {
  const solver = program.command("solver").description("Evaluate LEED structures with satl1/satl2");

  solver
    .command("check")
    .description("Load the config, resolve both solvers and validate the reference directory")
    .requiredOption("--config <file>", "Path to the JSON5 config file")
    .option("--rank <n>", "Process rank; workspaces go to <output_dir>/<rank> (default: 0)", "0")
    .option("--json", "Output JSON", false)
    .action(async (opts: SolverCheckOpts) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        const leed = await createSolver(opts);
        const summary = {
          firstSolver: leed.firstSolverPath,
          secondSolver: leed.secondSolverPath,
          referenceDir: leed.config.baseDir,
          procDir: leed.procDir,
          removeWorkDir: leed.config.removeWorkDir,
        };

        if (opts.json) {
          defaultRuntime.log(JSON.stringify(summary, null, 2));
          return;
        }
        defaultRuntime.log(`Solver 1: ${shortenHomePath(summary.firstSolver)}`);
        defaultRuntime.log(`Solver 2: ${shortenHomePath(summary.secondSolver)}`);
        defaultRuntime.log(`Reference: ${shortenHomePath(summary.referenceDir)}`);
        defaultRuntime.log(`Workspaces: ${shortenHomePath(summary.procDir)}`);
      });
    });

  solver
    .command("evaluate")
    .description("Run one evaluation (prepare, run, get results) and print the R-factor")
    .requiredOption("--config <file>", "Path to the JSON5 config file")
    .requiredOption("--x <values>", "Comma-separated parameter values, e.g. 1.5,-2.25")
    .option("--step <n>", "Step index (default: 0)", "0")
    .option("--set <n>", "Set index (default: 0)", "0")
    .option("--rank <n>", "Process rank; workspaces go to <output_dir>/<rank> (default: 0)", "0")
    .option("--json", "Output JSON", false)
    .action(async (opts: SolverEvaluateOpts) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        const x = parseParameterList(opts.x);
        const step = parseNonNegativeInt("--step", opts.step);
        const set = parseNonNegativeInt("--set", opts.set);
        const leed = await createSolver(opts);

        const outcome = await leed.evaluate({ x, step, set });
        const ok = outcome.status === "ok";

        if (opts.json) {
          defaultRuntime.log(
            JSON.stringify(
              {
                status: outcome.status,
                rfactor: formatRFactor(outcome.rfactor),
                workspace: outcome.workspace.dir,
                ...(outcome.status === "solver_failed"
                  ? { stage: outcome.stage, error: outcome.error }
                  : {}),
              },
              null,
              2,
            ),
          );
          defaultRuntime.exit(ok ? 0 : 1);
          return;
        }

        if (outcome.status === "solver_failed") {
          defaultRuntime.error(`error: ${outcome.error}`);
        }
        defaultRuntime.log(`R-factor: ${formatRFactor(outcome.rfactor)}`);
        defaultRuntime.log(`Workspace: ${shortenHomePath(outcome.workspace.dir)}`);
        defaultRuntime.exit(ok ? 0 : 1);
      });
    });
}
