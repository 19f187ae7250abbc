export { loadConfig, parseConfig, resolveSolverConfig } from "./config/config.js";
export { LeedfitConfigSchema, type LeedfitConfig } from "./config/schema.js";
export { InputError, ResultExtractionError } from "./leed/errors.js";
export { formatFortranF74, placeholderToken, substituteParameters, writeFitFile } from "./leed/inject.js";
export { REQUIRED_REFERENCE_FILES, validateReferenceDir } from "./leed/reference.js";
export { resolveExecutable } from "./leed/resolve.js";
export { MARKER_FILE, SUMMARY_FILE, collectResults, parseRFactor, readRFactor } from "./leed/results.js";
export { runSolverStages, type RunCommand } from "./leed/run.js";
export { LeedSolver, type LeedSolverDeps } from "./leed/solver.js";
export type {
  EvaluationOutcome,
  EvaluationRequest,
  RunHints,
  SolverConfig,
  SolverRunResult,
  SolverStage,
  SolverStageResult,
  Workspace,
} from "./leed/types.js";
export { formatWorkspaceName, prepareWorkspace, resolveProcDir } from "./leed/workdir.js";
export { createSubsystemLogger, type SubsystemLogger } from "./logging/subsystem.js";
export { runCommandWithTimeout, type CommandOptions, type SpawnResult } from "./process/exec.js";
