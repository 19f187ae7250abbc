import { z } from "zod";

export const DEFAULT_FIRST_SOLVER = "satl1.exe";
export const DEFAULT_SECOND_SOLVER = "satl2.exe";

// Older configs spell the flag as a string.
export const RemoveWorkDirSchema = z
  .union([z.boolean(), z.enum(["true", "false"])])
  .transform((value) => value === true || value === "true");

export const SolverExecSectionSchema = z
  .object({
    path_to_first_solver: z.string().min(1).default(DEFAULT_FIRST_SOLVER),
    path_to_second_solver: z.string().min(1).default(DEFAULT_SECOND_SOLVER),
    timeout_ms: z.number().int().positive().optional(),
  })
  .strict();
export type SolverExecSection = z.infer<typeof SolverExecSectionSchema>;

export const SolverReferenceSectionSchema = z
  .object({
    path_to_base_dir: z.string().min(1),
  })
  .strict();
export type SolverReferenceSection = z.infer<typeof SolverReferenceSectionSchema>;

export const SolverPostSectionSchema = z
  .object({
    remove_work_dir: RemoveWorkDirSchema.default(false),
  })
  .strict();
export type SolverPostSection = z.infer<typeof SolverPostSectionSchema>;

export const SolverSectionSchema = z
  .object({
    name: z.string().optional(),
    config: SolverExecSectionSchema.default({}),
    reference: SolverReferenceSectionSchema,
    post: SolverPostSectionSchema.default({}),
  })
  .strict();
export type SolverSection = z.infer<typeof SolverSectionSchema>;

// Other parts of the framework own the rest of `base`; unknown keys are dropped, not rejected.
export const BaseSectionSchema = z
  .object({
    dimension: z.number().int().positive().optional(),
    root_dir: z.string().default("."),
    output_dir: z.string().default("."),
  })
  .strip();
export type BaseSection = z.infer<typeof BaseSectionSchema>;

export const LeedfitConfigSchema = z
  .object({
    base: BaseSectionSchema.default({}),
    solver: SolverSectionSchema,
  })
  .strip();
export type LeedfitConfig = z.infer<typeof LeedfitConfigSchema>;
