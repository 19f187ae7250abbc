import path from "node:path";
import { fileExists } from "../utils.js";
import { InputError } from "./errors.js";

export const REQUIRED_REFERENCE_FILES = ["exp.d", "rfac.d", "tleed4.i", "tleed5.i"] as const;

export const INPUT_TEMPLATE_FILE = "tleed5.i";

/** Throws on the first required file missing from `baseDir`. */
export async function validateReferenceDir(baseDir: string): Promise<void> {
  for (const file of REQUIRED_REFERENCE_FILES) {
    if (!(await fileExists(path.join(baseDir, file)))) {
      throw new InputError(`ERROR: input file (${file}) is not found in (${baseDir})`);
    }
  }
}
