import { constants as fsConstants } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { resolveUserPath } from "../utils.js";
import { InputError } from "./errors.js";

export async function isExecutableFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) {
      return false;
    }
    await fs.access(filePath, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

// `./satl1.exe` counts as having a directory part.
function hasDirectoryComponent(value: string): boolean {
  return value.includes("/") || value.includes(path.sep);
}

/** `rootDir` first, then the non-empty PATH entries in order. */
export function buildSearchDirs(rootDir: string, env: NodeJS.ProcessEnv): string[] {
  const entries = (env.PATH ?? "").split(path.delimiter).filter((entry) => entry.length > 0);
  return [rootDir, ...entries];
}

/**
 * Resolve a configured solver executable.
 *
 * A value with a directory part (`bin/satl1.exe`, `~/leed/satl1.exe`) is taken relative to
 * `rootDir` and PATH is ignored. A bare name is looked up in `rootDir` and then each PATH entry;
 * when nothing matches, the last candidate tried is what gets checked (and rejected).
 */
export async function resolveExecutable(params: {
  name: string;
  rootDir: string;
  env?: NodeJS.ProcessEnv;
}): Promise<string> {
  const env = params.env ?? process.env;
  let candidate: string;

  if (hasDirectoryComponent(params.name)) {
    candidate = resolveUserPath(params.name, params.rootDir);
  } else {
    candidate = path.join(params.rootDir, params.name);
    for (const dir of buildSearchDirs(params.rootDir, env)) {
      // Relative PATH entries resolve against the process cwd, like any search path.
      candidate = path.resolve(dir, params.name);
      if (await isExecutableFile(candidate)) {
        break;
      }
    }
  }

  if (!(await isExecutableFile(candidate))) {
    throw new InputError(`ERROR: solver (${params.name}) is not found`);
  }
  return candidate;
}
