import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch {
    return false;
  }
}

export function resolveUserPath(input: string, baseDir?: string): string {
  const trimmed = input.trim();
  if (!trimmed) {
    return baseDir ? path.resolve(baseDir) : path.resolve(trimmed);
  }
  if (trimmed === "~" || trimmed.startsWith("~/")) {
    return path.resolve(os.homedir(), trimmed.slice(1).replace(/^\/+/, ""));
  }
  return baseDir ? path.resolve(baseDir, trimmed) : path.resolve(trimmed);
}

export function shortenHomePath(input: string): string {
  const home = os.homedir();
  if (!home) {
    return input;
  }
  if (input === home) {
    return "~";
  }
  if (input.startsWith(`${home}${path.sep}`)) {
    return `~${input.slice(home.length)}`;
  }
  return input;
}

export function tail(text: string, maxChars = 1200): string {
  const trimmed = text.trim();
  if (trimmed.length <= maxChars) {
    return trimmed;
  }
  return trimmed.slice(-maxChars);
}
