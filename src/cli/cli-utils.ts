import type { RuntimeEnv } from "../runtime.js";

export async function runCommandWithRuntime(
  runtime: RuntimeEnv,
  action: () => Promise<void>,
): Promise<void> {
  try {
    await action();
  } catch (err) {
    runtime.error(`error: ${err instanceof Error ? err.message : String(err)}`);
    runtime.exit(1);
  }
}

export function parseNonNegativeInt(label: string, raw: string | undefined, fallback = 0): number {
  const trimmed = (raw ?? "").trim();
  if (!trimmed) {
    return fallback;
  }
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`${label} must be a non-negative integer (got "${trimmed}")`);
  }
  return Number(trimmed);
}

export function parseParameterList(raw: string | undefined): number[] {
  const trimmed = (raw ?? "").trim();
  if (!trimmed) {
    throw new Error("--x is required (comma-separated parameter values)");
  }
  return trimmed.split(",").map((part, idx) => {
    const value = Number(part.trim());
    if (!part.trim() || !Number.isFinite(value)) {
      throw new Error(`--x value ${idx} is not a number: "${part.trim()}"`);
    }
    return value;
  });
}
