import fs from "node:fs/promises";
import { InputError } from "./errors.js";

export const MAX_PARAMETERS = 10_000;

const FIELD_WIDTH = 7;
const FRACTION_DIGITS = 4;

// `(?!\d)` keeps opt0001 from matching the head of a longer token.
const TOKEN_PATTERN = /opt(\d{4})(?!\d)/g;

/**
 * Fortran `F7.4`: 4 fraction digits, right-justified in 7 columns. A value that needs more
 * columns is written whole rather than truncated.
 */
export function formatFortranF74(value: number): string {
  return value.toFixed(FRACTION_DIGITS).padStart(FIELD_WIDTH, " ");
}

export function placeholderToken(index: number): string {
  return `opt${String(index).padStart(4, "0")}`;
}

export function substituteParameters(contents: string, x: readonly number[]): string {
  if (x.length > MAX_PARAMETERS) {
    throw new InputError(
      `ERROR: ${x.length} parameters exceed the ${MAX_PARAMETERS} placeholder slots`,
    );
  }
  const formatted = x.map((value, idx) => {
    if (!Number.isFinite(value)) {
      throw new InputError(`ERROR: parameter ${idx} is not a finite number (${value})`);
    }
    return formatFortranF74(value);
  });
  return contents.replace(TOKEN_PATTERN, (token: string, digits: string) => {
    return formatted[Number(digits)] ?? token;
  });
}

export async function writeFitFile(filePath: string, x: readonly number[]): Promise<void> {
  const contents = await fs.readFile(filePath, "utf-8");
  await fs.writeFile(filePath, substituteParameters(contents, x), "utf-8");
}
