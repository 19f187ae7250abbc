import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import type { Workspace } from "./types.js";
import { ResultExtractionError } from "./errors.js";
import { collectResults, parseRFactor, readRFactor } from "./results.js";

async function makeWorkspace(files: Record<string, string>): Promise<Workspace> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "leedfit-results-"));
  const dir = path.join(root, "Log00000000_00000001");
  await fs.mkdir(dir, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    await fs.writeFile(path.join(dir, name), content, "utf-8");
  }
  return { name: "Log00000000_00000001", dir, step: 0, set: 1 };
}

const SUMMARY = [
  " SEARCH SUMMARY",
  " NUMBER OF BEAMS = 5",
  " R-FACTOR = 0.1234",
  " R-FACTOR = 0.9999",
  "",
].join("\n");

describe("leed/results", () => {
  it("parses the first R-FACTOR line only", () => {
    expect(parseRFactor(SUMMARY)).toBe(0.1234);
  });

  it("takes the text between the first and second '='", () => {
    expect(parseRFactor("  PENDRY R-FACTOR =   0.2500 = best\n")).toBe(0.25);
  });

  it("returns null when no line carries the label", () => {
    expect(parseRFactor(" NUMBER OF BEAMS = 5\n")).toBeNull();
  });

  it("throws on an unparsable value", () => {
    expect(() => parseRFactor(" R-FACTOR = ****\n")).toThrow(ResultExtractionError);
    expect(() => parseRFactor(" R-FACTOR\n")).toThrow(
      "ERROR: cannot parse R-FACTOR value from line: R-FACTOR",
    );
  });

  it("reads the R-factor when the marker file is present", async () => {
    const ws = await makeWorkspace({ "iv 1": "", "search.s": SUMMARY });

    await expect(readRFactor(ws.dir)).resolves.toBe(0.1234);
  });

  it("returns infinity without the marker, whatever search.s says", async () => {
    const withSummary = await makeWorkspace({ "search.s": SUMMARY });
    const empty = await makeWorkspace({});

    await expect(readRFactor(withSummary.dir)).resolves.toBe(Number.POSITIVE_INFINITY);
    await expect(readRFactor(empty.dir)).resolves.toBe(Number.POSITIVE_INFINITY);
  });

  it("fails when the marker exists but search.s has no R-FACTOR", async () => {
    const ws = await makeWorkspace({ "iv 1": "", "search.s": " NUMBER OF BEAMS = 5\n" });

    const err = await readRFactor(ws.dir).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ResultExtractionError);
    expect(err instanceof ResultExtractionError ? err.filePath : "").toBe(
      path.join(ws.dir, "search.s"),
    );
  });

  it("fails when the marker exists but search.s is missing", async () => {
    const ws = await makeWorkspace({ "iv 1": "" });

    await expect(readRFactor(ws.dir)).rejects.toThrow(/cannot read search\.s/);
  });

  it("removes the workspace after reading when cleanup is enabled", async () => {
    const ws = await makeWorkspace({ "iv 1": "", "search.s": SUMMARY });

    await expect(collectResults({ workspace: ws, removeWorkDir: true })).resolves.toBe(0.1234);
    await expect(fs.stat(ws.dir)).rejects.toThrow();
  });

  it("leaves the workspace untouched when cleanup is disabled", async () => {
    const ws = await makeWorkspace({ "iv 1": "marker", "search.s": SUMMARY });

    await expect(collectResults({ workspace: ws, removeWorkDir: false })).resolves.toBe(0.1234);
    expect((await fs.readdir(ws.dir)).toSorted()).toEqual(["iv 1", "search.s"]);
    expect(await fs.readFile(path.join(ws.dir, "search.s"), "utf-8")).toBe(SUMMARY);
    expect(await fs.readFile(path.join(ws.dir, "iv 1"), "utf-8")).toBe("marker");
  });

  it("keeps the workspace when extraction fails", async () => {
    const ws = await makeWorkspace({ "iv 1": "", "search.s": "nothing here\n" });

    await expect(collectResults({ workspace: ws, removeWorkDir: true })).rejects.toThrow(
      ResultExtractionError,
    );
    expect((await fs.stat(ws.dir)).isDirectory()).toBe(true);
  });
});
