import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  aggregateResults,
  casePassed,
  generateOutputDiff,
  type CaseOutputComparison,
  type CaseResult
} from "../src/results.js";
import { ArtifactNotFoundError, DecodingFailureError } from "../src/errors.js";
import { DIFF_RENDER_MODES } from "../src/diff/render_html.js";

let tmp: string | null = null;

beforeEach(async () => {
  tmp = await fs.mkdtemp(path.join(os.tmpdir(), "crt-results-"));
});

afterEach(async () => {
  if (tmp) await fs.rm(tmp, { recursive: true, force: true }).catch(() => undefined);
  tmp = null;
});

function result(caseId: number, exitCode: number, expectedExitCode = 0): CaseResult {
  return { runId: "run-1", caseId, runtimeMs: 120, exitCode, expectedExitCode };
}

function output(caseId: number, outputId: number, actual?: string): CaseOutputComparison {
  return { runId: "run-1", caseId, outputId, expected: `exp${outputId}`, actual, extension: ".txt" };
}

describe("results", () => {
  it("casePassed needs a matching exit code and identical outputs", () => {
    expect(casePassed(result(1, 0), [output(1, 10)])).toBe(true);
    expect(casePassed(result(1, 0), [])).toBe(true);
    expect(casePassed(result(1, 1), [output(1, 10)])).toBe(false);
    expect(casePassed(result(1, 0), [output(1, 10), output(1, 11, "got11")])).toBe(false);
    expect(casePassed(result(1, 3, 3), [output(1, 10)])).toBe(true);
  });

  it("aggregateResults reports per-case outcomes ordered by case id", () => {
    const report = aggregateResults(
      "run-1",
      [result(7, 0), result(2, 1), result(5, 0)],
      [output(5, 51, "got51"), output(5, 50), output(7, 70), { ...output(2, 20), runId: "other-run" }]
    );

    expect(report.cases.map((c) => c.caseId)).toEqual([2, 5, 7]);
    expect(report.cases[0]).toEqual({
      caseId: 2,
      runtimeMs: 120,
      exitCode: 1,
      expectedExitCode: 0,
      exitCodeMatches: false,
      outputs: [],
      passed: false
    });
    expect(report.cases[1].outputs).toEqual([
      { outputId: 50, identical: true },
      { outputId: 51, identical: false }
    ]);
    expect(report.cases[1].passed).toBe(false);
    expect(report.cases[2].passed).toBe(true);
    expect(report.totals).toEqual({ cases: 3, passed: 1, failed: 2 });
    expect(report.passed).toBe(false);
  });

  it("generateOutputDiff renders both modes from files on disk", async () => {
    const base = tmp ?? "";
    await fs.writeFile(path.join(base, "exp10.txt"), "a\nb\nc\n", "utf8");
    await fs.writeFile(path.join(base, "got10.txt"), "a\nx\nc\n", "utf8");

    const inline = await generateOutputDiff(output(1, 10, "got10"), base, "inline-view");
    expect(inline).toContain("Differences: 1 changed, 0 added, 0 removed");
    const download = await generateOutputDiff(output(1, 10, "got10"), base, "download");
    expect(download.startsWith("<!DOCTYPE html>")).toBe(true);
    expect(download).toContain(inline);
  });

  it("generateOutputDiff reads legacy-encoded actual output", async () => {
    const base = tmp ?? "";
    await fs.writeFile(path.join(base, "exp10.txt"), "café\n", "utf8");
    await fs.writeFile(path.join(base, "got10.txt"), Uint8Array.from([0x63, 0x61, 0x66, 0xe9, 0x0a]));

    const html = await generateOutputDiff(output(1, 10, "got10"), base, "inline-view");
    expect(html).toContain("No differences");
  });

  it("generateOutputDiff treats an absent actual reference as identical", async () => {
    const base = tmp ?? "";
    await fs.writeFile(path.join(base, "exp10.txt"), "same\n", "utf8");
    const html = await generateOutputDiff(output(1, 10), base, "inline-view");
    expect(html).toContain("No differences");
  });

  it("generateOutputDiff raises ArtifactNotFoundError when the actual file is missing, in both modes", async () => {
    const base = tmp ?? "";
    await fs.writeFile(path.join(base, "exp10.txt"), "a\n", "utf8");
    for (const mode of DIFF_RENDER_MODES) {
      await expect(generateOutputDiff(output(1, 10, "got10"), base, mode)).rejects.toBeInstanceOf(ArtifactNotFoundError);
    }
  });

  it("generateOutputDiff raises ArtifactNotFoundError when the expected file is missing", async () => {
    const base = tmp ?? "";
    await fs.writeFile(path.join(base, "got10.txt"), "a\n", "utf8");
    await expect(generateOutputDiff(output(1, 10, "got10"), base, "download")).rejects.toBeInstanceOf(ArtifactNotFoundError);
  });

  it("generateOutputDiff propagates a decoding failure", async () => {
    const base = tmp ?? "";
    await fs.writeFile(path.join(base, "exp10.txt"), "a\n", "utf8");
    await fs.writeFile(path.join(base, "got10.txt"), Uint8Array.from([0xe9, 0x8d]));
    await expect(generateOutputDiff(output(1, 10, "got10"), base, "inline-view")).rejects.toBeInstanceOf(DecodingFailureError);
  });
});
