import { readArtifactLines } from "./artifacts.js";
import { computeDiff, type DiffRenderMode } from "./diff/render_html.js";

export type CaseResult = {
  runId: string;
  caseId: number;
  runtimeMs: number;
  exitCode: number;
  expectedExitCode: number;
};

/**
 * One output file of a case. `actual` is only set when the produced output
 * differed from `expected`; an absent value means byte-identical.
 */
export type CaseOutputComparison = {
  runId: string;
  caseId: number;
  outputId: number;
  expected: string;
  actual?: string;
  /** Appended to both file references to form file names, e.g. ".srt". */
  extension: string;
};

export type OutputOutcome = {
  outputId: number;
  identical: boolean;
};

export type CaseOutcome = {
  caseId: number;
  runtimeMs: number;
  exitCode: number;
  expectedExitCode: number;
  exitCodeMatches: boolean;
  outputs: OutputOutcome[];
  passed: boolean;
};

export type RunResultsReport = {
  runId: string;
  passed: boolean;
  totals: { cases: number; passed: number; failed: number };
  cases: CaseOutcome[];
};

export function outputIdentical(comparison: CaseOutputComparison): boolean {
  return comparison.actual === undefined;
}

export function casePassed(result: CaseResult, comparisons: readonly CaseOutputComparison[]): boolean {
  return result.exitCode === result.expectedExitCode && comparisons.every(outputIdentical);
}

export function aggregateResults(
  runId: string,
  results: readonly CaseResult[],
  comparisons: readonly CaseOutputComparison[]
): RunResultsReport {
  const byCase = new Map<number, CaseOutputComparison[]>();
  for (const c of comparisons) {
    if (c.runId !== runId) continue;
    const list = byCase.get(c.caseId) ?? [];
    list.push(c);
    byCase.set(c.caseId, list);
  }

  const cases = results
    .filter((r) => r.runId === runId)
    .sort((a, b) => a.caseId - b.caseId)
    .map((r): CaseOutcome => {
      const outputs = (byCase.get(r.caseId) ?? []).sort((a, b) => a.outputId - b.outputId);
      return {
        caseId: r.caseId,
        runtimeMs: r.runtimeMs,
        exitCode: r.exitCode,
        expectedExitCode: r.expectedExitCode,
        exitCodeMatches: r.exitCode === r.expectedExitCode,
        outputs: outputs.map((o) => ({ outputId: o.outputId, identical: outputIdentical(o) })),
        passed: casePassed(r, outputs)
      };
    });

  const passed = cases.filter((c) => c.passed).length;
  return {
    runId,
    passed: passed === cases.length,
    totals: { cases: cases.length, passed, failed: cases.length - passed },
    cases
  };
}

/**
 * Renders the diff between the expected and actual output files of one
 * comparison. Always regenerated; nothing is cached.
 */
export async function generateOutputDiff(
  comparison: CaseOutputComparison,
  basePath: string,
  renderMode: DiffRenderMode
): Promise<string> {
  const expectedName = comparison.expected + comparison.extension;
  const actualName = (comparison.actual ?? comparison.expected) + comparison.extension;
  console.log(`[diff] ${comparison.runId} case ${comparison.caseId} output ${comparison.outputId}: ${expectedName} vs ${actualName}`);

  const expected = await readArtifactLines(basePath, expectedName);
  if (!expected.ok) throw expected.error;
  const actual = await readArtifactLines(basePath, actualName);
  if (!actual.ok) throw actual.error;

  return computeDiff(expected.lines, actual.lines, renderMode);
}
