import { diffArrays } from "diff";

export type DiffGroupKind = "equal" | "added" | "removed" | "changed";

export type DiffGroup = {
  kind: DiffGroupKind;
  /** 1-based line number of the group's first line on the expected side. */
  expectedStart: number;
  /** 1-based line number of the group's first line on the actual side. */
  actualStart: number;
  expected: string[];
  actual: string[];
};

export type DiffSummary = Record<DiffGroupKind, number>;

function groupKind(expected: string[], actual: string[]): DiffGroupKind {
  if (expected.length > 0 && actual.length > 0) return "changed";
  return expected.length > 0 ? "removed" : "added";
}

/**
 * Aligns two line sequences on their longest common subsequence and groups
 * the result. Adjacent removals and additions collapse into one `changed` group.
 */
export function diffLineGroups(expected: readonly string[], actual: readonly string[]): DiffGroup[] {
  const chunks = diffArrays([...expected], [...actual]);
  const groups: DiffGroup[] = [];

  let expectedLine = 1;
  let actualLine = 1;
  let pending: DiffGroup | null = null;

  const flush = () => {
    if (!pending) return;
    pending.kind = groupKind(pending.expected, pending.actual);
    groups.push(pending);
    pending = null;
  };

  for (const chunk of chunks) {
    const lines = chunk.value;
    if (lines.length === 0) continue;

    if (!chunk.added && !chunk.removed) {
      flush();
      groups.push({ kind: "equal", expectedStart: expectedLine, actualStart: actualLine, expected: lines, actual: lines });
      expectedLine += lines.length;
      actualLine += lines.length;
      continue;
    }

    pending ??= { kind: "changed", expectedStart: expectedLine, actualStart: actualLine, expected: [], actual: [] };
    if (chunk.removed) {
      pending.expected.push(...lines);
      expectedLine += lines.length;
    } else {
      pending.actual.push(...lines);
      actualLine += lines.length;
    }
  }
  flush();

  return groups;
}

export function summarizeDiff(groups: readonly DiffGroup[]): DiffSummary {
  const summary: DiffSummary = { equal: 0, added: 0, removed: 0, changed: 0 };
  for (const g of groups) summary[g.kind] += 1;
  return summary;
}

export function hasDifferences(groups: readonly DiffGroup[]): boolean {
  return groups.some((g) => g.kind !== "equal");
}
