import { diffWordsWithSpace } from "diff";
import { diffLineGroups, hasDifferences, summarizeDiff, type DiffGroup } from "./line_diff.js";

export type DiffRenderMode = "inline-view" | "download";

export const DIFF_RENDER_MODES: readonly DiffRenderMode[] = ["inline-view", "download"];

type RowKind = "equal" | "added" | "removed" | "changed";

const DIFF_STYLE = [
  ".crt-diff{font-family:ui-monospace,Menlo,Consolas,monospace;font-size:12px}",
  ".crt-diff .crt-summary{margin:0 0 8px}",
  ".crt-diff table{border-collapse:collapse;width:100%}",
  ".crt-diff th{text-align:left;border-bottom:1px solid #ccc;padding:2px 6px}",
  ".crt-diff td{vertical-align:top;padding:0 6px}",
  ".crt-diff .crt-ln{color:#888;text-align:right;user-select:none;width:1%}",
  ".crt-diff .crt-code{white-space:pre-wrap;word-break:break-all}",
  ".crt-diff tr.crt-added .crt-code{background:#e6ffed}",
  ".crt-diff tr.crt-removed .crt-code{background:#ffeef0}",
  ".crt-diff tr.crt-changed .crt-code{background:#fffbdd}",
  ".crt-diff ins{background:#acf2bd;text-decoration:none}",
  ".crt-diff del{background:#fdb8c0;text-decoration:none}"
].join("\n");

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function highlightWords(expected: string, actual: string): { expected: string; actual: string } {
  let exp = "";
  let act = "";
  for (const part of diffWordsWithSpace(expected, actual)) {
    const text = escapeHtml(part.value);
    if (part.added) act += `<ins>${text}</ins>`;
    else if (part.removed) exp += `<del>${text}</del>`;
    else {
      exp += text;
      act += text;
    }
  }
  return { expected: exp, actual: act };
}

function row(kind: RowKind, expectedNo: number | null, expectedHtml: string, actualNo: number | null, actualHtml: string): string {
  return (
    `<tr class="crt-${kind}">` +
    `<td class="crt-ln">${expectedNo ?? ""}</td><td class="crt-code">${expectedHtml}</td>` +
    `<td class="crt-ln">${actualNo ?? ""}</td><td class="crt-code">${actualHtml}</td>` +
    `</tr>`
  );
}

function groupRows(group: DiffGroup): string[] {
  const { expectedStart, actualStart } = group;
  switch (group.kind) {
    case "equal":
      return group.expected.map((line, i) => row("equal", expectedStart + i, escapeHtml(line), actualStart + i, escapeHtml(line)));
    case "removed":
      return group.expected.map((line, i) => row("removed", expectedStart + i, escapeHtml(line), null, ""));
    case "added":
      return group.actual.map((line, i) => row("added", null, "", actualStart + i, escapeHtml(line)));
    case "changed": {
      const rows: string[] = [];
      const n = Math.max(group.expected.length, group.actual.length);
      for (let i = 0; i < n; i++) {
        const exp = i < group.expected.length ? group.expected[i] : undefined;
        const act = i < group.actual.length ? group.actual[i] : undefined;
        if (exp !== undefined && act !== undefined) {
          const words = highlightWords(exp, act);
          rows.push(row("changed", expectedStart + i, words.expected, actualStart + i, words.actual));
        } else if (exp !== undefined) {
          rows.push(row("removed", expectedStart + i, escapeHtml(exp), null, ""));
        } else if (act !== undefined) {
          rows.push(row("added", null, "", actualStart + i, escapeHtml(act)));
        }
      }
      return rows;
    }
  }
}

function summaryLine(groups: readonly DiffGroup[]): string {
  if (!hasDifferences(groups)) return "No differences";
  const s = summarizeDiff(groups);
  return `Differences: ${s.changed} changed, ${s.added} added, ${s.removed} removed`;
}

export function renderDiffFragment(groups: readonly DiffGroup[]): string {
  const rows = groups.flatMap(groupRows).join("\n");
  return [
    `<div class="crt-diff">`,
    `<style>${DIFF_STYLE}</style>`,
    `<p class="crt-summary">${summaryLine(groups)}</p>`,
    `<table>`,
    `<thead><tr><th colspan="2">Expected</th><th colspan="2">Actual</th></tr></thead>`,
    `<tbody>`,
    rows,
    `</tbody>`,
    `</table>`,
    `</div>`
  ].join("\n");
}

export function renderDiffDocument(groups: readonly DiffGroup[], title = "Output diff"): string {
  return [
    "<!DOCTYPE html>",
    `<html lang="en">`,
    `<head><meta charset="utf-8"><title>${escapeHtml(title)}</title></head>`,
    "<body>",
    renderDiffFragment(groups),
    "</body>",
    "</html>",
    ""
  ].join("\n");
}

/**
 * Line diff of expected vs actual output rendered as HTML. `inline-view` is a
 * fragment to embed in a page; `download` is a standalone document holding the
 * same fragment.
 */
export function computeDiff(expectedLines: readonly string[], actualLines: readonly string[], renderMode: DiffRenderMode): string {
  const groups = diffLineGroups(expectedLines, actualLines);
  return renderMode === "download" ? renderDiffDocument(groups) : renderDiffFragment(groups);
}
