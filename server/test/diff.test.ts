import { describe, expect, it } from "vitest";
import { diffLineGroups, hasDifferences, summarizeDiff } from "../src/diff/line_diff.js";
import { computeDiff, DIFF_RENDER_MODES, escapeHtml, renderDiffFragment } from "../src/diff/render_html.js";

describe("diff/line_diff", () => {
  it("reports one changed group for a single replaced line", () => {
    const groups = diffLineGroups(["a", "b", "c"], ["a", "x", "c"]);
    expect(summarizeDiff(groups)).toEqual({ equal: 2, added: 0, removed: 0, changed: 1 });

    const changed = groups.filter((g) => g.kind === "changed");
    expect(changed).toEqual([{ kind: "changed", expectedStart: 2, actualStart: 2, expected: ["b"], actual: ["x"] }]);
  });

  it("identical inputs produce no differences", () => {
    const lines = ["first", "", "  indented", "last"];
    const groups = diffLineGroups(lines, [...lines]);
    expect(hasDifferences(groups)).toBe(false);
    expect(summarizeDiff(groups)).toEqual({ equal: 1, added: 0, removed: 0, changed: 0 });
  });

  it("handles empty inputs on either side", () => {
    expect(diffLineGroups([], [])).toEqual([]);
    expect(diffLineGroups([], ["n1", "n2"])).toEqual([
      { kind: "added", expectedStart: 1, actualStart: 1, expected: [], actual: ["n1", "n2"] }
    ]);
    expect(diffLineGroups(["o1"], [])).toEqual([
      { kind: "removed", expectedStart: 1, actualStart: 1, expected: ["o1"], actual: [] }
    ]);
  });

  it("tracks line numbers across inserted and deleted lines", () => {
    const groups = diffLineGroups(["a", "b", "c", "d"], ["a", "c", "d", "e"]);
    expect(groups).toEqual([
      { kind: "equal", expectedStart: 1, actualStart: 1, expected: ["a"], actual: ["a"] },
      { kind: "removed", expectedStart: 2, actualStart: 2, expected: ["b"], actual: [] },
      { kind: "equal", expectedStart: 3, actualStart: 2, expected: ["c", "d"], actual: ["c", "d"] },
      { kind: "added", expectedStart: 5, actualStart: 4, expected: [], actual: ["e"] }
    ]);
  });
});

describe("diff/render_html", () => {
  it("escapes html special characters", () => {
    expect(escapeHtml(`<b class="x">&'</b>`)).toBe("&lt;b class=&quot;x&quot;&gt;&amp;&#39;&lt;/b&gt;");
  });

  it("inline-view is a fragment, download a full document around the same fragment", () => {
    const expected = ["a", "b", "c"];
    const actual = ["a", "x", "c"];
    const inline = computeDiff(expected, actual, "inline-view");
    const download = computeDiff(expected, actual, "download");

    expect(inline.startsWith(`<div class="crt-diff">`)).toBe(true);
    expect(download.startsWith("<!DOCTYPE html>\n")).toBe(true);
    expect(download).toContain(inline);
    expect(download).toContain("<title>Output diff</title>");
  });

  it("is deterministic for identical inputs in both modes", () => {
    const expected = ["1", "2", "3", "4"];
    const actual = ["1", "two", "3", "5", "6"];
    for (const mode of DIFF_RENDER_MODES) {
      expect(computeDiff(expected, actual, mode)).toBe(computeDiff(expected, actual, mode));
    }
  });

  it("highlights words inside a changed line", () => {
    const html = computeDiff(["a", "b", "c"], ["a", "x", "c"], "inline-view");
    expect(html).toContain(`<p class="crt-summary">Differences: 1 changed, 0 added, 0 removed</p>`);
    expect(html).toContain(
      `<tr class="crt-changed"><td class="crt-ln">2</td><td class="crt-code"><del>b</del></td><td class="crt-ln">2</td><td class="crt-code"><ins>x</ins></td></tr>`
    );
  });

  it("renders added, removed and escaped rows", () => {
    const html = computeDiff(["<keep>"], ["<keep>", "new & line"], "inline-view");
    expect(html).toContain(
      `<tr class="crt-equal"><td class="crt-ln">1</td><td class="crt-code">&lt;keep&gt;</td><td class="crt-ln">1</td><td class="crt-code">&lt;keep&gt;</td></tr>`
    );
    expect(html).toContain(
      `<tr class="crt-added"><td class="crt-ln"></td><td class="crt-code"></td><td class="crt-ln">2</td><td class="crt-code">new &amp; line</td></tr>`
    );
  });

  it("renders a changed group with uneven sides as paired plus leftover rows", () => {
    const html = renderDiffFragment([{ kind: "changed", expectedStart: 3, actualStart: 3, expected: ["p", "q"], actual: ["r"] }]);
    expect(html).toContain(
      `<tr class="crt-removed"><td class="crt-ln">4</td><td class="crt-code">q</td><td class="crt-ln"></td><td class="crt-code"></td></tr>`
    );
  });

  it("reports no differences for empty or identical inputs", () => {
    expect(computeDiff([], [], "inline-view")).toContain(`<p class="crt-summary">No differences</p>`);
    expect(computeDiff(["same"], ["same"], "download")).toContain(`<p class="crt-summary">No differences</p>`);
    expect(computeDiff([], ["only"], "inline-view")).toContain("Differences: 0 changed, 1 added, 0 removed");
    expect(computeDiff(["only"], [], "inline-view")).toContain("Differences: 0 changed, 0 added, 1 removed");
  });
});
