import { describe, expect, it } from "vitest";
import { TOKEN_LENGTH, createToken, forkOwnerName, forkWebUrl, githubLink } from "../src/run_model.js";

describe("run_model", () => {
  it("createToken defaults to 64 alphanumeric characters", () => {
    const token = createToken();
    expect(token).toHaveLength(TOKEN_LENGTH);
    expect(token).toMatch(/^[A-Za-z0-9]+$/);
    expect(createToken(12)).toHaveLength(12);
    expect(createToken()).not.toBe(token);
  });

  it("derives fork urls and owner names", () => {
    expect(forkWebUrl("https://github.com/octo/sample.git")).toBe("https://github.com/octo/sample");
    expect(forkOwnerName("https://github.com/octo/sample.git")).toBe("octo/sample");
    expect(forkWebUrl("https://github.com/octo/my.github.io.git")).toBe("https://github.com/octo/my.github.io");
    expect(forkWebUrl("https://github.com/octo/sample")).toBe("https://github.com/octo/sample");
  });

  it("githubLink points at the commit or the pull request", () => {
    const base = { forkUrl: "https://github.com/octo/sample.git", commit: "abc1234def", prNumber: 0 };
    expect(githubLink({ ...base, runType: "commit" })).toBe("https://github.com/octo/sample/commit/abc1234def");
    expect(githubLink({ ...base, runType: "pr", prNumber: 42 })).toBe("https://github.com/octo/sample/pull/42");
  });
});
