import { randomBytes } from "node:crypto";

export const RUN_PLATFORMS = ["linux", "windows"] as const;
export type RunPlatform = (typeof RUN_PLATFORMS)[number];

export const RUN_TYPES = ["commit", "pr"] as const;
export type RunType = (typeof RUN_TYPES)[number];

export const PLATFORM_LABELS: Record<RunPlatform, string> = {
  linux: "Linux",
  windows: "Windows"
};

export const RUN_TYPE_LABELS: Record<RunType, string> = {
  commit: "Commit",
  pr: "Pull Request"
};

export type RunRecord = {
  runId: string;
  platform: RunPlatform;
  runType: RunType;
  /** Clone URL of the fork, e.g. https://github.com/octo/sample.git */
  forkUrl: string;
  branch: string;
  commit: string;
  prNumber: number;
  token: string;
  createdAt: string;
};

const TOKEN_ALPHABET = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
export const TOKEN_LENGTH = 64;

export function createToken(length: number = TOKEN_LENGTH): string {
  const bytes = randomBytes(length);
  let out = "";
  for (let i = 0; i < bytes.length; i++) {
    out += TOKEN_ALPHABET[bytes[i] % TOKEN_ALPHABET.length];
  }
  return out;
}

export function forkWebUrl(forkUrl: string): string {
  return forkUrl.replace(/\.git$/, "");
}

export function forkOwnerName(forkUrl: string): string {
  return forkWebUrl(forkUrl).replace("https://github.com/", "");
}

export function githubLink(run: Pick<RunRecord, "forkUrl" | "runType" | "commit" | "prNumber">): string {
  const fork = forkWebUrl(run.forkUrl);
  if (run.runType === "commit") return `${fork}/commit/${run.commit}`;
  return `${fork}/pull/${run.prNumber}`;
}
