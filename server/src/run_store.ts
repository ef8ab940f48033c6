import fs from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import { z } from "zod";
import { RUN_PLATFORMS, RUN_TYPES, createToken, type RunPlatform, type RunRecord, type RunType } from "./run_model.js";
import type { RunEvent } from "./run_state.js";
import type { CaseOutputComparison, CaseResult } from "./results.js";
import { RUN_STATUSES, type RunStatus } from "./stages.js";
import { dataRootAbs, ensureDir, isSafeName, nowIso, runDataDirAbs, slug, toUtcIso, tryReadJsonFile, writeJsonFile } from "./utils.js";

const RUN_FILE = "run.json";
const EVENTS_FILE = "events.json";
const RESULTS_FILE = "results.json";
const OUTPUTS_FILE = "outputs.json";

const RUN_ID_SLUG_MAX = 40;
const RUN_ID_SUFFIX_LEN = 8;
const RUN_ID_MAX_ATTEMPTS = 10;
const RUN_ID_SUFFIX_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

export const RunStatusSchema = z.enum(RUN_STATUSES);

// Timestamps are stored as written and normalized to UTC on every read.
export const UtcTimestampSchema = z.string().transform((value, ctx) => {
  const iso = toUtcIso(value);
  if (iso === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp: ${value}` });
    return z.NEVER;
  }
  return iso;
});

const RunRecordSchema = z.object({
  runId: z.string().min(1),
  platform: z.enum(RUN_PLATFORMS),
  runType: z.enum(RUN_TYPES),
  forkUrl: z.string(),
  branch: z.string(),
  commit: z.string(),
  prNumber: z.number().int().min(0),
  token: z.string(),
  createdAt: UtcTimestampSchema
});

const RunEventSchema = z.object({
  runId: z.string(),
  status: RunStatusSchema,
  timestamp: UtcTimestampSchema,
  message: z.string()
});

const CaseResultSchema = z.object({
  runId: z.string(),
  caseId: z.number().int(),
  runtimeMs: z.number().int().min(0),
  exitCode: z.number().int(),
  expectedExitCode: z.number().int()
});

const CaseOutputComparisonSchema = z.object({
  runId: z.string(),
  caseId: z.number().int(),
  outputId: z.number().int(),
  expected: z.string().min(1),
  actual: z.string().min(1).optional(),
  extension: z.string()
});

export type NewRun = {
  platform: RunPlatform;
  runType: RunType;
  forkUrl: string;
  branch: string;
  commit: string;
  prNumber?: number;
  token?: string;
};

/** An output comparison as posted with its case; run and case ids come from the case. */
export type NewCaseOutput = Omit<CaseOutputComparison, "runId" | "caseId">;

export type NewRunEvent = {
  status: RunStatus;
  message: string;
  /** Defaults to now. Values without an offset are taken as UTC. */
  timestamp?: string;
};

function randomRunSuffix(length: number): string {
  const bytes = randomBytes(length);
  let out = "";
  for (let i = 0; i < bytes.length; i++) {
    out += RUN_ID_SUFFIX_ALPHABET[bytes[i] % RUN_ID_SUFFIX_ALPHABET.length];
  }
  return out;
}

async function readRecords<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T[]> {
  const raw = await tryReadJsonFile(filePath);
  if (!Array.isArray(raw)) return [];
  const out: T[] = [];
  for (const [i, item] of raw.entries()) {
    const parsed = schema.safeParse(item);
    if (parsed.success) out.push(parsed.data);
    else console.warn(`[store] skipping malformed record ${i} in ${filePath}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return out;
}

/**
 * File-backed persistence for runs and everything they own. One directory per
 * run; each collection is a JSON array rewritten atomically. Writes to a run are
 * serialized in-process, reads take whatever snapshot is on disk.
 */
export class RunStore {
  private locks = new Map<string, Promise<void>>();

  private runDir(runId: string): string | null {
    return isSafeName(runId) ? runDataDirAbs(runId) : null;
  }

  private withRunLock<T>(runId: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.locks.get(runId) ?? Promise.resolve();
    const next = prev.then(fn);
    const settled = next.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(runId, settled);
    void settled.then(() => {
      if (this.locks.get(runId) === settled) this.locks.delete(runId);
    });
    return next;
  }

  private async runIdExists(runId: string): Promise<boolean> {
    return fs
      .stat(runDataDirAbs(runId))
      .then((st) => st.isDirectory())
      .catch(() => false);
  }

  private async nextRunId(branch: string): Promise<string> {
    const branchSlug = slug(branch).slice(0, RUN_ID_SLUG_MAX).replace(/^-+|-+$/g, "") || "untitled";
    for (let attempt = 0; attempt < RUN_ID_MAX_ATTEMPTS; attempt++) {
      const runId = `${branchSlug}-${randomRunSuffix(RUN_ID_SUFFIX_LEN)}`;
      if (!(await this.runIdExists(runId))) return runId;
    }
    throw new Error("Unable to allocate unique runId after retries");
  }

  async createRun(input: NewRun): Promise<RunRecord> {
    const runId = await this.nextRunId(input.branch);
    const run: RunRecord = {
      runId,
      platform: input.platform,
      runType: input.runType,
      forkUrl: input.forkUrl,
      branch: input.branch,
      commit: input.commit,
      prNumber: input.prNumber ?? 0,
      token: input.token ?? createToken(),
      createdAt: nowIso()
    };

    const dir = runDataDirAbs(runId);
    await ensureDir(dir);
    await writeJsonFile(path.join(dir, RUN_FILE), run);
    await writeJsonFile(path.join(dir, EVENTS_FILE), []);
    await writeJsonFile(path.join(dir, RESULTS_FILE), []);
    await writeJsonFile(path.join(dir, OUTPUTS_FILE), []);
    return run;
  }

  async getRun(runId: string): Promise<RunRecord | null> {
    const dir = this.runDir(runId);
    if (!dir) return null;
    const parsed = RunRecordSchema.safeParse(await tryReadJsonFile(path.join(dir, RUN_FILE)));
    return parsed.success ? parsed.data : null;
  }

  async listRuns(): Promise<RunRecord[]> {
    await ensureDir(dataRootAbs());
    const entries = await fs.readdir(dataRootAbs(), { withFileTypes: true }).catch(() => []);
    const runs: RunRecord[] = [];
    for (const ent of entries) {
      if (!ent.isDirectory()) continue;
      const run = await this.getRun(ent.name);
      if (run) runs.push(run);
    }
    return runs.sort((a, b) => (a.createdAt < b.createdAt ? 1 : a.createdAt > b.createdAt ? -1 : 0));
  }

  async deleteRun(runId: string): Promise<boolean> {
    const dir = this.runDir(runId);
    if (!dir) return false;
    return this.withRunLock(runId, async () => {
      if (!(await this.getRun(runId))) return false;
      await fs.rm(dir, { recursive: true, force: true });
      return true;
    });
  }

  async appendEvent(runId: string, input: NewRunEvent): Promise<RunEvent | null> {
    const dir = this.runDir(runId);
    if (!dir) return null;

    const timestamp = input.timestamp === undefined ? nowIso() : toUtcIso(input.timestamp);
    if (timestamp === null) throw new Error(`invalid timestamp: ${input.timestamp}`);
    const event: RunEvent = { runId, status: input.status, timestamp, message: input.message };

    // The lock is taken before any await so appends land in call order.
    return this.withRunLock(runId, async () => {
      if (!(await this.getRun(runId))) return null;
      const events = await this.listEvents(runId);
      await writeJsonFile(path.join(dir, EVENTS_FILE), [...events, event]);
      return event;
    });
  }

  /** Events in insertion order. */
  async listEvents(runId: string): Promise<RunEvent[]> {
    const dir = this.runDir(runId);
    if (!dir) return [];
    return readRecords(path.join(dir, EVENTS_FILE), RunEventSchema);
  }

  /**
   * Records one case: its result and the full set of its output comparisons.
   * A repeat for the same case replaces both, and comparisons it no longer
   * lists are dropped. Both files are rewritten under the run lock.
   */
  async recordCase(result: CaseResult, outputs: readonly NewCaseOutput[] = []): Promise<CaseResult | null> {
    const dir = this.runDir(result.runId);
    if (!dir) return null;

    const comparisons: CaseOutputComparison[] = [];
    for (const output of outputs) {
      const comparison = { ...output, runId: result.runId, caseId: result.caseId };
      const at = comparisons.findIndex((c) => c.outputId === comparison.outputId);
      if (at >= 0) comparisons[at] = comparison;
      else comparisons.push(comparison);
    }

    return this.withRunLock(result.runId, async () => {
      if (!(await this.getRun(result.runId))) return null;
      const [results, existing] = await Promise.all([
        this.listCaseResults(result.runId),
        this.listOutputComparisons(result.runId)
      ]);
      await writeJsonFile(path.join(dir, RESULTS_FILE), [...results.filter((r) => r.caseId !== result.caseId), result]);
      await writeJsonFile(path.join(dir, OUTPUTS_FILE), [
        ...existing.filter((c) => c.caseId !== result.caseId),
        ...comparisons
      ]);
      return result;
    });
  }

  async listCaseResults(runId: string): Promise<CaseResult[]> {
    const dir = this.runDir(runId);
    if (!dir) return [];
    return readRecords(path.join(dir, RESULTS_FILE), CaseResultSchema);
  }

  async listOutputComparisons(runId: string, caseId?: number): Promise<CaseOutputComparison[]> {
    const dir = this.runDir(runId);
    if (!dir) return [];
    const all = await readRecords(path.join(dir, OUTPUTS_FILE), CaseOutputComparisonSchema);
    return caseId === undefined ? all : all.filter((c) => c.caseId === caseId);
  }

  /** Case results and comparisons read together, after any pending write to the run. */
  async readCases(runId: string): Promise<{ results: CaseResult[]; comparisons: CaseOutputComparison[] }> {
    if (!this.runDir(runId)) return { results: [], comparisons: [] };
    return this.withRunLock(runId, async () => {
      const [results, comparisons] = await Promise.all([this.listCaseResults(runId), this.listOutputComparisons(runId)]);
      return { results, comparisons };
    });
  }

  async getOutputComparison(runId: string, caseId: number, outputId: number): Promise<CaseOutputComparison | null> {
    const all = await this.listOutputComparisons(runId, caseId);
    return all.find((c) => c.outputId === outputId) ?? null;
  }
}
