import express from "express";
import cors from "cors";
import { z } from "zod";
import type { RunStore } from "./run_store.js";
import { RunStatusSchema } from "./run_store.js";
import { PLATFORM_LABELS, RUN_PLATFORMS, RUN_TYPES, RUN_TYPE_LABELS, githubLink } from "./run_model.js";
import { deriveProgress, describeProgress, hasFailed, isFinished, stageTimeline } from "./run_state.js";
import { aggregateResults, generateOutputDiff } from "./results.js";
import { ArtifactNotFoundError, DecodingFailureError } from "./errors.js";
import { dataRootAbs, resultsRootAbs, toUtcIso } from "./utils.js";

const CreateRunBodySchema = z
  .object({
    platform: z.enum(RUN_PLATFORMS),
    runType: z.enum(RUN_TYPES),
    forkUrl: z.string().trim().url(),
    branch: z.string().trim().min(1).max(256),
    commit: z.string().trim().min(7).max(64),
    prNumber: z.number().int().min(0).optional()
  })
  .strict();

const AppendEventBodySchema = z
  .object({
    status: RunStatusSchema,
    message: z.string().max(10_000),
    timestamp: z
      .string()
      .refine((v) => toUtcIso(v) !== null, { message: "invalid timestamp" })
      .optional()
  })
  .strict();

const OutputBodySchema = z
  .object({
    outputId: z.number().int(),
    expected: z.string().min(1).max(128),
    actual: z.string().min(1).max(128).optional(),
    extension: z.string().max(16)
  })
  .strict();

const CaseBodySchema = z
  .object({
    caseId: z.number().int(),
    runtimeMs: z.number().int().min(0),
    exitCode: z.number().int(),
    expectedExitCode: z.number().int(),
    outputs: z.array(OutputBodySchema).default([])
  })
  .strict();

const IntParamSchema = z.coerce.number().int();

export type AppOptions = {
  /** Directory holding expected and actual output files. Defaults to CRT_RESULTS_DIR. */
  resultsDir?: string;
};

export function createApp(store: RunStore, options: AppOptions = {}) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  const resultsDir = () => options.resultsDir ?? resultsRootAbs();

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, dataRoot: dataRootAbs(), resultsRoot: resultsDir() });
  });

  app.post("/api/runs", async (req, res) => {
    const parsed = CreateRunBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const run = await store.createRun(parsed.data);
    res.json({ runId: run.runId, token: run.token });
  });

  app.get("/api/runs", async (_req, res) => {
    const runs = await store.listRuns();
    const items = await Promise.all(
      runs.map(async (run) => {
        const events = await store.listEvents(run.runId);
        return {
          runId: run.runId,
          platform: run.platform,
          runType: run.runType,
          branch: run.branch,
          commit: run.commit,
          createdAt: run.createdAt,
          finished: isFinished(events),
          failed: hasFailed(events)
        };
      })
    );
    res.json(items);
  });

  app.get("/api/runs/:runId", async (req, res) => {
    const run = await store.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    const events = await store.listEvents(run.runId);
    const progress = deriveProgress(events);
    res.json({
      ...run,
      platformLabel: PLATFORM_LABELS[run.platform],
      runTypeLabel: RUN_TYPE_LABELS[run.runType],
      githubLink: githubLink(run),
      finished: isFinished(events),
      failed: hasFailed(events),
      progress,
      summary: describeProgress(progress),
      timeline: stageTimeline(events),
      events
    });
  });

  app.delete("/api/runs/:runId", async (req, res) => {
    const deleted = await store.deleteRun(req.params.runId);
    if (!deleted) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    res.json({ ok: true });
  });

  app.get("/api/runs/:runId/progress", async (req, res) => {
    const run = await store.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    res.json(deriveProgress(await store.listEvents(run.runId)));
  });

  app.post("/api/runs/:runId/events", async (req, res) => {
    const parsed = AppendEventBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const event = await store.appendEvent(req.params.runId, parsed.data);
    if (!event) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    res.json(event);
  });

  app.post("/api/runs/:runId/cases", async (req, res) => {
    const parsed = CaseBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const runId = req.params.runId;
    const { outputs, ...result } = parsed.data;
    const saved = await store.recordCase({ runId, ...result }, outputs);
    if (!saved) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    res.json({ ok: true });
  });

  app.get("/api/runs/:runId/results", async (req, res) => {
    const run = await store.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    const { results, comparisons } = await store.readCases(run.runId);
    res.json(aggregateResults(run.runId, results, comparisons));
  });

  app.get("/api/runs/:runId/cases/:caseId/outputs/:outputId/diff", async (req, res) => {
    const caseId = IntParamSchema.safeParse(req.params.caseId);
    const outputId = IntParamSchema.safeParse(req.params.outputId);
    if (!caseId.success || !outputId.success) {
      res.status(400).json({ error: "caseId and outputId must be integers" });
      return;
    }

    const comparison = await store.getOutputComparison(req.params.runId, caseId.data, outputId.data);
    if (!comparison) {
      res.status(404).json({ error: "output comparison not found" });
      return;
    }

    const download = req.query.download === "1" || req.query.download === "true";
    try {
      const html = await generateOutputDiff(comparison, resultsDir(), download ? "download" : "inline-view");
      res.setHeader("Content-Type", "text/html; charset=utf-8");
      if (download) {
        const name = `${comparison.runId}-${comparison.caseId}-${comparison.outputId}.html`;
        res.setHeader("Content-Disposition", `attachment; filename="${name}"`);
      }
      res.send(html);
    } catch (err) {
      if (err instanceof ArtifactNotFoundError) {
        res.status(404).json({ error: "cannot generate diff", detail: err.message });
        return;
      }
      if (err instanceof DecodingFailureError) {
        console.warn(`[diff] ${err.message}`);
        res.status(500).json({ error: "cannot decode output file", detail: err.message });
        return;
      }
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[diff] unexpected failure: ${message}`);
      res.status(500).json({ error: "diff failed", detail: message });
    }
  });

  return app;
}
