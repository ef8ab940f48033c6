import { indexOf, isTerminalStatus, orderedStages, stageLabel, STAGE_ORDER, type RunStage, type RunStatus } from "./stages.js";

export type RunEvent = {
  runId: string;
  status: RunStatus;
  /** ISO-8601, always UTC. */
  timestamp: string;
  message: string;
};

export const UNSET = "unset";

export type RunProgressReport = {
  state: "ok" | "error";
  /** Index into orderedStages(), -1 when unknown or not started. */
  stepIndex: number;
  stages: readonly RunStage[];
  start: string;
  end: string;
};

export type StageTimelineEntry = {
  stage: RunStage;
  enteredAt: string | null;
  durationMs: number | null;
};

// Interpretation only: ordering of the log is the writer's responsibility.
// Every function here looks at the tail of whatever sequence it is handed.

function lastOf(events: readonly RunEvent[]): RunEvent | undefined {
  return events.length > 0 ? events[events.length - 1] : undefined;
}

export function isFinished(events: readonly RunEvent[]): boolean {
  const last = lastOf(events);
  return last !== undefined && isTerminalStatus(last.status);
}

export function hasFailed(events: readonly RunEvent[]): boolean {
  return lastOf(events)?.status === "canceled";
}

export function deriveProgress(events: readonly RunEvent[]): RunProgressReport {
  const report: RunProgressReport = {
    state: "error",
    stepIndex: -1,
    stages: orderedStages(),
    start: UNSET,
    end: UNSET
  };

  const last = lastOf(events);
  if (!last) return report;

  report.start = events[0].timestamp;
  if (isTerminalStatus(last.status)) report.end = last.timestamp;

  if (last.status === "canceled") {
    // Cancellation is not a stage; report the last real stage reached before it.
    if (events.length > 1) report.stepIndex = indexOf(events[events.length - 2].status);
    return report;
  }

  report.state = "ok";
  report.stepIndex = indexOf(last.status);
  return report;
}

export function describeProgress(report: RunProgressReport): string {
  const stage = report.stepIndex >= 0 ? report.stages[report.stepIndex] : undefined;
  if (report.state === "error") {
    if (report.start === UNSET) return "Not started";
    return stage ? `${stageLabel("canceled")} after ${stageLabel(stage)}` : stageLabel("canceled");
  }
  if (!stage) return "Unknown stage";
  return `${stageLabel(stage)} (${report.stepIndex + 1}/${report.stages.length})`;
}

/**
 * When each ordered stage was first entered, and how long it lasted until the
 * following event. A stage still in progress, or never reached, has no duration.
 */
export function stageTimeline(events: readonly RunEvent[]): StageTimelineEntry[] {
  return STAGE_ORDER.map((stage) => {
    const at = events.findIndex((e) => e.status === stage);
    if (at < 0) return { stage, enteredAt: null, durationMs: null };

    const enteredAt = events[at].timestamp;
    const next = at + 1 < events.length ? events[at + 1] : undefined;
    if (!next || stage === "completed") return { stage, enteredAt, durationMs: null };

    const elapsed = Date.parse(next.timestamp) - Date.parse(enteredAt);
    return { stage, enteredAt, durationMs: Number.isFinite(elapsed) ? Math.max(0, elapsed) : null };
  });
}
