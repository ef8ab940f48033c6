export const STAGE_ORDER = Object.freeze(["preparation", "building", "testing", "completed"] as const);

export type RunStage = (typeof STAGE_ORDER)[number];

/** Terminal outcome reachable from any stage. It has no position in STAGE_ORDER. */
export type RunOutcome = "canceled";

export type RunStatus = RunStage | RunOutcome;

export const RUN_STATUSES = [...STAGE_ORDER, "canceled"] as const;

const STATUS_LABELS: Record<RunStatus, string> = {
  preparation: "Preparation",
  building: "Building",
  testing: "Testing",
  completed: "Completed",
  canceled: "Canceled/Error"
};

export function orderedStages(): readonly RunStage[] {
  return STAGE_ORDER;
}

export function isTerminalStatus(status: RunStatus): boolean {
  return status === "completed" || status === "canceled";
}

/** Position of a stage in STAGE_ORDER, or -1 for `canceled` and unknown values. */
export function indexOf(status: string): number {
  return (STAGE_ORDER as readonly string[]).indexOf(status);
}

export function stageLabel(status: RunStatus): string {
  return STATUS_LABELS[status];
}
