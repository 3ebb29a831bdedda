export type WorkflowStatus =
  | "pending"
  | "running"
  | "waiting_for_human"
  | "succeeded"
  | "failed"
  | "aborted";

export type WorkflowTransition = {
  from: WorkflowStatus;
  to: WorkflowStatus;
  stepIndex: number | null;
  reason: string | null;
  at: number;
};

export const TERMINAL_STATUSES: ReadonlySet<WorkflowStatus> = new Set(["succeeded", "failed", "aborted"]);

export const ALLOWED_TRANSITIONS: ReadonlyMap<WorkflowStatus, WorkflowStatus[]> = new Map([
  ["pending", ["running", "aborted"]],
  ["running", ["waiting_for_human", "succeeded", "failed", "aborted"]],
  ["waiting_for_human", ["running", "failed", "aborted"]],
  ["succeeded", []],
  ["failed", []],
  ["aborted", []],
]);

export function canTransition(from: WorkflowStatus, to: WorkflowStatus): boolean {
  const allowed = ALLOWED_TRANSITIONS.get(from);
  return allowed?.includes(to) ?? false;
}

export function validateTransition(from: WorkflowStatus, to: WorkflowStatus): void {
  if (!canTransition(from, to)) {
    throw new Error(
      `Invalid workflow state transition: ${from} -> ${to}. Allowed: ${ALLOWED_TRANSITIONS.get(from)?.join(", ") || "none"}`
    );
  }
}

export function isTerminal(status: WorkflowStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}
