import type { AttemptStatus } from "./types.js";

const ALLOWED_TRANSITIONS: Record<AttemptStatus, AttemptStatus[]> = {
  initiated: ["requires_action", "pending", "authorized", "captured", "failed"],
  requires_action: ["pending", "authorized", "captured", "failed"],
  pending: ["authorized", "captured", "failed"],
  authorized: ["captured", "voided", "failed"],
  captured: ["refunded", "disputed"],
  voided: [],
  refunded: [],
  failed: [],
  disputed: [],
};

const TERMINAL_STATUSES: ReadonlySet<AttemptStatus> = new Set(["voided", "refunded", "failed", "disputed"]);

export function canTransition(current: AttemptStatus, next: AttemptStatus): boolean {
  const allowed = ALLOWED_TRANSITIONS[current];
  return allowed.includes(next);
}

export function isTerminalStatus(status: AttemptStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}
