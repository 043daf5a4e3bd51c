import { TERMINAL_ROUND_STATUSES } from "@pagesmith/shared";
import type { PipelineStage, RoundStatus } from "@pagesmith/shared";
import { InvariantViolation } from "./errors";

const allowed: Record<RoundStatus, readonly RoundStatus[]> = {
  pending: ["generating", "failed"],
  generating: ["generated", "failed"],
  generated: ["publishing", "failed"],
  publishing: ["published", "failed"],
  published: ["notifying", "failed"],
  notifying: ["completed", "failed"],
  completed: [],
  failed: [],
};

const terminal: readonly RoundStatus[] = TERMINAL_ROUND_STATUSES;

export function isTerminalStatus(status: RoundStatus): boolean {
  return terminal.includes(status);
}

export function canMoveRound(from: RoundStatus, to: RoundStatus): boolean {
  return from === to || allowed[from].includes(to);
}

export function assertCanMoveRound(from: RoundStatus, to: RoundStatus) {
  if (!canMoveRound(from, to)) {
    throw new InvariantViolation(`Invalid round status transition: ${from} -> ${to}`);
  }
}

// The stage a non-terminal round was in, used to attribute a failure.
export function stageOf(status: RoundStatus): PipelineStage {
  switch (status) {
    case "pending":
    case "generating":
      return "generation";
    case "generated":
    case "publishing":
      return "publication";
    case "published":
    case "notifying":
      return "notification";
    case "completed":
    case "failed":
      throw new InvariantViolation(`Round status ${status} is terminal and has no active stage.`);
  }
}
