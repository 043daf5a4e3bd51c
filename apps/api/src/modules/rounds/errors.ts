import type {
  FailureClassification,
  PipelineStage,
  RoundFailureReason,
} from "@pagesmith/shared";

/**
 * Error taxonomy for the round pipeline.
 * Stage failures end a round, never a project; InvariantViolation is a bug or corrupt data.
 */

// A round is already in flight for this project. Callers retry after backoff.
export class ConflictError extends Error {
  readonly projectId: string;

  constructor(projectId: string, message = `A round is already in flight for project ${projectId}.`) {
    super(message);
    this.name = "ConflictError";
    this.projectId = projectId;
  }
}

export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolation";
  }
}

export class ProjectNotFoundError extends Error {
  constructor(projectId: string) {
    super(`Project not found: ${projectId}`);
    this.name = "ProjectNotFoundError";
  }
}

export class RoundNotFoundError extends Error {
  constructor(projectId: string, roundNumber: number) {
    super(`Round not found: ${projectId} #${roundNumber}`);
    this.name = "RoundNotFoundError";
  }
}

// Raised by a gateway once it stops trying. The orchestrator maps it onto a stage failure.
export class GatewayFailure extends Error {
  readonly classification: FailureClassification;
  readonly attempts: number;

  constructor(
    message: string,
    classification: FailureClassification,
    attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "GatewayFailure";
    this.classification = classification;
    this.attempts = attempts;
  }
}

const STAGE_REASONS: Record<PipelineStage, RoundFailureReason> = {
  generation: "generation_failed",
  publication: "publication_failed",
  notification: "notification_failed",
};

export function failureReasonFor(stage: PipelineStage): RoundFailureReason {
  return STAGE_REASONS[stage];
}

export abstract class StageFailure extends Error {
  abstract readonly stage: PipelineStage;
  readonly classification: FailureClassification;
  readonly attempts: number;

  constructor(failure: GatewayFailure) {
    super(failure.message, { cause: failure });
    this.classification = failure.classification;
    this.attempts = failure.attempts;
  }

  get reason(): RoundFailureReason {
    return failureReasonFor(this.stage);
  }
}

export class GenerationFailure extends StageFailure {
  readonly stage = "generation" as const;

  constructor(failure: GatewayFailure) {
    super(failure);
    this.name = "GenerationFailure";
  }
}

export class PublicationFailure extends StageFailure {
  readonly stage = "publication" as const;

  constructor(failure: GatewayFailure) {
    super(failure);
    this.name = "PublicationFailure";
  }
}

export class NotificationFailure extends StageFailure {
  readonly stage = "notification" as const;

  constructor(failure: GatewayFailure) {
    super(failure);
    this.name = "NotificationFailure";
  }
}
