// packages/shared/src/constants.ts

/** Round lifecycle, in pipeline order. */
export const ROUND_STATUSES = [
  "pending",
  "generating",
  "generated",
  "publishing",
  "published",
  "notifying",
  "completed",
  "failed",
] as const;

/** A round in one of these statuses is never written again. */
export const TERMINAL_ROUND_STATUSES = ["completed", "failed"] as const;

/** Pipeline stages, each owned by one gateway. */
export const PIPELINE_STAGES = ["generation", "publication", "notification"] as const;

/** Failure reasons recorded on a failed round; one per stage. */
export const ROUND_FAILURE_REASONS = [
  "generation_failed",
  "publication_failed",
  "notification_failed",
] as const;

/** How a gateway classifies an external failure. Only transient and timeout are retried. */
export const FAILURE_CLASSIFICATIONS = ["timeout", "rejected", "transient", "unknown"] as const;

/** Bundles must be servable as a static site from this entry point. */
export const BUNDLE_ENTRY_FILE = "index.html";

export const PROJECT_ID_MAX_LENGTH = 100;

export const INSTRUCTION_MAX_LENGTH = 20_000;
