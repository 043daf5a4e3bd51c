import { z } from "zod";
import {
  FAILURE_CLASSIFICATIONS,
  INSTRUCTION_MAX_LENGTH,
  PIPELINE_STAGES,
  PROJECT_ID_MAX_LENGTH,
  ROUND_FAILURE_REASONS,
  ROUND_STATUSES,
} from "../constants";

const IsoDateSchema = z.iso.datetime();

// Project ids double as repository names, so they follow GitHub's naming rules.
export const ProjectIdSchema = z
  .string()
  .min(1)
  .max(PROJECT_ID_MAX_LENGTH)
  .regex(/^[A-Za-z0-9_-]+$/, "project_id may only contain letters, digits, '_' and '-'")
  .superRefine((value, ctx) => {
    if (value.startsWith("-") || value.endsWith("-")) {
      ctx.addIssue({ code: "custom", message: "project_id cannot start or end with a hyphen" });
    }
    if (value.includes("__")) {
      ctx.addIssue({ code: "custom", message: "project_id cannot contain consecutive underscores" });
    }
  });

export type ProjectId = z.infer<typeof ProjectIdSchema>;

export const RoundStatusSchema = z.enum(ROUND_STATUSES);
export type RoundStatus = z.infer<typeof RoundStatusSchema>;

export const PipelineStageSchema = z.enum(PIPELINE_STAGES);
export type PipelineStage = z.infer<typeof PipelineStageSchema>;

export const RoundFailureReasonSchema = z.enum(ROUND_FAILURE_REASONS);
export type RoundFailureReason = z.infer<typeof RoundFailureReasonSchema>;

export const FailureClassificationSchema = z.enum(FAILURE_CLASSIFICATIONS);
export type FailureClassification = z.infer<typeof FailureClassificationSchema>;

export const AttachmentSchema = z
  .object({
    name: z.string().min(1),
    url: z.string().min(1), // may be a data: URI
  })
  .strict();

export type Attachment = z.infer<typeof AttachmentSchema>;

export const EvaluationTargetSchema = z
  .object({
    url: z.url(),
    email: z.email().optional(),
    nonce: z.string().min(1).optional(),
  })
  .strict();

export type EvaluationTarget = z.infer<typeof EvaluationTargetSchema>;

export const RoundInputSchema = z
  .object({
    instruction: z.string().trim().min(1).max(INSTRUCTION_MAX_LENGTH),
    checks: z.array(z.string().min(1)).default([]),
    attachments: z.array(AttachmentSchema).default([]),
    evaluation: EvaluationTargetSchema.optional(),
  })
  .strict();

export type RoundInput = z.infer<typeof RoundInputSchema>;
export type RoundInputDraft = z.input<typeof RoundInputSchema>;

export const BundleRefSchema = z
  .object({
    bundle_id: z.string().min(1),
    sha256: z.string().regex(/^[a-f0-9]{64}$/),
    file_count: z.number().int().positive(),
    created_at: IsoDateSchema,
  })
  .strict();

export type BundleRef = z.infer<typeof BundleRefSchema>;

export const RoundFailureSchema = z
  .object({
    stage: PipelineStageSchema,
    classification: FailureClassificationSchema,
    message: z.string().min(1),
    attempts: z.number().int().nonnegative(),
  })
  .strict();

export type RoundFailure = z.infer<typeof RoundFailureSchema>;

export const PublicationMetadataSchema = z
  .object({
    repository_url: z.url().optional(),
    commit_sha: z.string().min(1).optional(),
    reused: z.boolean().default(false),
  })
  .strict();

export type PublicationMetadata = z.infer<typeof PublicationMetadataSchema>;

// "deployment" notices report a live round; "failure" notices report one that gave up.
export const NotificationMetadataSchema = z
  .object({
    kind: z.enum(["deployment", "failure"]).default("deployment"),
    delivered: z.boolean().default(true),
    attempts: z.number().int().nonnegative(),
    acknowledged_at: IsoDateSchema.optional(),
    error: z.string().min(1).optional(),
  })
  .strict();

export type NotificationMetadata = z.infer<typeof NotificationMetadataSchema>;

// Maps status -> ISO timestamp of the first time the round entered it.
const StatusTimestampsSchema = z.partialRecord(RoundStatusSchema, IsoDateSchema);

// Full round shape persisted to projects/<projectId>/rounds/<n>.json.
export const RoundSchema = z
  .object({
    project_id: ProjectIdSchema,
    round_number: z.number().int().positive(),
    input: RoundInputSchema,
    status: RoundStatusSchema,
    bundle: BundleRefSchema.nullable(),
    published_target: z.url().nullable(),
    failure_reason: RoundFailureReasonSchema.nullable(),
    failure: RoundFailureSchema.optional(),
    publication: PublicationMetadataSchema.optional(),
    notification: NotificationMetadataSchema.optional(),
    reused_bundle_from: z.number().int().positive().optional(),
    status_timestamps: StatusTimestampsSchema,
    created_at: IsoDateSchema,
    last_updated_at: IsoDateSchema,
  })
  .strict();

export type Round = z.infer<typeof RoundSchema>;

// Persisted to projects/<projectId>/project.json.
export const ProjectSchema = z
  .object({
    project_id: ProjectIdSchema,
    created_at: IsoDateSchema,
    current_target: z.url().nullable(),
    round_numbers: z.array(z.number().int().positive()).default([]),
    last_updated_at: IsoDateSchema,
  })
  .strict();

export type Project = z.infer<typeof ProjectSchema>;

// What submitRound hands back to its caller.
export const RoundResultSchema = z
  .object({
    project_id: ProjectIdSchema,
    round_number: z.number().int().positive(),
    status: RoundStatusSchema,
    published_target: z.url().optional(),
    failure_reason: RoundFailureReasonSchema.optional(),
  })
  .strict();

export type RoundResult = z.infer<typeof RoundResultSchema>;
