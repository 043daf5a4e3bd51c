import { z } from "zod";
import {
  ProjectIdSchema,
  ProjectSchema,
  RoundInputSchema,
  RoundResultSchema,
  RoundSchema,
} from "@pagesmith/shared";

// POST /rounds may name the project; without one a fresh id is generated.
export const SubmitRoundRequestSchema = RoundInputSchema.extend({
  project_id: ProjectIdSchema.optional(),
}).strict();

// POST /projects/:projectId/rounds takes the project from the path.
export const SubmitProjectRoundRequestSchema = RoundInputSchema;

export const RetryRoundRequestSchema = z
  .object({
    instruction: z.string().trim().min(1).optional(),
  })
  .strict();

export const WaitQuerySchema = z
  .object({
    wait: z
      .enum(["true", "false"])
      .optional()
      .transform((value) => value === "true"),
  })
  .loose();

export const ProjectIdParamsSchema = z.object({ projectId: ProjectIdSchema }).strict();

export const RoundParamsSchema = z
  .object({
    projectId: ProjectIdSchema,
    roundNumber: z.coerce.number().int().positive(),
  })
  .strict();

// 202: the round is accepted and runs in the background.
export const AcceptedRoundResponseSchema = z.object({ round: RoundSchema }).strict();

// 200/502 with ?wait=true: the terminal result.
export const RoundResultResponseSchema = z.object({ result: RoundResultSchema }).strict();

export const ListProjectsResponseSchema = z
  .object({
    total: z.number().int().nonnegative(),
    projects: z.array(ProjectSchema),
  })
  .strict();

export const GetProjectResponseSchema = z
  .object({
    project: ProjectSchema,
    rounds: z.array(RoundSchema),
  })
  .strict();

export const GetRoundResponseSchema = z.object({ round: RoundSchema }).strict();

export const HealthResponseSchema = z
  .object({
    ok: z.literal(true),
    in_flight: z.number().int().nonnegative(),
  })
  .strict();
