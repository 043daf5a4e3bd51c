import type { FastifyReply, FastifyRequest } from "fastify";
import type { Logger } from "pino";
import { z } from "zod";

import type { ArtifactStore } from "./artifactStore";
import { ConflictError, ProjectNotFoundError, RoundNotFoundError } from "./errors";
import type { ProjectLocks } from "./projectLocks";
import type { ProjectRegistry } from "./projectRegistry";
import type { RoundHandle, RoundOrchestrator } from "./roundOrchestrator";
import {
  AcceptedRoundResponseSchema,
  GetProjectResponseSchema,
  GetRoundResponseSchema,
  HealthResponseSchema,
  ListProjectsResponseSchema,
  ProjectIdParamsSchema,
  RetryRoundRequestSchema,
  RoundParamsSchema,
  RoundResultResponseSchema,
  SubmitProjectRoundRequestSchema,
  SubmitRoundRequestSchema,
  WaitQuerySchema,
} from "./rounds.dtos";

// Known errors become JSON error bodies; anything else is left to Fastify's 500 handler.
function sendKnownError(err: unknown, reply: FastifyReply) {
  if (err instanceof z.ZodError) {
    return reply.code(400).send({ error: "bad_request", issues: err.issues });
  }
  if (err instanceof ConflictError) {
    return reply.code(409).send({ error: "round_conflict", project_id: err.projectId, message: err.message });
  }
  if (err instanceof ProjectNotFoundError) {
    return reply.code(404).send({ error: "project_not_found", message: err.message });
  }
  if (err instanceof RoundNotFoundError) {
    return reply.code(404).send({ error: "round_not_found", message: err.message });
  }
  throw err;
}

export function createRoundsController(deps: {
  orchestrator: RoundOrchestrator;
  store: ArtifactStore;
  registry: ProjectRegistry;
  locks: ProjectLocks;
  logger: Logger;
}) {
  const { orchestrator, store, registry, locks, logger } = deps;

  // Without wait the pipeline keeps running after the 202; its outcome lands on the round record.
  async function respond(handle: RoundHandle, wait: boolean, reply: FastifyReply) {
    if (!wait) {
      void orchestrator.runRound(handle).catch((err: unknown) => {
        logger.error(
          { err, project_id: handle.round.project_id, round_number: handle.round.round_number },
          "background round crashed"
        );
      });
      return reply.code(202).send(AcceptedRoundResponseSchema.parse({ round: handle.round }));
    }

    const result = await orchestrator.runRound(handle);
    return reply
      .code(result.status === "failed" ? 502 : 200)
      .send(RoundResultResponseSchema.parse({ result }));
  }

  return {
    async health(_request: FastifyRequest, reply: FastifyReply) {
      return reply.send(HealthResponseSchema.parse({ ok: true, in_flight: locks.snapshot().length }));
    },

    async submitRound(request: FastifyRequest, reply: FastifyReply) {
      let handle: RoundHandle;
      let wait: boolean;
      try {
        ({ wait } = WaitQuerySchema.parse(request.query));
        const { project_id, ...input } = SubmitRoundRequestSchema.parse(request.body);
        handle = await orchestrator.beginRound(project_id, input);
      } catch (err) {
        return sendKnownError(err, reply);
      }
      return respond(handle, wait, reply);
    },

    async submitProjectRound(request: FastifyRequest, reply: FastifyReply) {
      let handle: RoundHandle;
      let wait: boolean;
      try {
        ({ wait } = WaitQuerySchema.parse(request.query));
        const { projectId } = ProjectIdParamsSchema.parse(request.params);
        const input = SubmitProjectRoundRequestSchema.parse(request.body);
        handle = await orchestrator.beginRound(projectId, input);
      } catch (err) {
        return sendKnownError(err, reply);
      }
      return respond(handle, wait, reply);
    },

    async retryRound(request: FastifyRequest, reply: FastifyReply) {
      let handle: RoundHandle;
      let wait: boolean;
      try {
        ({ wait } = WaitQuerySchema.parse(request.query));
        const { projectId } = ProjectIdParamsSchema.parse(request.params);
        const { instruction } = RetryRoundRequestSchema.parse(request.body ?? {});
        handle = await orchestrator.retryRound(projectId, { instruction });
      } catch (err) {
        return sendKnownError(err, reply);
      }
      return respond(handle, wait, reply);
    },

    async listProjects(_request: FastifyRequest, reply: FastifyReply) {
      const projects = await registry.list();
      return reply.send(ListProjectsResponseSchema.parse({ total: projects.length, projects }));
    },

    async getProject(request: FastifyRequest, reply: FastifyReply) {
      try {
        const { projectId } = ProjectIdParamsSchema.parse(request.params);
        const project = await registry.get(projectId);
        const rounds = await store.list(projectId);
        return reply.send(GetProjectResponseSchema.parse({ project, rounds }));
      } catch (err) {
        return sendKnownError(err, reply);
      }
    },

    async getRound(request: FastifyRequest, reply: FastifyReply) {
      try {
        const { projectId, roundNumber } = RoundParamsSchema.parse(request.params);
        await registry.get(projectId);
        const round = await store.load(projectId, roundNumber);
        return reply.send(GetRoundResponseSchema.parse({ round }));
      } catch (err) {
        return sendKnownError(err, reply);
      }
    },
  };
}
