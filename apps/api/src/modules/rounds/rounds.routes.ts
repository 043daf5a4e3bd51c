import type { FastifyInstance } from "fastify";
import type { Logger } from "pino";
import type { ArtifactStore } from "./artifactStore";
import { createBearerAuth } from "./auth";
import type { ProjectLocks } from "./projectLocks";
import type { ProjectRegistry } from "./projectRegistry";
import type { RoundOrchestrator } from "./roundOrchestrator";
import { createRoundsController } from "./rounds.controller";

export type RoundsRouteDeps = {
  orchestrator: RoundOrchestrator;
  store: ArtifactStore;
  registry: ProjectRegistry;
  locks: ProjectLocks;
  logger: Logger;
  apiToken?: string;
};

export function registerRoundsRoutes(app: FastifyInstance, deps: RoundsRouteDeps) {
  const controller = createRoundsController(deps);
  const requireBearerToken = createBearerAuth(deps.apiToken);

  app.get("/health", controller.health);

  // Submitting rounds triggers generation and publication, so it needs the API token.
  app.post("/rounds", { preHandler: requireBearerToken }, controller.submitRound);
  app.post("/projects/:projectId/rounds", { preHandler: requireBearerToken }, controller.submitProjectRound);
  app.post("/projects/:projectId/rounds/retry", { preHandler: requireBearerToken }, controller.retryRound);

  app.get("/projects", controller.listProjects);
  app.get("/projects/:projectId", controller.getProject);
  app.get("/projects/:projectId/rounds/:roundNumber", controller.getRound);
}
