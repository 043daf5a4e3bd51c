import Fastify from "fastify";
import type { FastifyBaseLogger, FastifyInstance } from "fastify";
import type { Logger } from "pino";
import type { GenerationBackend, NotificationBackend, PublicationBackend } from "@pagesmith/shared";
import type { AppConfig } from "./config";
import { FileArtifactStore } from "./modules/rounds/artifactStore";
import type { ArtifactStore } from "./modules/rounds/artifactStore";
import { GenerationGateway } from "./modules/rounds/gateways/generationGateway";
import { NotificationGateway } from "./modules/rounds/gateways/notificationGateway";
import { PublicationGateway } from "./modules/rounds/gateways/publicationGateway";
import type { RetryHooks } from "./modules/rounds/gateways/retryPolicy";
import { ProjectLocks } from "./modules/rounds/projectLocks";
import { ProjectRegistry } from "./modules/rounds/projectRegistry";
import { RoundOrchestrator } from "./modules/rounds/roundOrchestrator";
import { RoundRecovery } from "./modules/rounds/roundRecovery";
import { registerRoundsRoutes } from "./modules/rounds/rounds.routes";

export type Backends = {
  generation: GenerationBackend;
  publication: PublicationBackend;
  notification: NotificationBackend;
};

export type RoundServices = {
  store: ArtifactStore;
  registry: ProjectRegistry;
  locks: ProjectLocks;
  orchestrator: RoundOrchestrator;
  recovery: RoundRecovery;
};

export function createRoundServices(
  config: AppConfig,
  backends: Backends,
  logger: Logger,
  opts: { hooks?: RetryHooks; newProjectId?: () => string } = {}
): RoundServices {
  const store = new FileArtifactStore({ dataDir: config.dataDir });
  const registry = new ProjectRegistry({ dataDir: config.dataDir });
  const locks = new ProjectLocks();

  const orchestrator = new RoundOrchestrator({
    store,
    registry,
    locks,
    logger: logger.child({ component: "orchestrator" }),
    newProjectId: opts.newProjectId,
    generation: new GenerationGateway({
      backend: backends.generation,
      store,
      policy: config.generation,
      logger: logger.child({ stage: "generation" }),
      hooks: opts.hooks,
    }),
    publication: new PublicationGateway({
      backend: backends.publication,
      store,
      policy: config.publication,
      logger: logger.child({ stage: "publication" }),
      hooks: opts.hooks,
    }),
    notification: new NotificationGateway({
      backend: backends.notification,
      policy: config.notification,
      logger: logger.child({ stage: "notification" }),
      defaultUrl: config.defaultEvaluationUrl,
      hooks: opts.hooks,
    }),
  });

  const recovery = new RoundRecovery({ store, registry, locks, logger: logger.child({ component: "recovery" }) });
  return { store, registry, locks, orchestrator, recovery };
}

export function buildServer(deps: { config: AppConfig; services: RoundServices; logger: Logger }): FastifyInstance {
  const loggerInstance: FastifyBaseLogger = deps.logger;
  const app = Fastify({ loggerInstance });

  registerRoundsRoutes(app, {
    ...deps.services,
    logger: deps.logger,
    apiToken: deps.config.apiToken,
  });

  return app;
}
