import { config as loadDotenv } from "dotenv";
import { resolve } from "node:path";
import {
  AnthropicGenerationBackend,
  EvaluationNotificationBackend,
  GitHubPagesPublicationBackend,
} from "@pagesmith/agents";
import { buildServer, createRoundServices } from "./app";
import { loadConfig } from "./config";
import { createLogger } from "./logger";

loadDotenv({ path: resolve(__dirname, "../../../.env") });

async function start() {
  const logger = createLogger("pagesmith-api");
  const config = loadConfig();

  const services = createRoundServices(
    config,
    {
      generation: new AnthropicGenerationBackend({ logger: logger.child({ backend: "anthropic" }) }),
      publication: new GitHubPagesPublicationBackend({ logger: logger.child({ backend: "github-pages" }) }),
      notification: new EvaluationNotificationBackend(),
    },
    logger
  );

  // Rounds left mid-pipeline by a previous process would otherwise block their projects.
  await services.recovery.recoverInterruptedRounds();

  const app = buildServer({ config, services, logger });
  await app.listen({ port: config.port, host: config.host });
}

start().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
