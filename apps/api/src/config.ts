import path from "node:path";
import { z } from "zod";

/**
 * Server configuration, parsed once from process.env.
 * Backends in @pagesmith/agents read their own credentials.
 */

const PositiveInt = z.coerce.number().int().positive();

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

export const ConfigSchema = z.object({
  PORT: PositiveInt.default(3001),
  HOST: z.string().min(1).default("0.0.0.0"),
  PAGESMITH_DATA_DIR: optionalString,
  PAGESMITH_API_TOKEN: optionalString,
  DEFAULT_EVALUATION_URL: optionalString.pipe(z.url().optional()),

  GENERATION_TIMEOUT_MS: PositiveInt.default(300_000),
  GENERATION_MAX_ATTEMPTS: PositiveInt.default(3),
  PUBLICATION_TIMEOUT_MS: PositiveInt.default(180_000),
  PUBLICATION_MAX_ATTEMPTS: PositiveInt.default(3),
  NOTIFICATION_TIMEOUT_MS: PositiveInt.default(30_000),
  NOTIFICATION_MAX_ATTEMPTS: PositiveInt.default(5),

  RETRY_INITIAL_DELAY_MS: PositiveInt.default(1_000),
  RETRY_MAX_DELAY_MS: PositiveInt.default(60_000),
});

export type RetrySettings = {
  timeoutMs: number;
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
};

export type AppConfig = {
  port: number;
  host: string;
  dataDir: string;
  apiToken?: string;
  defaultEvaluationUrl?: string;
  generation: RetrySettings;
  publication: RetrySettings;
  notification: RetrySettings;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);
  const backoff = {
    initialDelayMs: parsed.RETRY_INITIAL_DELAY_MS,
    maxDelayMs: parsed.RETRY_MAX_DELAY_MS,
  };

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    dataDir: parsed.PAGESMITH_DATA_DIR ?? path.resolve(__dirname, "../../../data"),
    apiToken: parsed.PAGESMITH_API_TOKEN,
    defaultEvaluationUrl: parsed.DEFAULT_EVALUATION_URL,
    generation: {
      timeoutMs: parsed.GENERATION_TIMEOUT_MS,
      maxAttempts: parsed.GENERATION_MAX_ATTEMPTS,
      ...backoff,
    },
    publication: {
      timeoutMs: parsed.PUBLICATION_TIMEOUT_MS,
      maxAttempts: parsed.PUBLICATION_MAX_ATTEMPTS,
      ...backoff,
    },
    notification: {
      timeoutMs: parsed.NOTIFICATION_TIMEOUT_MS,
      maxAttempts: parsed.NOTIFICATION_MAX_ATTEMPTS,
      ...backoff,
    },
  };
}
