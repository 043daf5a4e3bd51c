import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import type {
  CodeBundle,
  GenerateBundleInput,
  GenerationBackend,
  NotificationBackend,
  NotifyAck,
  NotifyFailureInput,
  NotifyInput,
  PublicationBackend,
  PublishBundleInput,
  PublishBundleResult,
  Round,
} from "@pagesmith/shared";
import { createRoundServices } from "../../../app";
import type { AppConfig, RetrySettings } from "../../../config";

export const silentLogger = pino({ level: "silent" });

export const noDelay = { sleep: async () => {}, random: () => 0.5 };

export const TEST_OWNER = "test-owner";

export const EVALUATION_URL = "https://eval.test/notify";

export async function makeTempDir() {
  return mkdtemp(join(tmpdir(), "pagesmith-test-"));
}

export async function removeTempDir(dir: string) {
  await rm(dir, { recursive: true, force: true });
}

export function testPolicy(overrides: Partial<RetrySettings> = {}): RetrySettings {
  return { timeoutMs: 1_000, maxAttempts: 3, initialDelayMs: 1_000, maxDelayMs: 60_000, ...overrides };
}

export function testConfig(dataDir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    host: "127.0.0.1",
    dataDir,
    apiToken: "test-secret",
    defaultEvaluationUrl: EVALUATION_URL,
    generation: testPolicy(),
    publication: testPolicy(),
    notification: testPolicy({ maxAttempts: 5 }),
    ...overrides,
  };
}

export function pendingRound(projectId: string, roundNumber: number, instruction = "Build a page"): Round {
  const now = new Date().toISOString();
  return {
    project_id: projectId,
    round_number: roundNumber,
    input: { instruction, checks: [], attachments: [] },
    status: "pending",
    bundle: null,
    published_target: null,
    failure_reason: null,
    status_timestamps: { pending: now },
    created_at: now,
    last_updated_at: now,
  };
}

type Step<T> = T | Error;

function next<T>(queue: Step<T>[]): Step<T> | undefined {
  return queue.shift();
}

/** Answers from a queue of scripted results, then falls back to a page built from the instruction. */
export class FakeGenerationBackend implements GenerationBackend {
  readonly calls: GenerateBundleInput[] = [];
  readonly script: Step<CodeBundle>[] = [];

  async generate(input: GenerateBundleInput): Promise<CodeBundle> {
    this.calls.push(input);
    const step = next(this.script);
    if (step instanceof Error) throw step;
    return step ?? { files: { "index.html": `<h1>${input.instruction}</h1>` } };
  }
}

export class FakePublicationBackend implements PublicationBackend {
  readonly calls: PublishBundleInput[] = [];
  readonly script: Step<PublishBundleResult>[] = [];

  async publish(input: PublishBundleInput): Promise<PublishBundleResult> {
    this.calls.push(input);
    const step = next(this.script);
    if (step instanceof Error) throw step;
    return (
      step ?? {
        target: input.target ?? `https://${TEST_OWNER}.github.io/${input.projectId}/`,
        repository_url: `https://github.com/${TEST_OWNER}/${input.projectId}`,
        commit_sha: `commit-${input.roundNumber}`,
      }
    );
  }
}

export class FakeNotificationBackend implements NotificationBackend {
  readonly calls: NotifyInput[] = [];
  readonly script: Step<NotifyAck>[] = [];
  readonly failureCalls: NotifyFailureInput[] = [];
  readonly failureScript: Step<NotifyAck>[] = [];

  async notify(input: NotifyInput): Promise<NotifyAck> {
    this.calls.push(input);
    const step = next(this.script);
    if (step instanceof Error) throw step;
    return step ?? { acknowledged_at: new Date().toISOString(), status_code: 200 };
  }

  async notifyFailure(input: NotifyFailureInput): Promise<NotifyAck> {
    this.failureCalls.push(input);
    const step = next(this.failureScript);
    if (step instanceof Error) throw step;
    return step ?? { acknowledged_at: new Date().toISOString(), status_code: 200 };
  }
}

export function createHarness(dataDir: string, overrides: Partial<AppConfig> = {}) {
  const backends = {
    generation: new FakeGenerationBackend(),
    publication: new FakePublicationBackend(),
    notification: new FakeNotificationBackend(),
  };
  let counter = 0;
  const config = testConfig(dataDir, overrides);
  const services = createRoundServices(config, backends, silentLogger, {
    hooks: noDelay,
    newProjectId: () => {
      counter += 1;
      return `app-${counter}`;
    },
  });
  return { config, backends, ...services };
}
