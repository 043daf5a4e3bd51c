import type { Logger } from "pino";
import {
  CodeBundleSchema,
  UpstreamRejectedError,
  normalizeBundleFiles,
} from "@pagesmith/shared";
import type { Attachment, BundleRef, CodeBundle, GenerationBackend } from "@pagesmith/shared";
import type { RetrySettings } from "../../../config";
import type { ArtifactStore } from "../artifactStore";
import { describeError } from "./classifyFailure";
import { callWithRetry } from "./retryPolicy";
import type { RetryHooks } from "./retryPolicy";

export type GenerateRequest = {
  projectId: string;
  roundNumber: number;
  instruction: string;
  checks: string[];
  attachments: Attachment[];
  priorBundle?: BundleRef;
};

export type GenerateResult = {
  bundle: BundleRef;
  attempts: number;
};

// Backend output is untrusted: anything that fails the bundle schema is a rejection, not a retry.
function validateBundle(output: CodeBundle): CodeBundle {
  const parsed = CodeBundleSchema.safeParse({ files: normalizeBundleFiles(output.files) });
  if (!parsed.success) {
    throw new UpstreamRejectedError(`Generated bundle is invalid: ${describeError(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Generation Gateway: model call under timeout and retry, output validation,
 * and storage of the accepted bundle so later stages only pass references around.
 */
export class GenerationGateway {
  private readonly backend: GenerationBackend;
  private readonly store: ArtifactStore;
  private readonly policy: RetrySettings;
  private readonly logger: Logger;
  private readonly hooks?: RetryHooks;

  constructor(deps: {
    backend: GenerationBackend;
    store: ArtifactStore;
    policy: RetrySettings;
    logger: Logger;
    hooks?: RetryHooks;
  }) {
    this.backend = deps.backend;
    this.store = deps.store;
    this.policy = deps.policy;
    this.logger = deps.logger;
    this.hooks = deps.hooks;
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    const logger = this.logger.child({ project_id: request.projectId, round_number: request.roundNumber });
    const priorBundle = request.priorBundle ? await this.store.readBundle(request.priorBundle) : undefined;

    const { value, attempts } = await callWithRetry(
      async (signal) =>
        validateBundle(
          await this.backend.generate({
            projectId: request.projectId,
            roundNumber: request.roundNumber,
            instruction: request.instruction,
            checks: request.checks,
            attachments: request.attachments,
            priorBundle,
            signal,
          })
        ),
      { label: "generation", policy: this.policy, logger, hooks: this.hooks }
    );

    const bundle = await this.store.writeBundle(request.projectId, request.roundNumber, value);
    logger.info({ bundle_id: bundle.bundle_id, file_count: bundle.file_count, attempts }, "bundle generated");
    return { bundle, attempts };
  }
}
