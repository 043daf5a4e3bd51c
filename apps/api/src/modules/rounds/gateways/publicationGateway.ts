import type { Logger } from "pino";
import type { BundleRef, PublicationBackend } from "@pagesmith/shared";
import type { RetrySettings } from "../../../config";
import type { ArtifactStore } from "../artifactStore";
import { callWithRetry } from "./retryPolicy";
import type { RetryHooks } from "./retryPolicy";

export type PublishRequest = {
  projectId: string;
  roundNumber: number;
  instruction: string;
  bundle: BundleRef;
  target: string | null;
};

export type PublishResult = {
  target: string;
  repository_url?: string;
  commit_sha?: string;
  reused: boolean;
  attempts: number;
};

/**
 * Publication Gateway. Publishing the bundle that is live on the target now
 * is a no-op success answered from the ledger, without calling the backend.
 */
export class PublicationGateway {
  private readonly backend: PublicationBackend;
  private readonly store: ArtifactStore;
  private readonly policy: RetrySettings;
  private readonly logger: Logger;
  private readonly hooks?: RetryHooks;

  constructor(deps: {
    backend: PublicationBackend;
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

  async publish(request: PublishRequest): Promise<PublishResult> {
    const logger = this.logger.child({ project_id: request.projectId, round_number: request.roundNumber });

    if (request.target !== null) {
      const previous = await this.store.findPublication(request.projectId, request.target, request.bundle.sha256);
      if (previous) {
        logger.info({ target: previous.target, bundle_id: request.bundle.bundle_id }, "bundle already live on target");
        return {
          target: previous.target,
          repository_url: previous.repository_url,
          commit_sha: previous.commit_sha,
          reused: true,
          attempts: 0,
        };
      }
    }

    const bundle = await this.store.readBundle(request.bundle);
    const { value, attempts } = await callWithRetry(
      (signal) =>
        this.backend.publish({
          projectId: request.projectId,
          roundNumber: request.roundNumber,
          instruction: request.instruction,
          bundle,
          bundleRef: request.bundle,
          target: request.target,
          signal,
        }),
      { label: "publication", policy: this.policy, logger, hooks: this.hooks }
    );

    await this.store.recordPublication(request.projectId, {
      target: value.target,
      bundle_sha256: request.bundle.sha256,
      round_number: request.roundNumber,
      repository_url: value.repository_url,
      commit_sha: value.commit_sha,
      published_at: new Date().toISOString(),
    });

    logger.info({ target: value.target, commit_sha: value.commit_sha, attempts }, "bundle published");
    return { ...value, reused: false, attempts };
  }
}
