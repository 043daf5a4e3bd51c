import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { ProjectIdSchema, RoundInputSchema } from "@pagesmith/shared";
import type {
  BundleRef,
  NotificationMetadata,
  PipelineStage,
  Project,
  Round,
  RoundInputDraft,
  RoundResult,
  RoundStatus,
} from "@pagesmith/shared";
import type { ArtifactStore } from "./artifactStore";
import {
  ConflictError,
  GatewayFailure,
  GenerationFailure,
  NotificationFailure,
  PublicationFailure,
  RoundNotFoundError,
  failureReasonFor,
} from "./errors";
import type { StageFailure } from "./errors";
import { describeError } from "./gateways/classifyFailure";
import type { GenerationGateway } from "./gateways/generationGateway";
import type { NotificationGateway, NotifyResult } from "./gateways/notificationGateway";
import type { PublicationGateway, PublishResult } from "./gateways/publicationGateway";
import type { ProjectLockRecord, ProjectLocks } from "./projectLocks";
import type { ProjectRegistry } from "./projectRegistry";
import { assertCanMoveRound, isTerminalStatus, stageOf } from "./roundTransitions";

/**
 * Round Orchestrator (core state machine).
 *
 * pending -> generating -> generated -> publishing -> published -> notifying -> completed
 *
 * Every transition is saved before the next stage starts. Any stage can end the
 * round as failed; a later stage never undoes an earlier one.
 */

export type RoundHandle = {
  lock: ProjectLockRecord;
  round: Round;
  project: Project;
  // Revision context: the newest earlier round that produced a bundle.
  priorBundle?: BundleRef;
  // Set when a retry round takes over a bundle a failed round left behind.
  reusedBundle?: { bundle: BundleRef; from: number };
  // Where this round publishes: the latest target an earlier round went live on, or null for a fresh one.
  target: string | null;
};

export type BeginRoundOptions = {
  reuseRetainedBundle?: boolean;
};

export type RetryRoundOptions = {
  instruction?: string;
};

const STAGE_FAILURES: Record<PipelineStage, new (failure: GatewayFailure) => StageFailure> = {
  generation: GenerationFailure,
  publication: PublicationFailure,
  notification: NotificationFailure,
};

export function generateProjectId() {
  return `app-${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}

export function toRoundResult(round: Round): RoundResult {
  return {
    project_id: round.project_id,
    round_number: round.round_number,
    status: round.status,
    ...(round.published_target ? { published_target: round.published_target } : {}),
    ...(round.failure_reason ? { failure_reason: round.failure_reason } : {}),
  };
}

// A failed round whose bundle never reached the evaluator can hand it to the next round.
function retainedBundle(round: Round | undefined) {
  if (
    round?.status === "failed" &&
    round.bundle &&
    (round.failure_reason === "publication_failed" || round.failure_reason === "notification_failed")
  ) {
    return { bundle: round.bundle, from: round.round_number };
  }
  return undefined;
}

export class RoundOrchestrator {
  private readonly store: ArtifactStore;
  private readonly registry: ProjectRegistry;
  private readonly locks: ProjectLocks;
  private readonly generation: GenerationGateway;
  private readonly publication: PublicationGateway;
  private readonly notification: NotificationGateway;
  private readonly logger: Logger;
  private readonly newProjectId: () => string;

  constructor(deps: {
    store: ArtifactStore;
    registry: ProjectRegistry;
    locks: ProjectLocks;
    generation: GenerationGateway;
    publication: PublicationGateway;
    notification: NotificationGateway;
    logger: Logger;
    newProjectId?: () => string;
  }) {
    this.store = deps.store;
    this.registry = deps.registry;
    this.locks = deps.locks;
    this.generation = deps.generation;
    this.publication = deps.publication;
    this.notification = deps.notification;
    this.logger = deps.logger;
    this.newProjectId = deps.newProjectId ?? generateProjectId;
  }

  async submitRound(projectId: string | undefined, input: RoundInputDraft): Promise<RoundResult> {
    const handle = await this.beginRound(projectId, input);
    return this.runRound(handle);
  }

  /**
   * Takes the project lock and persists the new round as pending.
   * The lock stays held until runRound reaches a terminal status.
   */
  async beginRound(
    projectId: string | undefined,
    draft: RoundInputDraft,
    opts: BeginRoundOptions = {}
  ): Promise<RoundHandle> {
    const input = RoundInputSchema.parse(draft);
    const id = ProjectIdSchema.parse(projectId ?? this.newProjectId());
    const lock = this.locks.acquire(id);

    try {
      const project = await this.registry.getOrCreate(id);
      const history = await this.store.list(id);
      const latest = history.at(-1);

      if (latest && !isTerminalStatus(latest.status)) {
        throw new ConflictError(
          id,
          `Round ${latest.round_number} of project ${id} is still ${latest.status}; recover it before submitting another.`
        );
      }

      const roundNumber = (latest?.round_number ?? 0) + 1;
      const reusedBundle = opts.reuseRetainedBundle ? retainedBundle(latest) : undefined;
      const priorBundle = [...history].reverse().find((round) => round.bundle !== null)?.bundle ?? undefined;
      const target =
        [...history].reverse().find((round) => round.published_target !== null)?.published_target ??
        project.current_target;

      // Registry first: appendRound is idempotent, so a crash between the two writes heals on the next submit.
      const registered = await this.registry.appendRound(id, roundNumber);
      const now = new Date().toISOString();
      const round = await this.store.save({
        project_id: id,
        round_number: roundNumber,
        input,
        status: "pending",
        bundle: null,
        published_target: null,
        failure_reason: null,
        status_timestamps: { pending: now },
        created_at: now,
        last_updated_at: now,
      });

      this.logger.info(
        { project_id: id, round_number: roundNumber, revision: roundNumber > 1, reused_bundle_from: reusedBundle?.from },
        "round accepted"
      );
      return { lock, round, project: registered, priorBundle, reusedBundle, target };
    } catch (err) {
      this.locks.release(lock);
      throw err;
    }
  }

  /**
   * Starts a new round from the latest round's input. When that round failed after
   * generating, and the instruction is unchanged, its bundle is reused instead of regenerated.
   */
  async retryRound(projectId: string, opts: RetryRoundOptions = {}): Promise<RoundHandle> {
    await this.registry.get(projectId);
    const latest = (await this.store.list(projectId)).at(-1);
    if (!latest) {
      throw new RoundNotFoundError(projectId, 1);
    }

    const instruction = opts.instruction?.trim();
    return this.beginRound(
      projectId,
      { ...latest.input, ...(instruction ? { instruction } : {}) },
      { reuseRetainedBundle: !instruction || instruction === latest.input.instruction }
    );
  }

  /** Drives a begun round to a terminal status and releases the project lock. */
  async runRound(handle: RoundHandle): Promise<RoundResult> {
    let round = handle.round;
    const logger = this.logger.child({ project_id: round.project_id, round_number: round.round_number });

    try {
      round = await this.transition(round, "generating");

      let bundle: BundleRef;
      if (handle.reusedBundle) {
        bundle = handle.reusedBundle.bundle;
        round = await this.transition(round, "generated", {
          bundle,
          reused_bundle_from: handle.reusedBundle.from,
        });
      } else {
        try {
          const generated = await this.generation.generate({
            projectId: round.project_id,
            roundNumber: round.round_number,
            instruction: round.input.instruction,
            checks: round.input.checks,
            attachments: round.input.attachments,
            priorBundle: handle.priorBundle,
          });
          bundle = generated.bundle;
        } catch (err) {
          round = await this.failStage(round, "generation", err, logger);
          return toRoundResult(round);
        }
        round = await this.transition(round, "generated", { bundle });
      }

      round = await this.transition(round, "publishing");
      let published: PublishResult;
      try {
        published = await this.publication.publish({
          projectId: round.project_id,
          roundNumber: round.round_number,
          instruction: round.input.instruction,
          bundle,
          target: handle.target,
        });
      } catch (err) {
        round = await this.failStage(round, "publication", err, logger);
        return toRoundResult(round);
      }
      round = await this.transition(round, "published", {
        published_target: published.target,
        publication: {
          repository_url: published.repository_url,
          commit_sha: published.commit_sha,
          reused: published.reused,
        },
      });

      // From here on the bundle is live; a notification failure is reported, never rolled back.
      round = await this.transition(round, "notifying");
      let notified: NotifyResult;
      try {
        notified = await this.notification.notify({
          url: round.input.evaluation?.url,
          notice: {
            project_id: round.project_id,
            round_number: round.round_number,
            target: published.target,
            repository_url: published.repository_url,
            commit_sha: published.commit_sha,
            email: round.input.evaluation?.email,
            nonce: round.input.evaluation?.nonce,
          },
        });
      } catch (err) {
        round = await this.failStage(round, "notification", err, logger);
        return toRoundResult(round);
      }

      // Target before status: a completed round always has its target on the project.
      await this.registry.updatePublishedTarget(round.project_id, published.target);
      round = await this.transition(round, "completed", {
        notification: {
          kind: "deployment",
          delivered: true,
          attempts: notified.attempts,
          acknowledged_at: notified.ack.acknowledged_at,
        },
      });

      logger.info({ target: published.target }, "round completed");
      return toRoundResult(round);
    } catch (err) {
      await this.abandon(round, err, logger);
      throw err;
    } finally {
      this.locks.release(handle.lock);
    }
  }

  private async transition(round: Round, status: RoundStatus, patch: Partial<Round> = {}): Promise<Round> {
    assertCanMoveRound(round.status, status);
    const now = new Date().toISOString();
    return this.store.save({
      ...round,
      ...patch,
      status,
      status_timestamps: {
        ...round.status_timestamps,
        [status]: round.status_timestamps[status] ?? now,
      },
    });
  }

  // Only gateway exhaustion is a stage failure; anything else is unexpected and propagates.
  private async failStage(round: Round, stage: PipelineStage, err: unknown, logger: Logger): Promise<Round> {
    if (!(err instanceof GatewayFailure)) {
      throw err;
    }

    const failure = new STAGE_FAILURES[stage](err);
    logger.warn({ err: failure, stage, classification: failure.classification }, "round failed");

    // Reported before the failed save; a terminal round takes no further writes.
    const notification = stage === "notification" ? undefined : await this.reportFailure(round, failure, logger);

    return this.transition(round, "failed", {
      failure_reason: failure.reason,
      failure: {
        stage,
        classification: failure.classification,
        message: failure.message,
        attempts: failure.attempts,
      },
      ...(notification ? { notification } : {}),
    });
  }

  // Best effort: an undelivered failure notice is recorded, never escalated.
  private async reportFailure(round: Round, failure: StageFailure, logger: Logger): Promise<NotificationMetadata> {
    try {
      const sent = await this.notification.notifyFailure({
        url: round.input.evaluation?.url,
        notice: {
          project_id: round.project_id,
          round_number: round.round_number,
          stage: failure.stage,
          error: failure.message,
          email: round.input.evaluation?.email,
          nonce: round.input.evaluation?.nonce,
        },
      });
      return { kind: "failure", delivered: true, attempts: sent.attempts, acknowledged_at: sent.ack.acknowledged_at };
    } catch (err) {
      if (!(err instanceof GatewayFailure)) {
        throw err;
      }
      logger.warn({ err, stage: failure.stage }, "evaluator not told of failure");
      return { kind: "failure", delivered: false, attempts: err.attempts, error: err.message };
    }
  }

  // Best effort: leave an inspectable failed record behind an unexpected error, then let the error propagate.
  private async abandon(round: Round, err: unknown, logger: Logger) {
    if (isTerminalStatus(round.status)) {
      return;
    }

    const stage = stageOf(round.status);
    logger.error({ err, stage }, "round aborted by unexpected error");

    try {
      await this.transition(round, "failed", {
        failure_reason: failureReasonFor(stage),
        failure: { stage, classification: "unknown", message: describeError(err), attempts: 0 },
      });
    } catch (saveErr) {
      logger.error({ err: saveErr }, "could not record aborted round as failed");
    }
  }
}
