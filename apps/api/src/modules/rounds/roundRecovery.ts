import type { Logger } from "pino";
import type { Project, RoundStatus } from "@pagesmith/shared";
import type { ArtifactStore } from "./artifactStore";
import { ConflictError, failureReasonFor } from "./errors";
import type { ProjectLockRecord, ProjectLocks } from "./projectLocks";
import type { ProjectRegistry } from "./projectRegistry";
import { isTerminalStatus, stageOf } from "./roundTransitions";

export const INTERRUPTED_MESSAGE = "interrupted before reaching a terminal status";

export type RecoveryAction = {
  project_id: string;
  round_number?: number;
  action: "failed_interrupted_round" | "reconciled_target";
  detail: string;
};

/**
 * Closes rounds a crash left mid-pipeline and re-derives each project's current
 * target from its latest completed round. Each project is recovered under its lock;
 * a project whose lock is taken has a live round and is skipped.
 */
export class RoundRecovery {
  private readonly store: ArtifactStore;
  private readonly registry: ProjectRegistry;
  private readonly locks: ProjectLocks;
  private readonly logger: Logger;

  constructor(deps: { store: ArtifactStore; registry: ProjectRegistry; locks: ProjectLocks; logger: Logger }) {
    this.store = deps.store;
    this.registry = deps.registry;
    this.locks = deps.locks;
    this.logger = deps.logger;
  }

  async recoverInterruptedRounds(): Promise<RecoveryAction[]> {
    const actions: RecoveryAction[] = [];

    for (const project of await this.registry.list()) {
      let lock: ProjectLockRecord;
      try {
        lock = this.locks.acquire(project.project_id);
      } catch (err) {
        if (err instanceof ConflictError) {
          continue;
        }
        throw err;
      }

      try {
        actions.push(...(await this.recoverProject(project)));
      } finally {
        this.locks.release(lock);
      }
    }

    if (actions.length > 0) {
      this.logger.warn({ actions }, "recovered interrupted rounds");
    }
    return actions;
  }

  private async recoverProject(project: Project): Promise<RecoveryAction[]> {
    const actions: RecoveryAction[] = [];
    const rounds = await this.store.list(project.project_id);

    for (const round of rounds) {
      if (isTerminalStatus(round.status)) {
        continue;
      }

      const from: RoundStatus = round.status;
      const stage = stageOf(from);
      const now = new Date().toISOString();
      await this.store.save({
        ...round,
        status: "failed",
        failure_reason: failureReasonFor(stage),
        failure: { stage, classification: "unknown", message: INTERRUPTED_MESSAGE, attempts: 0 },
        status_timestamps: { ...round.status_timestamps, failed: now },
      });

      actions.push({
        project_id: round.project_id,
        round_number: round.round_number,
        action: "failed_interrupted_round",
        detail: `${from} -> failed (${failureReasonFor(stage)})`,
      });
    }

    const latestCompleted = [...rounds].reverse().find((round) => round.status === "completed");
    const expectedTarget = latestCompleted?.published_target ?? null;
    if (expectedTarget !== null && project.current_target !== expectedTarget) {
      await this.registry.updatePublishedTarget(project.project_id, expectedTarget);
      actions.push({
        project_id: project.project_id,
        round_number: latestCompleted?.round_number,
        action: "reconciled_target",
        detail: `${project.current_target ?? "none"} -> ${expectedTarget}`,
      });
    }
    return actions;
  }
}
