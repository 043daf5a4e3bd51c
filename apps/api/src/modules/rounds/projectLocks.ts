import { randomUUID } from "node:crypto";
import { ConflictError, InvariantViolation } from "./errors";

export type ProjectLockRecord = {
  project_id: string;
  token: string;
  acquired_at: string;
};

/**
 * Exclusive per-project lock records. Acquiring never waits: a held lock is a ConflictError.
 * Projects never share a lock, so independent projects run concurrently.
 */
export class ProjectLocks {
  private readonly held = new Map<string, ProjectLockRecord>();

  acquire(projectId: string): ProjectLockRecord {
    if (this.held.has(projectId)) {
      throw new ConflictError(projectId);
    }

    const lock: ProjectLockRecord = {
      project_id: projectId,
      token: randomUUID(),
      acquired_at: new Date().toISOString(),
    };
    this.held.set(projectId, lock);
    return lock;
  }

  release(lock: ProjectLockRecord): void {
    const current = this.held.get(lock.project_id);
    if (!current || current.token !== lock.token) {
      throw new InvariantViolation(`Lock for project ${lock.project_id} is not held by this caller.`);
    }
    this.held.delete(lock.project_id);
  }

  isHeld(projectId: string): boolean {
    return this.held.has(projectId);
  }

  snapshot(): ProjectLockRecord[] {
    return [...this.held.values()];
  }
}
