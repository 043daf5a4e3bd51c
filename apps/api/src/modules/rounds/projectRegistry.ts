import { ProjectIdSchema, ProjectSchema } from "@pagesmith/shared";
import type { Project } from "@pagesmith/shared";
import { InvariantViolation, ProjectNotFoundError } from "./errors";
import { ensureDir, listDirEntries, readJsonIfExists, writeJsonAtomic } from "./jsonFileStorage";
import { projectPaths, projectsDir } from "./rounds.schemas";

/**
 * Project Registry: a project's ordered round history and its current published target.
 * Writes for one project only ever come from the orchestrator call holding that project's lock.
 */
export class ProjectRegistry {
  private readonly dataDir: string;

  constructor(opts: { dataDir: string }) {
    this.dataDir = opts.dataDir;
  }

  async getOrCreate(projectId: string): Promise<Project> {
    const existing = await this.find(projectId);
    if (existing) {
      return existing;
    }

    const now = new Date().toISOString();
    return this.persist(
      ProjectSchema.parse({
        project_id: ProjectIdSchema.parse(projectId),
        created_at: now,
        current_target: null,
        round_numbers: [],
        last_updated_at: now,
      })
    );
  }

  async get(projectId: string): Promise<Project> {
    const project = await this.find(projectId);
    if (!project) {
      throw new ProjectNotFoundError(projectId);
    }
    return project;
  }

  async find(projectId: string): Promise<Project | undefined> {
    if (!ProjectIdSchema.safeParse(projectId).success) {
      return undefined;
    }
    return readJsonIfExists(projectPaths(this.dataDir, projectId).project, ProjectSchema);
  }

  // Newest first, then project id as a tie-breaker.
  async list(): Promise<Project[]> {
    const ids = (await listDirEntries(projectsDir(this.dataDir))).filter(
      (entry) => ProjectIdSchema.safeParse(entry).success
    );
    const projects = await Promise.all(ids.map((id) => this.find(id)));

    return projects
      .filter((project): project is Project => project !== undefined)
      .sort((a, b) => {
        if (a.created_at !== b.created_at) return a.created_at < b.created_at ? 1 : -1;
        return a.project_id < b.project_id ? -1 : a.project_id > b.project_id ? 1 : 0;
      });
  }

  // Re-appending the last recorded round is a no-op.
  async appendRound(projectId: string, roundNumber: number): Promise<Project> {
    const project = await this.get(projectId);
    if (project.round_numbers.at(-1) === roundNumber) {
      return project;
    }

    const expected = project.round_numbers.length + 1;

    if (roundNumber !== expected) {
      throw new InvariantViolation(
        `Project ${projectId} expects round ${expected} next, got ${roundNumber}.`
      );
    }

    return this.persist({ ...project, round_numbers: [...project.round_numbers, roundNumber] });
  }

  // Called only when a round completes: the current target tracks the latest completed round.
  async updatePublishedTarget(projectId: string, target: string): Promise<Project> {
    const project = await this.get(projectId);
    return this.persist({ ...project, current_target: target });
  }

  private async persist(project: Project): Promise<Project> {
    const validated = ProjectSchema.parse({
      ...project,
      last_updated_at: new Date().toISOString(),
    });

    const paths = projectPaths(this.dataDir, validated.project_id);
    await ensureDir(paths.root);
    await writeJsonAtomic(paths.project, validated);
    return validated;
  }
}
