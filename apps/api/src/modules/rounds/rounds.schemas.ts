import path from "node:path";
import { z } from "zod";
import { BundleRefSchema, CodeBundleSchema, ProjectIdSchema } from "@pagesmith/shared";

/**
 * Shapes of the store's own files. Round and project records live in @pagesmith/shared
 * because the HTTP surface returns them as-is.
 *
 * Folder model under <dataDir>:
 * - projects/<projectId>/project.json
 * - projects/<projectId>/rounds/<n>.json
 * - projects/<projectId>/bundles/<n>.json
 * - projects/<projectId>/publications.json
 */

export const StoredBundleSchema = z
  .object({
    ref: BundleRefSchema,
    bundle: CodeBundleSchema,
  })
  .strict();

export type StoredBundle = z.infer<typeof StoredBundleSchema>;

export const PublicationRecordSchema = z
  .object({
    target: z.url(),
    bundle_sha256: z.string().regex(/^[a-f0-9]{64}$/),
    round_number: z.number().int().positive(),
    repository_url: z.url().optional(),
    commit_sha: z.string().min(1).optional(),
    published_at: z.iso.datetime(),
  })
  .strict();

export type PublicationRecord = z.infer<typeof PublicationRecordSchema>;

export const PublicationLedgerSchema = z
  .object({
    version: z.literal(1),
    project_id: ProjectIdSchema,
    publications: z.array(PublicationRecordSchema).default([]),
  })
  .strict();

export type PublicationLedger = z.infer<typeof PublicationLedgerSchema>;

export function projectsDir(dataDir: string) {
  return path.join(dataDir, "projects");
}

export function projectPaths(dataDir: string, projectId: string) {
  const root = path.join(projectsDir(dataDir), projectId);
  return {
    root,
    project: path.join(root, "project.json"),
    roundsDir: path.join(root, "rounds"),
    round: (roundNumber: number) => path.join(root, "rounds", `${roundNumber}.json`),
    bundlesDir: path.join(root, "bundles"),
    bundle: (roundNumber: number) => path.join(root, "bundles", `${roundNumber}.json`),
    publications: path.join(root, "publications.json"),
  };
}
