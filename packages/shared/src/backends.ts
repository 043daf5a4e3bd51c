import type { CodeBundle } from "./schemas/bundle";
import type { Attachment, BundleRef, PipelineStage, ProjectId } from "./schemas/rounds";

/** Contracts for the external collaborators the round pipeline drives. */

export type GenerateBundleInput = {
  projectId: ProjectId;
  roundNumber: number;
  instruction: string;
  checks: string[];
  attachments: Attachment[];
  // Present for revisions: the files the previous round produced.
  priorBundle?: CodeBundle;
  signal: AbortSignal;
};

export interface GenerationBackend {
  generate(input: GenerateBundleInput): Promise<CodeBundle>;
}

export type PublishBundleInput = {
  projectId: ProjectId;
  roundNumber: number;
  instruction: string;
  bundle: CodeBundle;
  bundleRef: BundleRef;
  // null means "choose a new target".
  target: string | null;
  signal: AbortSignal;
};

export type PublishBundleResult = {
  target: string;
  repository_url?: string;
  commit_sha?: string;
};

export interface PublicationBackend {
  publish(input: PublishBundleInput): Promise<PublishBundleResult>;
}

export type DeploymentNotice = {
  project_id: ProjectId;
  round_number: number;
  target: string;
  repository_url?: string;
  commit_sha?: string;
  email?: string;
  nonce?: string;
};

export type NotifyInput = {
  url: string;
  notice: DeploymentNotice;
  signal: AbortSignal;
};

export type NotifyAck = {
  acknowledged_at: string;
  status_code?: number;
};

// Sent when generation or publication gives up, so the evaluator is not left waiting.
export type FailureNotice = {
  project_id: ProjectId;
  round_number: number;
  stage: PipelineStage;
  error: string;
  email?: string;
  nonce?: string;
};

export type NotifyFailureInput = {
  url: string;
  notice: FailureNotice;
  signal: AbortSignal;
};

export interface NotificationBackend {
  notify(input: NotifyInput): Promise<NotifyAck>;
  notifyFailure(input: NotifyFailureInput): Promise<NotifyAck>;
}
