import type { Logger } from "pino";
import { UpstreamRejectedError } from "@pagesmith/shared";
import type { DeploymentNotice, FailureNotice, NotificationBackend, NotifyAck } from "@pagesmith/shared";
import type { RetrySettings } from "../../../config";
import { callWithRetry } from "./retryPolicy";
import type { RetryHooks } from "./retryPolicy";

export type NotifyRequest = {
  url?: string;
  notice: DeploymentNotice;
};

export type NotifyFailureRequest = {
  url?: string;
  notice: FailureNotice;
};

export type NotifyResult = {
  ack: NotifyAck;
  attempts: number;
};

/**
 * Notification Gateway: at-least-once delivery. A retry after a lost ack may
 * deliver the same notice twice; receivers treat (project_id, round_number) as the key.
 */
export class NotificationGateway {
  private readonly backend: NotificationBackend;
  private readonly policy: RetrySettings;
  private readonly logger: Logger;
  private readonly defaultUrl?: string;
  private readonly hooks?: RetryHooks;

  constructor(deps: {
    backend: NotificationBackend;
    policy: RetrySettings;
    logger: Logger;
    defaultUrl?: string;
    hooks?: RetryHooks;
  }) {
    this.backend = deps.backend;
    this.policy = deps.policy;
    this.logger = deps.logger;
    this.defaultUrl = deps.defaultUrl;
    this.hooks = deps.hooks;
  }

  async notify(request: NotifyRequest): Promise<NotifyResult> {
    const logger = this.childLogger(request.notice);
    const url = request.url ?? this.defaultUrl;

    const { value, attempts } = await callWithRetry(
      async (signal) => this.backend.notify({ url: requireUrl(url), notice: request.notice, signal }),
      { label: "notification", policy: this.policy, logger, hooks: this.hooks }
    );

    logger.info({ url, attempts, status_code: value.status_code }, "evaluator notified");
    return { ack: value, attempts };
  }

  /** Tells the evaluator a round gave up before going live. Same retry policy as deployment notices. */
  async notifyFailure(request: NotifyFailureRequest): Promise<NotifyResult> {
    const logger = this.childLogger(request.notice);
    const url = request.url ?? this.defaultUrl;

    const { value, attempts } = await callWithRetry(
      async (signal) => this.backend.notifyFailure({ url: requireUrl(url), notice: request.notice, signal }),
      { label: "failure notification", policy: this.policy, logger, hooks: this.hooks }
    );

    logger.info({ url, attempts, stage: request.notice.stage }, "evaluator told of failure");
    return { ack: value, attempts };
  }

  private childLogger(notice: { project_id: string; round_number: number }) {
    return this.logger.child({ project_id: notice.project_id, round_number: notice.round_number });
  }
}

function requireUrl(url: string | undefined): string {
  if (!url) {
    throw new UpstreamRejectedError("No evaluation URL on the round and no default configured.");
  }
  return url;
}
