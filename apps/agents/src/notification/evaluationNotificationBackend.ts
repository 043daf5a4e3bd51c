import { UpstreamHttpError } from "@pagesmith/shared";
import type { NotificationBackend, NotifyAck, NotifyFailureInput, NotifyInput } from "@pagesmith/shared";

// Body POSTed to the evaluation URL once a round's bundle is live. The project id travels as `task`.
export function evaluationPayload(input: NotifyInput) {
  const { notice } = input;
  return {
    ...(notice.email ? { email: notice.email } : {}),
    task: notice.project_id,
    round: notice.round_number,
    ...(notice.nonce ? { nonce: notice.nonce } : {}),
    ...(notice.repository_url ? { repo_url: notice.repository_url } : {}),
    ...(notice.commit_sha ? { commit_sha: notice.commit_sha } : {}),
    pages_url: notice.target,
  };
}

export function evaluationFailurePayload(input: NotifyFailureInput) {
  const { notice } = input;
  return {
    ...(notice.email ? { email: notice.email } : {}),
    task: notice.project_id,
    round: notice.round_number,
    ...(notice.nonce ? { nonce: notice.nonce } : {}),
    status: "failure",
    stage: notice.stage,
    error: notice.error,
  };
}

async function post(url: string, body: unknown, signal: AbortSignal): Promise<NotifyAck> {
  const response = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json", Accept: "application/json" },
    body: JSON.stringify(body),
    signal,
  });

  if (!response.ok) {
    const text = await response.text();
    throw new UpstreamHttpError(
      response.status,
      `Evaluation endpoint answered ${response.status}: ${text || response.statusText}`
    );
  }

  return { acknowledged_at: new Date().toISOString(), status_code: response.status };
}

export class EvaluationNotificationBackend implements NotificationBackend {
  notify(input: NotifyInput): Promise<NotifyAck> {
    return post(input.url, evaluationPayload(input), input.signal);
  }

  notifyFailure(input: NotifyFailureInput): Promise<NotifyAck> {
    return post(input.url, evaluationFailurePayload(input), input.signal);
  }
}
