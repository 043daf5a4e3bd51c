import { z } from "zod";
import { RoundResultSchema, RoundSchema } from "@pagesmith/shared";
import type { RoundInputDraft } from "@pagesmith/shared";

const AcceptedSchema = z.object({ round: RoundSchema });
const ResultSchema = z.object({ result: RoundResultSchema });

export const SubmitResponseSchema = z.union([AcceptedSchema, ResultSchema]);
export type SubmitResponse = z.infer<typeof SubmitResponseSchema>;

export class PagesmithApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "PagesmithApiError";
    this.status = status;
  }
}

/** HTTP client for the round API, used by the CLI. */
export class PagesmithApiClient {
  private readonly baseUrl: string;
  private readonly token: string;

  constructor(opts: { baseUrl: string; token: string }) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.token = opts.token;
  }

  async submitRound(input: RoundInputDraft & { project_id?: string }, wait: boolean): Promise<SubmitResponse> {
    const path = input.project_id
      ? `/projects/${encodeURIComponent(input.project_id)}/rounds`
      : "/rounds";
    const { project_id: _projectId, ...body } = input;
    return SubmitResponseSchema.parse(await this.request("POST", `${path}${wait ? "?wait=true" : ""}`, body));
  }

  async retryRound(projectId: string, instruction: string | undefined, wait: boolean): Promise<SubmitResponse> {
    const path = `/projects/${encodeURIComponent(projectId)}/rounds/retry${wait ? "?wait=true" : ""}`;
    return SubmitResponseSchema.parse(await this.request("POST", path, instruction ? { instruction } : {}));
  }

  // 502 carries a terminal failed result; it is a valid answer, not a transport error.
  private async request(method: string, path: string, body: unknown): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.token}`,
      },
      body: JSON.stringify(body),
    });

    const text = await response.text();
    const json: unknown = text ? JSON.parse(text) : undefined;

    if (!response.ok && response.status !== 502) {
      throw new PagesmithApiError(
        response.status,
        `Round API ${method} ${path} failed with ${response.status}: ${text || response.statusText}`
      );
    }

    return json;
  }
}
