import { z } from "zod";
import { UpstreamHttpError, UpstreamRejectedError } from "@pagesmith/shared";
import type { FailureClassification } from "@pagesmith/shared";
import { GatewayFailure } from "../errors";

export class GatewayTimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "GatewayTimeoutError";
  }
}

const TRANSIENT_STATUS = new Set([408, 425, 429]);

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

export function classifyStatus(status: number): FailureClassification {
  if (TRANSIENT_STATUS.has(status) || status >= 500) return "transient";
  if (status >= 400) return "rejected";
  return "unknown";
}

function errorCode(value: unknown): string | undefined {
  if (value instanceof Error && "code" in value && typeof value.code === "string") {
    return value.code;
  }
  return undefined;
}

export function classifyFailure(error: unknown): FailureClassification {
  if (error instanceof GatewayFailure) return error.classification;
  if (error instanceof GatewayTimeoutError) return "timeout";
  if (error instanceof UpstreamRejectedError) return "rejected";
  if (error instanceof UpstreamHttpError) return classifyStatus(error.status);
  if (error instanceof z.ZodError || error instanceof SyntaxError) return "rejected";

  if (error instanceof Error) {
    if (error.name === "AbortError" || error.name === "TimeoutError") return "timeout";

    const code = errorCode(error) ?? errorCode(error.cause);
    if (code && TRANSIENT_CODES.has(code)) return "transient";

    // undici reports connection-level failures this way.
    if (error instanceof TypeError && error.message === "fetch failed") return "transient";
  }

  return "unknown";
}

export function isRetryable(classification: FailureClassification): boolean {
  return classification === "transient" || classification === "timeout";
}

export function describeError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
      .join("; ");
  }
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
