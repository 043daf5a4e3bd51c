import { z } from "zod";
import { UpstreamHttpError, UpstreamRejectedError } from "@pagesmith/shared";

const AnthropicResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
  stop_reason: z.string().nullable().optional(),
});

export type AnthropicCompletion = {
  text: string;
  stopReason: string | null;
};

export type AnthropicRequest = {
  system: string;
  prompt: string;
  maxTokens: number;
  signal?: AbortSignal;
};

export function readNumberEnv(name: string, fallback: number) {
  const raw = process.env[name];
  const value = raw === undefined || raw.trim() === "" ? fallback : Number(raw);
  if (!Number.isFinite(value)) {
    throw new UpstreamRejectedError(`${name} must be a number, got "${raw}".`);
  }
  return value;
}

function extractText(payload: unknown): AnthropicCompletion {
  const response = AnthropicResponseSchema.parse(payload);
  const text = response.content
    .filter((item) => item.type === "text" && typeof item.text === "string")
    .map((item) => item.text)
    .join("\n")
    .trim();

  if (!text) {
    throw new UpstreamRejectedError("Anthropic response did not include text content.");
  }
  return { text, stopReason: response.stop_reason ?? null };
}

export function stripCodeFences(text: string) {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```(?:[a-z]+)?\s*([\s\S]*?)\s*```$/i);
  return fenced ? fenced[1].trim() : trimmed;
}

/** Returns the first balanced `{...}` object in model output, ignoring braces inside strings. */
export function extractBalancedJsonObject(text: string) {
  const input = stripCodeFences(text);
  const start = input.indexOf("{");
  if (start === -1) {
    throw new SyntaxError("No JSON object found in model output.");
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < input.length; index += 1) {
    const char = input[index];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === "\"") {
        inString = false;
      }
      continue;
    }

    if (char === "\"") {
      inString = true;
      continue;
    }

    if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        return input.slice(start, index + 1);
      }
    }
  }

  throw new SyntaxError("Could not extract a balanced JSON object from model output.");
}

export async function callAnthropic(request: AnthropicRequest): Promise<AnthropicCompletion> {
  const apiKey = process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new UpstreamRejectedError("ANTHROPIC_API_KEY is required.");
  }

  const responseUrl = `${process.env.ANTHROPIC_BASE_URL ?? "https://api.anthropic.com/v1"}/messages`;
  const version = process.env.ANTHROPIC_VERSION ?? "2023-06-01";
  const model = process.env.ANTHROPIC_MODEL ?? "claude-sonnet-4-6";
  const temperature = readNumberEnv("ANTHROPIC_TEMPERATURE", 0);

  const response = await fetch(responseUrl, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      "x-api-key": apiKey,
      "anthropic-version": version,
    },
    body: JSON.stringify({
      model,
      max_tokens: request.maxTokens,
      temperature,
      system: request.system,
      messages: [{ role: "user", content: request.prompt }],
    }),
    signal: request.signal,
  });

  if (!response.ok) {
    const body = await response.text();
    throw new UpstreamHttpError(
      response.status,
      `Anthropic request failed with ${response.status}: ${body || response.statusText}`
    );
  }

  const payload: unknown = await response.json();
  return extractText(payload);
}
