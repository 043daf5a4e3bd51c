import { beforeEach, describe, expect, it, vi } from "vitest";
import { UpstreamHttpError, UpstreamRejectedError } from "@pagesmith/shared";
import { callAnthropic, extractBalancedJsonObject, readNumberEnv, stripCodeFences } from "../llmClient";

describe("stripCodeFences", () => {
  it("unwraps a fenced block", () => {
    expect(stripCodeFences('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it("leaves unfenced text alone apart from trimming", () => {
    expect(stripCodeFences("  # Title\n")).toBe("# Title");
  });
});

describe("extractBalancedJsonObject", () => {
  it("ignores braces inside strings and trailing prose", () => {
    const text = 'Here you go: {"app.js": "if (x) { y(); }", "n": {"deep": true}} Hope it helps!';
    expect(extractBalancedJsonObject(text)).toBe('{"app.js": "if (x) { y(); }", "n": {"deep": true}}');
  });

  it("handles escaped quotes", () => {
    expect(extractBalancedJsonObject('{"a": "say \\"}\\" twice"}')).toBe('{"a": "say \\"}\\" twice"}');
  });

  it("throws when there is no complete object", () => {
    expect(() => extractBalancedJsonObject("no json here")).toThrow("No JSON object found in model output.");
    expect(() => extractBalancedJsonObject('{"a": {')).toThrow(SyntaxError);
  });
});

describe("readNumberEnv", () => {
  it("falls back on unset or blank values and rejects garbage", () => {
    vi.stubEnv("PAGESMITH_TEST_NUMBER", "");
    expect(readNumberEnv("PAGESMITH_TEST_NUMBER", 7)).toBe(7);

    vi.stubEnv("PAGESMITH_TEST_NUMBER", "0.4");
    expect(readNumberEnv("PAGESMITH_TEST_NUMBER", 7)).toBe(0.4);

    vi.stubEnv("PAGESMITH_TEST_NUMBER", "lots");
    expect(() => readNumberEnv("PAGESMITH_TEST_NUMBER", 7)).toThrow('PAGESMITH_TEST_NUMBER must be a number, got "lots".');
  });
});

describe("callAnthropic", () => {
  beforeEach(() => {
    vi.stubEnv("ANTHROPIC_API_KEY", "test-key");
    vi.stubEnv("ANTHROPIC_BASE_URL", "https://llm.test/v1");
    vi.stubEnv("ANTHROPIC_MODEL", "test-model");
    vi.stubEnv("ANTHROPIC_TEMPERATURE", "");
  });

  it("posts a messages request and joins the text blocks", async () => {
    const fetchMock = vi.fn(
      async (_url: string | URL | Request, _init?: RequestInit) =>
        new Response(
          JSON.stringify({
            content: [
              { type: "text", text: "first" },
              { type: "tool_use" },
              { type: "text", text: "second" },
            ],
            stop_reason: "end_turn",
          }),
          { status: 200 }
        )
    );
    vi.stubGlobal("fetch", fetchMock);

    const completion = await callAnthropic({ system: "be brief", prompt: "hello", maxTokens: 100 });

    expect(completion).toEqual({ text: "first\nsecond", stopReason: "end_turn" });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://llm.test/v1/messages");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test-model",
      max_tokens: 100,
      temperature: 0,
      system: "be brief",
      messages: [{ role: "user", content: "hello" }],
    });
  });

  it("raises the HTTP status of a failed request", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("overloaded", { status: 529 }))
    );

    const failure = await callAnthropic({ system: "s", prompt: "p", maxTokens: 10 }).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(UpstreamHttpError);
    expect(failure).toMatchObject({ status: 529, message: "Anthropic request failed with 529: overloaded" });
  });

  it("rejects a reply without text", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(JSON.stringify({ content: [] }), { status: 200 }))
    );

    await expect(callAnthropic({ system: "s", prompt: "p", maxTokens: 10 })).rejects.toThrow(
      "Anthropic response did not include text content."
    );
  });

  it("needs an API key", async () => {
    vi.stubEnv("ANTHROPIC_API_KEY", "");
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    await expect(callAnthropic({ system: "s", prompt: "p", maxTokens: 10 })).rejects.toBeInstanceOf(
      UpstreamRejectedError
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
