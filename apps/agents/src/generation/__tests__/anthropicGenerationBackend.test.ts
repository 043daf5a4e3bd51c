import pino from "pino";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { GenerateBundleInput } from "@pagesmith/shared";
import { AnthropicGenerationBackend } from "../anthropicGenerationBackend";
import { README_SYSTEM_PROMPT } from "../prompts";

function anthropicReply(text: string) {
  return new Response(JSON.stringify({ content: [{ type: "text", text }], stop_reason: "end_turn" }), { status: 200 });
}

function request(overrides: Partial<GenerateBundleInput> = {}): GenerateBundleInput {
  return {
    projectId: "todo-app",
    roundNumber: 1,
    instruction: "build a todo list app",
    checks: [],
    attachments: [],
    signal: new AbortController().signal,
    ...overrides,
  };
}

describe("AnthropicGenerationBackend", () => {
  const logger = pino({ level: "silent" });
  const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => anthropicReply("unused"));

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubEnv("ANTHROPIC_API_KEY", "test-key");
    vi.stubGlobal("fetch", fetchMock);
  });

  it("generates the files and then a README", async () => {
    fetchMock
      .mockResolvedValueOnce(anthropicReply('{"index.html": "<h1>Todo</h1>"}'))
      .mockResolvedValueOnce(anthropicReply("```markdown\n# todo-app\n```"));

    const bundle = await new AnthropicGenerationBackend({ logger }).generate(request());

    expect(bundle).toEqual({ files: { "index.html": "<h1>Todo</h1>", "README.md": "# todo-app" } });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(JSON.parse(String(fetchMock.mock.calls[1][1]?.body)).system).toBe(README_SYSTEM_PROMPT);
  });

  it("skips the README call when the model wrote one", async () => {
    fetchMock.mockResolvedValueOnce(anthropicReply('{"index.html": "<h1>Todo</h1>", "README.md": "# Todo"}'));

    const bundle = await new AnthropicGenerationBackend({ logger }).generate(request());

    expect(bundle.files["README.md"]).toBe("# Todo");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("publishes without a README when that call fails", async () => {
    const warn = vi.spyOn(logger, "warn");
    fetchMock
      .mockResolvedValueOnce(anthropicReply('{"index.html": "<h1>Todo</h1>"}'))
      .mockResolvedValueOnce(new Response("busy", { status: 503 }));

    const bundle = await new AnthropicGenerationBackend({ logger }).generate(request());

    expect(bundle).toEqual({ files: { "index.html": "<h1>Todo</h1>" } });
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ project_id: "todo-app", round_number: 1 }),
      "README generation failed; publishing without one"
    );
  });

  it("fails the whole generation when the README call is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    fetchMock
      .mockResolvedValueOnce(anthropicReply('{"index.html": "<h1>Todo</h1>"}'))
      .mockRejectedValueOnce(new Error("aborted"));

    await expect(
      new AnthropicGenerationBackend({ logger }).generate(request({ signal: controller.signal }))
    ).rejects.toThrow("aborted");
  });

  it("sends the prior bundle for revisions", async () => {
    fetchMock.mockResolvedValueOnce(anthropicReply('{"index.html": "<h1>Dark</h1>", "README.md": "# Todo"}'));

    await new AnthropicGenerationBackend({ logger }).generate(
      request({ roundNumber: 2, instruction: "add dark mode", priorBundle: { files: { "index.html": "<h1>Todo</h1>" } } })
    );

    const body = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
    expect(body.messages[0].content).toContain("--- Current file: index.html ---\n<h1>Todo</h1>");
  });
});
