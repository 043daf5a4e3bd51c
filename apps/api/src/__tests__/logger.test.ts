import { describe, expect, it, vi } from "vitest";
import { createLogger } from "../logger";

function capture(level = "info") {
  const lines: string[] = [];
  const logger = createLogger("pagesmith-test", { level, destination: { write: (msg: string) => lines.push(msg) } });
  return { logger, records: () => lines.map((line): Record<string, unknown> => JSON.parse(line)) };
}

describe("createLogger", () => {
  it("writes JSON with a string level and redacts credentials", () => {
    const { logger, records } = capture();

    logger.info({ project_id: "todo-app", token: "test-secret", headers: { authorization: "Bearer test-secret" } }, "round accepted");

    expect(records()).toHaveLength(1);
    expect(records()[0]).toMatchObject({
      level: "info",
      name: "pagesmith-test",
      project_id: "todo-app",
      token: "[Redacted]",
      headers: { authorization: "[Redacted]" },
      msg: "round accepted",
    });
    expect(typeof records()[0].time).toBe("string");
  });

  it("drops records below the level", () => {
    const { logger, records } = capture("warn");

    logger.info("quiet");
    logger.warn("loud");

    expect(records().map((record) => record.msg)).toEqual(["loud"]);
  });

  it("takes its default level from LOG_LEVEL, then NODE_ENV", () => {
    vi.stubEnv("LOG_LEVEL", "");
    vi.stubEnv("NODE_ENV", "test");
    expect(createLogger("a").level).toBe("silent");

    vi.stubEnv("LOG_LEVEL", "debug");
    expect(createLogger("b").level).toBe("debug");
  });
});
