import { describe, expect, it } from "vitest";
import { InvariantViolation } from "../errors";
import { assertCanMoveRound, canMoveRound, isTerminalStatus, stageOf } from "../roundTransitions";

describe("round transitions", () => {
  it("walks the pipeline one status at a time", () => {
    expect(canMoveRound("pending", "generating")).toBe(true);
    expect(canMoveRound("generating", "generated")).toBe(true);
    expect(canMoveRound("generated", "publishing")).toBe(true);
    expect(canMoveRound("publishing", "published")).toBe(true);
    expect(canMoveRound("published", "notifying")).toBe(true);
    expect(canMoveRound("notifying", "completed")).toBe(true);
  });

  it("refuses skipped stages and moves out of terminal statuses", () => {
    expect(canMoveRound("generating", "published")).toBe(false);
    expect(canMoveRound("pending", "completed")).toBe(false);
    expect(canMoveRound("completed", "failed")).toBe(false);
    expect(canMoveRound("failed", "pending")).toBe(false);
  });

  it("lets any non-terminal status fail", () => {
    for (const status of ["pending", "generating", "generated", "publishing", "published", "notifying"] as const) {
      expect(canMoveRound(status, "failed")).toBe(true);
    }
  });

  it("reports the offending transition", () => {
    expect(() => assertCanMoveRound("generating", "published")).toThrow(
      new InvariantViolation("Invalid round status transition: generating -> published")
    );
  });

  it("knows the terminal statuses", () => {
    expect(isTerminalStatus("completed")).toBe(true);
    expect(isTerminalStatus("failed")).toBe(true);
    expect(isTerminalStatus("notifying")).toBe(false);
  });

  it("attributes each non-terminal status to a stage", () => {
    expect(stageOf("pending")).toBe("generation");
    expect(stageOf("generating")).toBe("generation");
    expect(stageOf("generated")).toBe("publication");
    expect(stageOf("publishing")).toBe("publication");
    expect(stageOf("published")).toBe("notification");
    expect(stageOf("notifying")).toBe("notification");
    expect(() => stageOf("completed")).toThrow(InvariantViolation);
  });
});
