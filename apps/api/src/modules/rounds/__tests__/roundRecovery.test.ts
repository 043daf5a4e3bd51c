import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Round, RoundStatus } from "@pagesmith/shared";
import { ConflictError } from "../errors";
import { INTERRUPTED_MESSAGE } from "../roundRecovery";
import { createHarness, makeTempDir, pendingRound, removeTempDir } from "./helpers";

describe("RoundRecovery", () => {
  let dataDir: string;
  let h: ReturnType<typeof createHarness>;

  beforeEach(async () => {
    dataDir = await makeTempDir();
    h = createHarness(dataDir);
  });

  afterEach(async () => {
    await removeTempDir(dataDir);
  });

  // Persists round 1 of a project as if a process died while it was in `until`.
  async function interruptedRound(projectId: string, until: RoundStatus): Promise<Round> {
    await h.registry.getOrCreate(projectId);
    await h.registry.appendRound(projectId, 1);
    let round = await h.store.save(pendingRound(projectId, 1));
    const path: RoundStatus[] = ["generating", "generated", "publishing", "published", "notifying"];

    for (const status of path.slice(0, path.indexOf(until) + 1)) {
      const patch: Partial<Round> = {};
      if (status === "generated") {
        patch.bundle = await h.store.writeBundle(projectId, 1, { files: { "index.html": "<h1>v1</h1>" } });
      }
      if (status === "published") {
        patch.published_target = `https://test-owner.github.io/${projectId}/`;
      }
      round = await h.store.save({ ...round, ...patch, status });
    }
    return round;
  }

  it("fails a round left mid-generation and frees the project", async () => {
    await interruptedRound("todo-app", "generating");

    const actions = await h.recovery.recoverInterruptedRounds();
    const round = await h.store.load("todo-app", 1);

    expect(actions).toEqual([
      {
        project_id: "todo-app",
        round_number: 1,
        action: "failed_interrupted_round",
        detail: "generating -> failed (generation_failed)",
      },
    ]);
    expect(round.status).toBe("failed");
    expect(round.failure).toEqual({
      stage: "generation",
      classification: "unknown",
      message: INTERRUPTED_MESSAGE,
      attempts: 0,
    });

    const next = await h.orchestrator.submitRound("todo-app", { instruction: "try again" });
    expect(next).toMatchObject({ round_number: 2, status: "completed" });
  });

  it("attributes a round interrupted while notifying to notification", async () => {
    await interruptedRound("todo-app", "notifying");

    await h.recovery.recoverInterruptedRounds();
    const round = await h.store.load("todo-app", 1);

    expect(round.failure_reason).toBe("notification_failed");
    expect(round.published_target).toBe("https://test-owner.github.io/todo-app/");
    expect((await h.registry.get("todo-app")).current_target).toBeNull();
  });

  it("leaves rounds of locked projects alone", async () => {
    await interruptedRound("todo-app", "publishing");
    h.locks.acquire("todo-app");

    expect(await h.recovery.recoverInterruptedRounds()).toEqual([]);
    expect((await h.store.load("todo-app", 1)).status).toBe("publishing");
  });

  it("holds the project lock while it repairs the project", async () => {
    await interruptedRound("todo-app", "publishing");
    const save = h.store.save.bind(h.store);
    const seen: unknown[] = [];
    vi.spyOn(h.store, "save").mockImplementation(async (round) => {
      seen.push(
        await h.orchestrator.beginRound("todo-app", { instruction: "racing round" }).catch((err: unknown) => err)
      );
      return save(round);
    });

    await h.recovery.recoverInterruptedRounds();

    expect(seen).toHaveLength(1);
    expect(seen[0]).toBeInstanceOf(ConflictError);
    expect(seen[0]).toMatchObject({ message: "A round is already in flight for project todo-app." });
    expect(h.locks.isHeld("todo-app")).toBe(false);
    expect((await h.store.list("todo-app")).map((round) => round.status)).toEqual(["failed"]);
  });

  it("realigns the current target with the latest completed round", async () => {
    await h.orchestrator.submitRound("todo-app", { instruction: "build a todo list app" });
    await h.registry.updatePublishedTarget("todo-app", "https://stale.example/");

    const actions = await h.recovery.recoverInterruptedRounds();

    expect(actions).toEqual([
      {
        project_id: "todo-app",
        round_number: 1,
        action: "reconciled_target",
        detail: "https://stale.example/ -> https://test-owner.github.io/todo-app/",
      },
    ]);
    expect((await h.registry.get("todo-app")).current_target).toBe("https://test-owner.github.io/todo-app/");
  });

  it("does nothing when every round is settled", async () => {
    await h.orchestrator.submitRound("todo-app", { instruction: "build a todo list app" });
    expect(await h.recovery.recoverInterruptedRounds()).toEqual([]);
  });
});
