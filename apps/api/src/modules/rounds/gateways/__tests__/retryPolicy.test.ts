import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { UpstreamHttpError, UpstreamRejectedError } from "@pagesmith/shared";
import { GatewayFailure } from "../../errors";
import { GatewayTimeoutError, classifyFailure, classifyStatus, describeError } from "../classifyFailure";
import { callWithRetry, computeBackoffDelay } from "../retryPolicy";
import { silentLogger, testPolicy } from "../../__tests__/helpers";

describe("classifyFailure", () => {
  it("maps HTTP statuses", () => {
    expect(classifyStatus(429)).toBe("transient");
    expect(classifyStatus(503)).toBe("transient");
    expect(classifyStatus(408)).toBe("transient");
    expect(classifyStatus(404)).toBe("rejected");
    expect(classifyStatus(422)).toBe("rejected");
  });

  it("classifies upstream and runtime errors", () => {
    expect(classifyFailure(new UpstreamHttpError(502, "bad gateway"))).toBe("transient");
    expect(classifyFailure(new UpstreamHttpError(401, "bad credentials"))).toBe("rejected");
    expect(classifyFailure(new UpstreamRejectedError("no index.html"))).toBe("rejected");
    expect(classifyFailure(new GatewayTimeoutError("generation", 10))).toBe("timeout");
    expect(classifyFailure(new SyntaxError("Unexpected token"))).toBe("rejected");
    expect(classifyFailure(Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }))).toBe("transient");
    expect(classifyFailure(new TypeError("fetch failed"))).toBe("transient");
    expect(classifyFailure(new Error("boom"))).toBe("unknown");
    expect(classifyFailure("not even an error")).toBe("unknown");
  });

  it("treats a failed schema parse as rejected and describes its issues", () => {
    const result = z.object({ files: z.record(z.string(), z.string()) }).safeParse({ files: 3 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(classifyFailure(result.error)).toBe("rejected");
      expect(describeError(result.error)).toMatch(/^files: /);
    }
  });
});

describe("computeBackoffDelay", () => {
  const policy = testPolicy({ initialDelayMs: 1_000, maxDelayMs: 60_000 });

  it("doubles per attempt up to the cap", () => {
    const exact = () => 0.5;
    expect(computeBackoffDelay(1, policy, exact)).toBe(1_000);
    expect(computeBackoffDelay(2, policy, exact)).toBe(2_000);
    expect(computeBackoffDelay(3, policy, exact)).toBe(4_000);
    expect(computeBackoffDelay(10, policy, exact)).toBe(60_000);
  });

  it("jitters by at most ten percent", () => {
    expect(computeBackoffDelay(1, policy, () => 0)).toBe(900);
    expect(computeBackoffDelay(1, policy, () => 1)).toBe(1_100);
  });
});

describe("callWithRetry", () => {
  it("retries transient failures with backoff until one succeeds", async () => {
    const sleep = vi.fn(async () => {});
    const seen: number[] = [];

    const outcome = await callWithRetry(
      async (_signal, attempt) => {
        seen.push(attempt);
        if (attempt < 3) throw new UpstreamHttpError(503, "busy");
        return "done";
      },
      { label: "generation", policy: testPolicy(), logger: silentLogger, hooks: { sleep, random: () => 0.5 } }
    );

    expect(outcome).toEqual({ value: "done", attempts: 3 });
    expect(seen).toEqual([1, 2, 3]);
    expect(sleep.mock.calls).toEqual([[1_000], [2_000]]);
  });

  it("fails a rejected call on the first attempt", async () => {
    const operation = vi.fn(async () => {
      throw new UpstreamRejectedError("bad brief");
    });

    const failure = await callWithRetry(operation, {
      label: "generation",
      policy: testPolicy(),
      logger: silentLogger,
      hooks: { sleep: async () => {} },
    }).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(GatewayFailure);
    expect(failure).toMatchObject({
      classification: "rejected",
      attempts: 1,
      message: "generation failed (rejected) after 1 attempt(s): bad brief",
    });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("gives up after the configured attempts", async () => {
    const sleep = vi.fn(async () => {});
    const operation = vi.fn(async () => {
      throw new UpstreamHttpError(500, "down");
    });

    await expect(
      callWithRetry(operation, {
        label: "publication",
        policy: testPolicy({ maxAttempts: 3 }),
        logger: silentLogger,
        hooks: { sleep },
      })
    ).rejects.toMatchObject({ classification: "transient", attempts: 3 });
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("does not retry unknown failures", async () => {
    const operation = vi.fn(async () => {
      throw new Error("boom");
    });

    await expect(
      callWithRetry(operation, { label: "notification", policy: testPolicy(), logger: silentLogger })
    ).rejects.toMatchObject({ classification: "unknown", attempts: 1 });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("times out a hung attempt and aborts its signal", async () => {
    const signals: AbortSignal[] = [];

    const hung = (signal: AbortSignal) =>
      new Promise<string>((_resolve, reject) => {
        signals.push(signal);
        signal.addEventListener("abort", () => reject(signal.reason));
      });

    await expect(
      callWithRetry(hung, {
        label: "generation",
        policy: testPolicy({ timeoutMs: 20, maxAttempts: 2 }),
        logger: silentLogger,
        hooks: { sleep: async () => {} },
      })
    ).rejects.toMatchObject({
      classification: "timeout",
      attempts: 2,
      message: "generation failed (timeout) after 2 attempt(s): generation timed out after 20ms",
    });
    expect(signals).toHaveLength(2);
    expect(signals.every((signal) => signal.aborted)).toBe(true);
  });
});
