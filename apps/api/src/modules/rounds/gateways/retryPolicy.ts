import type { Logger } from "pino";
import type { RetrySettings } from "../../../config";
import { GatewayFailure } from "../errors";
import { GatewayTimeoutError, classifyFailure, describeError, isRetryable } from "./classifyFailure";

export type RetryHooks = {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

export type RetryOutcome<T> = {
  value: T;
  attempts: number;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before the next attempt: doubles from the initial delay, capped,
 * with +/-10% jitter. `random` returning 0.5 gives the exact doubled delay.
 */
export function computeBackoffDelay(attempt: number, policy: RetrySettings, random: () => number = Math.random) {
  const base = Math.min(policy.initialDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
  const jitter = base * 0.1 * (random() * 2 - 1);
  return Math.max(0, Math.round(base + jitter));
}

// Runs one attempt, aborting the operation's signal when the timeout elapses.
async function attemptWithTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  label: string,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new GatewayTimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Calls an external operation under a gateway's timeout and retry policy.
 * Only transient and timeout failures are retried; the rest fail on the spot.
 */
export async function callWithRetry<T>(
  operation: (signal: AbortSignal, attempt: number) => Promise<T>,
  opts: {
    label: string;
    policy: RetrySettings;
    logger: Logger;
    hooks?: RetryHooks;
  }
): Promise<RetryOutcome<T>> {
  const { label, policy, logger } = opts;
  const wait = opts.hooks?.sleep ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt += 1) {
    try {
      const value = await attemptWithTimeout((signal) => operation(signal, attempt), label, policy.timeoutMs);
      return { value, attempts: attempt };
    } catch (error) {
      const classification = classifyFailure(error);
      const detail = describeError(error);

      if (!isRetryable(classification) || attempt >= maxAttempts) {
        logger.error({ attempt, maxAttempts, classification, err: error }, `${label} failed`);
        throw new GatewayFailure(
          `${label} failed (${classification}) after ${attempt} attempt(s): ${detail}`,
          classification,
          attempt,
          { cause: error }
        );
      }

      const delay = computeBackoffDelay(attempt, policy, opts.hooks?.random);
      logger.warn({ attempt, maxAttempts, classification, delay, detail }, `${label} attempt failed, retrying`);
      await wait(delay);
    }
  }
}
