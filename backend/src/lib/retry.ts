import { setTimeout as delay } from "node:timers/promises";
import { CircuitOpenError, type CircuitBreaker } from "./circuitBreaker.js";
import { logger } from "./logger.js";
import { RetryExhaustedError, TransientCollaboratorError, type CollaboratorName } from "./errors.js";

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
}

export interface RetryOptions {
  label: string;
  collaborator: CollaboratorName;
  /** Each attempt goes through the breaker; an open circuit ends the sequence at once. */
  breaker?: CircuitBreaker;
  sleep?: (ms: number) => Promise<void>;
}

export const backoffDelay = (policy: RetryPolicy, attempt: number): number =>
  Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);

const runAttempt = async <T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: RetryOptions,
): Promise<T> => {
  const controller = new AbortController();
  let timeout: NodeJS.Timeout | undefined;
  // Operations that ignore the signal still lose the race against the timer.
  const timedOut = new Promise<never>((_resolve, reject) => {
    timeout = setTimeout(() => {
      controller.abort();
      reject(
        new TransientCollaboratorError(options.collaborator, `${options.label} timed out after ${timeoutMs}ms`),
      );
    }, timeoutMs);
  });

  const pending = operation(controller.signal);
  pending.catch((error: unknown) => {
    if (controller.signal.aborted) {
      logger.debug("Abandoned attempt settled after timeout", { label: options.label, error });
    }
  });

  try {
    return await Promise.race([pending, timedOut]);
  } catch (error) {
    if (controller.signal.aborted && !(error instanceof TransientCollaboratorError)) {
      throw new TransientCollaboratorError(
        options.collaborator,
        `${options.label} timed out after ${timeoutMs}ms`,
        undefined,
        { cause: error },
      );
    }
    throw error;
  } finally {
    clearTimeout(timeout);
  }
};

/**
 * Runs `operation` under a per-attempt timeout, retrying only
 * {@link TransientCollaboratorError}s with capped exponential backoff.
 * Any other error, and {@link CircuitOpenError}, propagates at once.
 */
export const withRetry = async <T>(
  operation: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<T> => {
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  let lastError: unknown;
  const attempt = (): Promise<T> => runAttempt(operation, policy.timeoutMs, options);

  for (let attemptNumber = 1; attemptNumber <= policy.attempts; attemptNumber += 1) {
    try {
      return await (options.breaker ? options.breaker.call(attempt) : attempt());
    } catch (error) {
      if (!(error instanceof TransientCollaboratorError) || error instanceof CircuitOpenError) {
        throw error;
      }
      lastError = error;
      if (attemptNumber === policy.attempts) {
        break;
      }
      const wait = backoffDelay(policy, attemptNumber);
      logger.warn("Transient collaborator failure, retrying", {
        label: options.label,
        attempt: attemptNumber,
        nextDelayMs: wait,
        error: error.message,
      });
      await sleep(wait);
    }
  }

  throw new RetryExhaustedError(options.label, policy.attempts, lastError);
};
