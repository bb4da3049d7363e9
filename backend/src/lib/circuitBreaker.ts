import { TransientCollaboratorError, type CollaboratorName } from "./errors.js";
import { logger } from "./logger.js";

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface BreakerPolicy {
  failureThreshold: number;
  recoveryTimeoutMs: number;
}

export interface BreakerOptions {
  now?: () => number;
  onStateChange?: (state: CircuitState) => void;
}

export class CircuitOpenError extends TransientCollaboratorError {
  constructor(collaborator: CollaboratorName) {
    super(collaborator, `${collaborator} circuit is open`);
    this.name = "CircuitOpenError";
  }
}

/**
 * Opens after `failureThreshold` consecutive transient failures and fails
 * calls fast until `recoveryTimeoutMs` has passed. The next call is then let
 * through half-open: success closes the circuit, a transient failure reopens it.
 * Non-transient errors mean the collaborator answered and count as success.
 */
export class CircuitBreaker {
  private current: CircuitState = "CLOSED";
  private failures = 0;
  private openedAt = 0;

  constructor(
    readonly collaborator: CollaboratorName,
    private readonly policy: BreakerPolicy,
    private readonly options: BreakerOptions = {},
  ) {}

  get state(): CircuitState {
    return this.current;
  }

  async call<T>(operation: () => Promise<T>): Promise<T> {
    if (this.current === "OPEN") {
      if (this.now() - this.openedAt < this.policy.recoveryTimeoutMs) {
        throw new CircuitOpenError(this.collaborator);
      }
      this.transition("HALF_OPEN");
    }

    try {
      const result = await operation();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (error instanceof TransientCollaboratorError) {
        this.recordFailure();
      } else {
        this.recordSuccess();
      }
      throw error;
    }
  }

  private now(): number {
    return (this.options.now ?? Date.now)();
  }

  private recordSuccess(): void {
    this.failures = 0;
    if (this.current !== "CLOSED") {
      this.transition("CLOSED");
    }
  }

  private recordFailure(): void {
    this.failures += 1;
    if (this.current === "HALF_OPEN" || this.failures >= this.policy.failureThreshold) {
      this.openedAt = this.now();
      if (this.current !== "OPEN") {
        this.transition("OPEN");
      }
    }
  }

  private transition(next: CircuitState): void {
    this.current = next;
    const fields = { collaborator: this.collaborator, state: next, failures: this.failures };
    if (next === "OPEN") {
      logger.warn("Circuit breaker opened", fields);
    } else {
      logger.info("Circuit breaker state changed", fields);
    }
    this.options.onStateChange?.(next);
  }
}

export type CollaboratorBreakers = Partial<Record<CollaboratorName, CircuitBreaker>>;

export const createBreakers = (
  collaborators: readonly CollaboratorName[],
  policy: BreakerPolicy,
  onStateChange?: (collaborator: CollaboratorName, state: CircuitState) => void,
): CollaboratorBreakers => {
  const breakers: CollaboratorBreakers = {};
  for (const collaborator of collaborators) {
    breakers[collaborator] = new CircuitBreaker(collaborator, policy, {
      onStateChange: (state) => onStateChange?.(collaborator, state),
    });
  }
  return breakers;
};
