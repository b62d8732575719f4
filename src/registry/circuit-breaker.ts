/**
 * Per-registry circuit breaker.
 *
 * Counts consecutive failures per registry. Once failureThreshold is reached
 * the circuit opens and calls fail fast with CircuitOpenError. After
 * resetTimeoutMs one trial call is let through (half-open): success closes
 * the circuit, failure reopens it.
 *
 * In-memory state is lost on restart.
 */

import { logger } from "../config/logger.js";
import { CircuitOpenError } from "./types.js";

export type CircuitState = "closed" | "open" | "half-open";

export interface CircuitBreakerConfig {
  /** Consecutive failures that open the circuit. Default 5. */
  failureThreshold: number;
  /** How long the circuit stays open before a trial call (ms). Default 30_000. */
  resetTimeoutMs: number;
  /** Clock, for tests. */
  now: () => number;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  resetTimeoutMs: 30_000,
  now: () => Date.now(),
};

interface Circuit {
  state: CircuitState;
  failures: number;
  /** When the state last changed. */
  changedAt: number;
}

export class CircuitBreaker {
  private readonly cfg: CircuitBreakerConfig;
  private readonly circuits = new Map<string, Circuit>();

  constructor(config?: Partial<CircuitBreakerConfig>) {
    this.cfg = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...config };
  }

  /** Whether a call to `registry` may proceed. Moves an expired open circuit to half-open. */
  allow(registry: string): boolean {
    const circuit = this.circuits.get(registry);
    if (!circuit) return true;

    switch (circuit.state) {
      case "closed":
        return true;
      case "open":
        if (this.cfg.now() - circuit.changedAt >= this.cfg.resetTimeoutMs) {
          this.transition(registry, circuit, "half-open");
          return true;
        }
        return false;
      case "half-open":
        // the trial call is still in flight
        return false;
    }
  }

  recordSuccess(registry: string): void {
    const circuit = this.circuits.get(registry);
    if (!circuit) return;
    circuit.failures = 0;
    if (circuit.state !== "closed") this.transition(registry, circuit, "closed");
  }

  recordFailure(registry: string): void {
    let circuit = this.circuits.get(registry);
    if (!circuit) {
      circuit = { state: "closed", failures: 0, changedAt: this.cfg.now() };
      this.circuits.set(registry, circuit);
    }
    circuit.failures++;

    if (circuit.state === "half-open") {
      this.transition(registry, circuit, "open");
    } else if (circuit.state === "closed" && circuit.failures >= this.cfg.failureThreshold) {
      this.transition(registry, circuit, "open");
    }
  }

  /** Current state, reporting an expired open circuit as half-open. */
  getState(registry: string): CircuitState {
    const circuit = this.circuits.get(registry);
    if (!circuit) return "closed";
    if (circuit.state === "open" && this.cfg.now() - circuit.changedAt >= this.cfg.resetTimeoutMs) {
      return "half-open";
    }
    return circuit.state;
  }

  reset(registry: string): void {
    this.circuits.delete(registry);
  }

  /**
   * Run `fn` under the circuit for `registry`, recording its outcome. A call
   * cut short by the caller's `signal` says nothing about the registry and is
   * not recorded; an abandoned trial call lets the next call through.
   */
  async execute<T>(registry: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!this.allow(registry)) throw new CircuitOpenError(registry);
    try {
      const result = await fn();
      this.recordSuccess(registry);
      return result;
    } catch (err) {
      if (signal?.aborted) this.releaseTrial(registry);
      else this.recordFailure(registry);
      throw err;
    }
  }

  /** Return a half-open circuit whose trial call was abandoned to an expired open state. */
  private releaseTrial(registry: string): void {
    const circuit = this.circuits.get(registry);
    if (circuit?.state !== "half-open") return;
    circuit.state = "open";
    circuit.changedAt = this.cfg.now() - this.cfg.resetTimeoutMs;
  }

  private transition(registry: string, circuit: Circuit, next: CircuitState): void {
    logger.info("Registry circuit state change", {
      registry,
      from: circuit.state,
      to: next,
      failures: circuit.failures,
    });
    circuit.state = next;
    circuit.changedAt = this.cfg.now();
  }
}
