/**
 * Circuit breaker for outbound dependencies (GraphRAG today)
 *
 * States:
 * - CLOSED: requests pass through
 * - OPEN: requests fail fast until the reset timeout elapses
 * - HALF_OPEN: probing recovery; one failure reopens, enough successes close
 */

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export interface CircuitBreakerConfig {
  name: string;
  /** Failures inside the window before the circuit opens */
  failureThreshold: number;
  /** Time in ms before an OPEN circuit lets a probe through */
  resetTimeoutMs: number;
  /** Successes in HALF_OPEN before closing */
  successThreshold: number;
  /** Sliding window in ms for counting failures */
  failureWindowMs?: number;
  /** Errors for which this returns false do not count as failures */
  isFailure?: (error: unknown) => boolean;
  onStateChange?: (name: string, from: CircuitState, to: CircuitState) => void;
}

export interface CircuitBreakerStats {
  name: string;
  state: CircuitState;
  failures: number;
  successes: number;
  lastFailureTime: number | null;
  lastSuccessTime: number | null;
  totalRequests: number;
  totalFailures: number;
  totalSuccesses: number;
}

export class CircuitBreakerError extends Error {
  constructor(
    public readonly serviceName: string,
    public readonly state: CircuitState
  ) {
    super(`Circuit breaker '${serviceName}' is ${state}. Service unavailable.`);
    this.name = 'CircuitBreakerError';
  }
}

const DEFAULT_FAILURE_WINDOW_MS = 60000;

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private successes = 0;
  private lastFailureTime: number | null = null;
  private lastSuccessTime: number | null = null;
  private nextAttemptTime = 0;
  private failureTimestamps: number[] = [];

  private totalRequests = 0;
  private totalFailures = 0;
  private totalSuccesses = 0;

  constructor(private readonly config: CircuitBreakerConfig) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.totalRequests++;

    if (this.state === CircuitState.OPEN) {
      if (Date.now() >= this.nextAttemptTime) {
        this.transitionTo(CircuitState.HALF_OPEN);
      } else {
        throw new CircuitBreakerError(this.config.name, this.state);
      }
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      if (this.config.isFailure?.(error) ?? true) {
        this.onFailure();
      }
      throw error;
    }
  }

  private onSuccess(): void {
    this.successes++;
    this.totalSuccesses++;
    this.lastSuccessTime = Date.now();

    if (this.state === CircuitState.HALF_OPEN) {
      if (this.successes >= this.config.successThreshold) {
        this.transitionTo(CircuitState.CLOSED);
      }
    } else {
      this.failureTimestamps = [];
    }
  }

  private onFailure(): void {
    const now = Date.now();
    this.totalFailures++;
    this.lastFailureTime = now;

    const windowStart = now - (this.config.failureWindowMs ?? DEFAULT_FAILURE_WINDOW_MS);
    this.failureTimestamps = this.failureTimestamps.filter((ts) => ts > windowStart);
    this.failureTimestamps.push(now);

    if (this.state === CircuitState.HALF_OPEN) {
      this.transitionTo(CircuitState.OPEN);
    } else if (
      this.state === CircuitState.CLOSED &&
      this.failureTimestamps.length >= this.config.failureThreshold
    ) {
      this.transitionTo(CircuitState.OPEN);
    }
  }

  private transitionTo(newState: CircuitState): void {
    const oldState = this.state;
    if (oldState === newState) return;

    this.state = newState;
    this.successes = 0;

    if (newState === CircuitState.CLOSED) {
      this.failureTimestamps = [];
    } else if (newState === CircuitState.OPEN) {
      this.nextAttemptTime = Date.now() + this.config.resetTimeoutMs;
    }

    this.config.onStateChange?.(this.config.name, oldState, newState);
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): CircuitBreakerStats {
    return {
      name: this.config.name,
      state: this.state,
      failures: this.failureTimestamps.length,
      successes: this.successes,
      lastFailureTime: this.lastFailureTime,
      lastSuccessTime: this.lastSuccessTime,
      totalRequests: this.totalRequests,
      totalFailures: this.totalFailures,
      totalSuccesses: this.totalSuccesses,
    };
  }

  /**
   * Manually reset the circuit breaker (e.g., for testing)
   */
  reset(): void {
    this.transitionTo(CircuitState.CLOSED);
    this.totalRequests = 0;
    this.totalFailures = 0;
    this.totalSuccesses = 0;
    this.lastFailureTime = null;
    this.lastSuccessTime = null;
  }
}

/**
 * Registry of named circuit breakers
 */
export class CircuitBreakerRegistry {
  private breakers = new Map<string, CircuitBreaker>();

  constructor(
    private readonly defaultConfig: Omit<CircuitBreakerConfig, 'name'> = {
      failureThreshold: 5,
      resetTimeoutMs: 30000,
      successThreshold: 2,
      failureWindowMs: DEFAULT_FAILURE_WINDOW_MS,
    }
  ) {}

  /**
   * Get or create a circuit breaker by name
   */
  get(name: string, config?: Partial<Omit<CircuitBreakerConfig, 'name'>>): CircuitBreaker {
    let breaker = this.breakers.get(name);
    if (!breaker) {
      breaker = new CircuitBreaker({ ...this.defaultConfig, ...config, name });
      this.breakers.set(name, breaker);
    }
    return breaker;
  }

  getAllStats(): CircuitBreakerStats[] {
    return Array.from(this.breakers.values()).map((b) => b.getStats());
  }

  getOpenCircuits(): string[] {
    return Array.from(this.breakers.entries())
      .filter(([, b]) => b.getState() === CircuitState.OPEN)
      .map(([name]) => name);
  }

  resetAll(): void {
    this.breakers.forEach((b) => b.reset());
  }
}

export const globalCircuitBreakerRegistry = new CircuitBreakerRegistry();
