/**
 * Circuit breaker for the text generation service
 *
 * - threshold: 5 consecutive counted failures open the circuit
 * - recovery: after 60s one probe window (HALF_OPEN) is allowed
 * - close: 3 successes in HALF_OPEN close it again
 *
 * Failures the `countsAsFailure` predicate rejects (a well-formed response
 * that failed schema validation, for example) pass through without moving
 * the breaker.
 */

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
  halfOpenSuccessThreshold: number;
  /** Label used in log lines */
  name: string;
  countsAsFailure: (error: unknown) => boolean;
  /** Clock, replaceable in tests */
  now: () => number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeMs: 60000,
  halfOpenSuccessThreshold: 3,
  name: 'generation',
  countsAsFailure: () => true,
  now: () => Date.now(),
};

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  lastFailureTime: number | null;
  timeToRecovery: number | null;
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Run `fn` unless the circuit is open.
   *
   * @throws CircuitBreakerOpenError while OPEN
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.checkRecovery();

    if (this.state === CircuitState.OPEN) {
      const timeToRecovery = this.getTimeToRecovery();
      throw new CircuitBreakerOpenError(
        `Circuit breaker "${this.config.name}" is OPEN. Try again in ${Math.ceil(timeToRecovery / 1000)}s`,
        timeToRecovery
      );
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (this.config.countsAsFailure(error)) {
        this.recordFailure();
      }
      throw error;
    }
  }

  private log(message: string): void {
    console.error(`[CircuitBreaker:${this.config.name}] ${message}`);
  }

  private checkRecovery(): void {
    if (this.state === CircuitState.OPEN && this.lastFailureTime !== null) {
      if (this.config.now() - this.lastFailureTime >= this.config.recoveryTimeMs) {
        this.log('OPEN -> HALF_OPEN');
        this.state = CircuitState.HALF_OPEN;
        this.successCount = 0;
      }
    }
  }

  private recordSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.config.halfOpenSuccessThreshold) {
        this.log('Recovery confirmed, HALF_OPEN -> CLOSED');
        this.state = CircuitState.CLOSED;
        this.failureCount = 0;
        this.successCount = 0;
        this.lastFailureTime = null;
      }
    } else if (this.state === CircuitState.CLOSED) {
      this.failureCount = 0;
    }
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.config.now();
    this.log(`Failure recorded (${this.failureCount}/${this.config.failureThreshold})`);

    if (this.state === CircuitState.HALF_OPEN) {
      // any failure while probing reopens
      this.log('Failure in HALF_OPEN, -> OPEN');
      this.state = CircuitState.OPEN;
      this.successCount = 0;
    } else if (this.failureCount >= this.config.failureThreshold) {
      this.log(`Threshold reached, -> OPEN`);
      this.state = CircuitState.OPEN;
    }
  }

  private getTimeToRecovery(): number {
    if (this.lastFailureTime === null) return 0;
    return Math.max(0, this.config.recoveryTimeMs - (this.config.now() - this.lastFailureTime));
  }

  isOpen(): boolean {
    this.checkRecovery();
    return this.state === CircuitState.OPEN;
  }

  getStatus(): CircuitBreakerStatus {
    this.checkRecovery();
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
      timeToRecovery: this.state === CircuitState.OPEN ? this.getTimeToRecovery() : null,
    };
  }

  getState(): CircuitState {
    this.checkRecovery();
    return this.state;
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
  }
}

/**
 * Error thrown when circuit breaker is open
 */
export class CircuitBreakerOpenError extends Error {
  readonly timeToRecovery: number;

  constructor(message: string, timeToRecovery: number) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
    this.timeToRecovery = timeToRecovery;
  }
}
