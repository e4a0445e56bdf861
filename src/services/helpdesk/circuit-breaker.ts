/**
 * Circuit Breaker for the helpdesk API.
 *
 * Protects against sustained outages by temporarily stopping requests.
 * States: CLOSED (normal), OPEN (blocking), HALF_OPEN (testing).
 */

import { logger } from '../../lib/logger.js';
import { ApiError } from './errors.js';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

/**
 * Configuration for circuit breaker behavior.
 */
export interface CircuitBreakerConfig {
  /** Number of consecutive failures to trigger OPEN state */
  failureThreshold: number;
  /** Number of successes in HALF_OPEN to return to CLOSED */
  successThreshold: number;
  /** Milliseconds before transitioning from OPEN to HALF_OPEN */
  timeout: number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  successThreshold: 2,
  timeout: 30000,
};

/**
 * Decides whether an error counts as a failure of the remote service.
 */
export type TripPredicate = (error: unknown) => boolean;

/**
 * Only outages count: 5xx and transport failures. Client-side rejections
 * (4xx, cancellation) say nothing about the service's health.
 */
export const tripOnServiceFailure: TripPredicate = (error) =>
  error instanceof ApiError && (error.kind === 'ServerFault' || error.kind === 'Network');

/**
 * Circuit breaker that protects against sustained failures.
 *
 * - CLOSED: Normal operation, requests pass through
 * - OPEN: Requests are rejected immediately with CIRCUIT_OPEN
 * - HALF_OPEN: Testing state, requests pass to check if service recovered
 */
export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failures = 0;
  private successes = 0;
  private lastFailure = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(config: CircuitBreakerConfig) {
    this.config = config;
  }

  /**
   * Executes a function through the circuit breaker.
   *
   * @param fn - Async function to execute
   * @param shouldTrip - Which errors count as failures
   * @throws ApiError with code CIRCUIT_OPEN if circuit is open
   * @throws Original error if function fails
   */
  async execute<T>(
    fn: () => Promise<T>,
    shouldTrip: TripPredicate = tripOnServiceFailure
  ): Promise<T> {
    if (this.state === 'OPEN') {
      const elapsed = Date.now() - this.lastFailure;
      if (elapsed >= this.config.timeout) {
        logger.info('Circuit breaker transitioning to HALF_OPEN');
        this.state = 'HALF_OPEN';
        this.successes = 0;
      } else {
        throw new ApiError({
          kind: 'ServerFault',
          code: 'CIRCUIT_OPEN',
          message: 'Circuit breaker is open - requests are blocked',
          retryAfterSeconds: Math.ceil((this.config.timeout - elapsed) / 1000),
        });
      }
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      if (shouldTrip(error)) {
        this.onFailure();
      }
      throw error;
    }
  }

  private onSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      this.successes++;
      if (this.successes >= this.config.successThreshold) {
        logger.info('Circuit breaker transitioning to CLOSED');
        this.state = 'CLOSED';
        this.failures = 0;
      }
    } else {
      this.failures = 0;
    }
  }

  private onFailure(): void {
    this.failures++;
    this.lastFailure = Date.now();

    if (this.state === 'HALF_OPEN') {
      // Single failure in HALF_OPEN returns to OPEN
      logger.warn('Circuit breaker returning to OPEN from HALF_OPEN');
      this.state = 'OPEN';
    } else if (this.failures >= this.config.failureThreshold) {
      logger.error('Circuit breaker transitioning to OPEN', {
        failures: this.failures,
        threshold: this.config.failureThreshold,
      });
      this.state = 'OPEN';
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getFailureCount(): number {
    return this.failures;
  }

  /**
   * Manually resets the circuit breaker to CLOSED state.
   */
  reset(): void {
    this.state = 'CLOSED';
    this.failures = 0;
    this.successes = 0;
    logger.info('Circuit breaker manually reset');
  }
}

/**
 * Creates a circuit breaker with helpdesk defaults.
 *
 * @param config - Partial configuration to override defaults
 */
export function createCircuitBreaker(
  config?: Partial<CircuitBreakerConfig>
): CircuitBreaker {
  return new CircuitBreaker({ ...DEFAULT_CONFIG, ...config });
}

