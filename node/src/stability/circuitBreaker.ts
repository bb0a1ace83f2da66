// Circuit breaker for outbound calls made by the worker adapters

import { componentLogger } from '@/services/logger';

export enum CircuitState {
  CLOSED = 'CLOSED',       // Normal operation
  OPEN = 'OPEN',           // Failing, reject calls
  HALF_OPEN = 'HALF_OPEN', // Testing if the provider recovered
}

export interface CircuitBreakerConfig {
  failureThreshold: number; // Open circuit after N consecutive failures
  successThreshold: number; // Close circuit after N successes while half-open
  timeout: number;          // Per-call timeout (ms)
  resetTimeout: number;     // Time before attempting half-open (ms)
}

const log = componentLogger('circuit');

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime = 0;

  constructor(
    readonly name: string,
    private readonly config: CircuitBreakerConfig = {
      failureThreshold: 5,
      successThreshold: 2,
      timeout: 10000,
      resetTimeout: 30000,
    },
  ) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      const timeSinceFailure = Date.now() - this.lastFailureTime;
      if (timeSinceFailure > this.config.resetTimeout) {
        this.state = CircuitState.HALF_OPEN;
        this.successCount = 0;
        log.info(`${this.name}: moving to HALF_OPEN`);
      } else {
        throw new Error(`Circuit breaker is OPEN for ${this.name} - service unavailable`);
      }
    }

    let timer: NodeJS.Timeout | undefined;
    try {
      const result = await Promise.race([
        fn(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new Error(`${this.name} operation timeout`)), this.config.timeout);
        }),
      ]);
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  private onSuccess(): void {
    this.failureCount = 0;

    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.config.successThreshold) {
        this.state = CircuitState.CLOSED;
        log.info(`${this.name}: moving to CLOSED (recovered)`);
      }
    }
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    if (this.state === CircuitState.HALF_OPEN || this.failureCount >= this.config.failureThreshold) {
      this.state = CircuitState.OPEN;
      log.error(`${this.name}: moving to OPEN (${this.failureCount} failures)`);
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = 0;
  }
}

export function createLlmCircuitBreaker(): CircuitBreaker {
  return new CircuitBreaker('llm', {
    failureThreshold: 3,
    successThreshold: 1,
    timeout: 30000,
    resetTimeout: 120000, // 2 minutes before retry
  });
}
