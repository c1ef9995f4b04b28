import { logger } from '../logger';

export interface CircuitBreakerConfig {
  failureThreshold: number;
  successThreshold: number;
  timeout: number; // per-call timeout in ms
  resetTimeout: number; // ms to stay OPEN before a HALF_OPEN probe
}

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitStats {
  failures: number;
  successes: number;
  lastFailureTime: number;
  state: CircuitState;
  totalCalls: number;
  totalFailures: number;
  totalSuccesses: number;
}

export class CircuitOpenError extends Error {
  constructor(readonly circuit: string) {
    super(`Circuit breaker ${circuit} is OPEN. Service temporarily unavailable.`);
    this.name = 'CircuitOpenError';
  }
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  successThreshold: 2,
  timeout: 30000,
  resetTimeout: 60000,
};

export class CircuitBreaker {
  private circuits: Map<string, CircuitStats> = new Map();
  private configs: Map<string, CircuitBreakerConfig> = new Map();

  constructor(private readonly now: () => number = Date.now) {}

  private getStats(name: string): CircuitStats {
    let stats = this.circuits.get(name);
    if (!stats) {
      stats = {
        failures: 0,
        successes: 0,
        lastFailureTime: 0,
        state: 'CLOSED',
        totalCalls: 0,
        totalFailures: 0,
        totalSuccesses: 0,
      };
      this.circuits.set(name, stats);
    }
    return stats;
  }

  private getConfig(name: string): CircuitBreakerConfig {
    return this.configs.get(name) || DEFAULT_CONFIG;
  }

  configure(name: string, config: Partial<CircuitBreakerConfig>): void {
    this.configs.set(name, { ...DEFAULT_CONFIG, ...config });
  }

  async execute<T>(name: string, operation: () => Promise<T>): Promise<T> {
    const stats = this.getStats(name);
    const config = this.getConfig(name);

    stats.totalCalls++;

    if (stats.state === 'OPEN') {
      const timeSinceFailure = this.now() - stats.lastFailureTime;

      if (timeSinceFailure >= config.resetTimeout) {
        stats.state = 'HALF_OPEN';
        stats.successes = 0;
        logger.info({ circuit: name }, 'Circuit breaker transitioning to HALF_OPEN');
      } else {
        logger.warn({ circuit: name, resetIn: config.resetTimeout - timeSinceFailure }, 'Circuit breaker is OPEN');
        throw new CircuitOpenError(name);
      }
    }

    try {
      const result = await this.executeWithTimeout(operation, config.timeout);
      this.recordSuccess(name);
      return result;
    } catch (error) {
      this.recordFailure(name);
      throw error;
    }
  }

  private async executeWithTimeout<T>(operation: () => Promise<T>, timeout: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    try {
      return await Promise.race([
        operation(),
        new Promise<T>((_, reject) => {
          timer = setTimeout(() => reject(new Error('Operation timed out')), timeout);
        }),
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private recordSuccess(name: string): void {
    const stats = this.getStats(name);
    const config = this.getConfig(name);

    stats.successes++;
    stats.totalSuccesses++;
    stats.failures = 0;

    if (stats.state === 'HALF_OPEN' && stats.successes >= config.successThreshold) {
      stats.state = 'CLOSED';
      logger.info({ circuit: name }, 'Circuit breaker CLOSED after successful recovery');
    }
  }

  private recordFailure(name: string): void {
    const stats = this.getStats(name);
    const config = this.getConfig(name);

    stats.failures++;
    stats.totalFailures++;
    stats.lastFailureTime = this.now();
    stats.successes = 0;

    if (stats.state === 'HALF_OPEN') {
      stats.state = 'OPEN';
      logger.warn({ circuit: name }, 'Circuit breaker OPEN after failure in HALF_OPEN state');
    } else if (stats.failures >= config.failureThreshold) {
      stats.state = 'OPEN';
      logger.warn({ circuit: name, failures: stats.failures }, 'Circuit breaker OPEN due to failure threshold');
    }
  }

  getState(name: string): CircuitState {
    return this.getStats(name).state;
  }

  snapshot(name: string): CircuitStats {
    return { ...this.getStats(name) };
  }

  reset(name: string): void {
    this.circuits.delete(name);
    logger.info({ circuit: name }, 'Circuit breaker reset');
  }
}

export const DOCUMENT_INTELLIGENCE_CIRCUIT = 'document-intelligence';

export const circuitBreaker = new CircuitBreaker();

circuitBreaker.configure(DOCUMENT_INTELLIGENCE_CIRCUIT, {
  failureThreshold: 3,
  successThreshold: 2,
  timeout: 120000, // polling-based analysis
  resetTimeout: 180000,
});

export async function withRetry<T>(
  operation: () => Promise<T>,
  maxRetries: number = 3,
  baseDelayMs: number = 1000,
  backoffMultiplier: number = 2,
  maxJitterMs: number = 500
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;

      if (attempt < maxRetries) {
        const delay = baseDelayMs * Math.pow(backoffMultiplier, attempt);
        const jitter = Math.random() * maxJitterMs;
        logger.warn({
          attempt: attempt + 1,
          maxRetries,
          delay: delay + jitter,
          error: error instanceof Error ? error.message : String(error),
        }, 'Operation failed, retrying with exponential backoff');
        await new Promise(resolve => setTimeout(resolve, delay + jitter));
      }
    }
  }

  throw lastError;
}
