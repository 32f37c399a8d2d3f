// Exponential Backoff and Retry Mechanism
// Retries an async operation with capped exponential delays and optional jitter

export interface RetryConfig {
  maxAttempts: number;
  initialDelay: number;        // Base delay in milliseconds
  maxDelay: number;            // Maximum delay between retries
  backoffMultiplier: number;   // Exponential backoff multiplier
  jitter: boolean;             // Add random jitter to prevent thundering herd
  retryCondition: (error: unknown) => boolean;
  onRetry: (attempt: number, error: unknown, delay: number) => void; // Callback before retry
  sleep: (ms: number) => Promise<void>;
}

export interface RetryResult<T> {
  success: boolean;
  result?: T;
  error?: unknown;
  attempts: number;
  totalDelay: number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class RetryMechanism {
  private readonly config: RetryConfig;

  constructor(config: Partial<RetryConfig> = {}) {
    // ?? keeps explicit zero values
    this.config = {
      maxAttempts: config.maxAttempts ?? 3,
      initialDelay: config.initialDelay ?? 1000,
      maxDelay: config.maxDelay ?? 30000,
      backoffMultiplier: config.backoffMultiplier ?? 2,
      jitter: config.jitter !== false,
      retryCondition: config.retryCondition ?? (() => true),
      onRetry: config.onRetry ?? (() => { }),
      sleep: config.sleep ?? defaultSleep,
    };
  }

  // Execute a function with retry logic
  async execute<T>(fn: (attempt: number) => Promise<T>): Promise<RetryResult<T>> {
    let lastError: unknown;
    let totalDelay = 0;
    let attempt = 1;

    for (attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      try {
        const result = await fn(attempt);
        return { success: true, result, attempts: attempt, totalDelay };
      } catch (error) {
        lastError = error;

        if (!this.config.retryCondition(error) || attempt === this.config.maxAttempts) {
          break;
        }

        const delay = this.calculateDelay(attempt);
        this.config.onRetry(attempt, error, delay);

        await this.config.sleep(delay);
        totalDelay += delay;
      }
    }

    return {
      success: false,
      error: lastError,
      attempts: Math.min(this.config.maxAttempts, attempt),
      totalDelay,
    };
  }

  calculateDelay(attempt: number): number {
    // delay = initialDelay * (backoffMultiplier ^ (attempt - 1))
    let delay = this.config.initialDelay * Math.pow(this.config.backoffMultiplier, attempt - 1);
    delay = Math.min(delay, this.config.maxDelay);

    if (this.config.jitter) {
      // Add random jitter between 0% and 25% of the delay
      delay += delay * 0.25 * Math.random();
    }

    return Math.floor(delay);
  }
}
