import Bottleneck from 'bottleneck';

/**
 * Concurrency Limiter Configuration
 */
export interface ConcurrencyLimiterConfig {
  maxConcurrent: number;        // Maximum jobs running at the same time
  rateLimitPerMinute?: number;  // Optional spacing between job starts (0 = off)
}

/**
 * Concurrency Limiter Metrics
 */
export interface ConcurrencyLimiterMetrics {
  queued: number;
  running: number;
  minTime: number;              // Minimum time between job starts (ms)
  maxConcurrent: number;
}

/**
 * Concurrency Limiter
 *
 * Counting permit around outbound calls, backed by Bottleneck.
 * A job scheduled while `maxConcurrent` jobs are running waits in
 * FIFO order until one of them settles.
 */
export class ConcurrencyLimiter {
  private limiter: Bottleneck;
  private readonly minTime: number;
  private readonly maxConcurrent: number;

  constructor(config: ConcurrencyLimiterConfig) {
    if (!Number.isInteger(config.maxConcurrent) || config.maxConcurrent < 1) {
      throw new Error(`maxConcurrent must be a positive integer (got ${config.maxConcurrent})`);
    }

    // If limit is 60 req/min, minTime = 60000 / 60 = 1000ms
    this.minTime = config.rateLimitPerMinute && config.rateLimitPerMinute > 0
      ? Math.ceil(60000 / config.rateLimitPerMinute)
      : 0;
    this.maxConcurrent = config.maxConcurrent;

    this.limiter = new Bottleneck({
      maxConcurrent: config.maxConcurrent,
      minTime: this.minTime,
    });
  }

  /**
   * Runs a job once a permit is available
   *
   * @param job - Async function to execute
   * @returns Promise with the job result
   */
  async schedule<T>(job: () => Promise<T>): Promise<T> {
    return this.limiter.schedule(job);
  }

  getMetrics(): ConcurrencyLimiterMetrics {
    const counts = this.limiter.counts();
    return {
      queued: counts.QUEUED + counts.RECEIVED,
      running: counts.RUNNING + counts.EXECUTING,
      minTime: this.minTime,
      maxConcurrent: this.maxConcurrent,
    };
  }

  /**
   * Checks if no job is queued or running
   */
  isIdle(): boolean {
    const { queued, running } = this.getMetrics();
    return queued === 0 && running === 0;
  }
}
