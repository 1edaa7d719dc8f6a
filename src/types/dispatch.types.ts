/**
 * Dispatcher and Concurrency Types
 */

export interface DispatcherConfig {
  maxConcurrency: number;
  rateLimitPerMinute?: number;
}

export interface DispatcherMetrics {
  totalRequests: number;
  createdHospitals: number;
  failedHospitals: number;
  retriedAttempts: number;
  inFlight: number;
  maxObservedInFlight: number;
  lastDispatchedAt: Date | null;
}
