/**
 * Prometheus Metrics Service
 *
 * Exposes application metrics for monitoring and alerting.
 *
 * Metrics:
 * - hospital_rows_total{outcome}: Rows by final outcome
 * - hospital_create_attempts_total{result}: Outbound create calls
 * - hospital_create_retries_total{category}: Retried create calls by error category
 * - hospital_create_duration_seconds: Create call duration histogram
 * - hospital_creates_in_flight: Create calls currently holding a permit
 * - hospital_batch_activations_total{status}: Activation calls by result
 * - hospital_batch_duration_seconds: End-to-end upload processing duration
 * - hospital_api_requests_total / hospital_api_duration_seconds: Inbound HTTP
 */

import { Registry, Counter, Histogram, Gauge } from 'prom-client';
import type { RowOutcome } from '../types/hospital.types.js';

/**
 * Prometheus Metrics Registry
 */
export class MetricsService {
  private registry: Registry;

  // Counters
  public rowsTotal: Counter<'outcome'>;
  public createAttemptsTotal: Counter<'result'>;
  public retriesTotal: Counter<'category'>;
  public activationsTotal: Counter<'status'>;
  public apiRequestsTotal: Counter<'status_code' | 'method' | 'route'>;

  // Histograms
  public createDuration: Histogram<'result'>;
  public batchDuration: Histogram;
  public apiDuration: Histogram<'method' | 'route' | 'status_code'>;

  // Gauges
  public createsInFlight: Gauge;

  constructor() {
    this.registry = new Registry();

    // Set default labels
    this.registry.setDefaultLabels({
      app: 'hospital-bulk-processor',
    });

    this.rowsTotal = new Counter({
      name: 'hospital_rows_total',
      help: 'Total number of CSV rows processed by final outcome',
      labelNames: ['outcome'] as const,
      registers: [this.registry],
    });

    this.createAttemptsTotal = new Counter({
      name: 'hospital_create_attempts_total',
      help: 'Total number of create calls sent to the hospital directory API',
      labelNames: ['result'] as const,
      registers: [this.registry],
    });

    this.retriesTotal = new Counter({
      name: 'hospital_create_retries_total',
      help: 'Total number of retried create calls by error category',
      labelNames: ['category'] as const,
      registers: [this.registry],
    });

    this.activationsTotal = new Counter({
      name: 'hospital_batch_activations_total',
      help: 'Total number of batch activation calls by result',
      labelNames: ['status'] as const,
      registers: [this.registry],
    });

    this.apiRequestsTotal = new Counter({
      name: 'hospital_api_requests_total',
      help: 'Total number of inbound API requests by status code',
      labelNames: ['status_code', 'method', 'route'] as const,
      registers: [this.registry],
    });

    this.createDuration = new Histogram({
      name: 'hospital_create_duration_seconds',
      help: 'Create call duration in seconds',
      labelNames: ['result'] as const,
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10], // seconds
      registers: [this.registry],
    });

    this.batchDuration = new Histogram({
      name: 'hospital_batch_duration_seconds',
      help: 'Upload processing duration in seconds',
      buckets: [0.5, 1, 2, 5, 10, 30, 60, 120], // seconds
      registers: [this.registry],
    });

    this.apiDuration = new Histogram({
      name: 'hospital_api_duration_seconds',
      help: 'Inbound API request duration in seconds',
      labelNames: ['method', 'route', 'status_code'] as const,
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 30], // seconds
      registers: [this.registry],
    });

    this.createsInFlight = new Gauge({
      name: 'hospital_creates_in_flight',
      help: 'Number of create calls currently in flight',
      registers: [this.registry],
    });
  }

  /**
   * Records the final outcome of each row in a batch
   */
  recordRowOutcomes(outcomes: readonly RowOutcome[]) {
    for (const outcome of outcomes) {
      this.rowsTotal.inc({ outcome: outcome.kind });
    }
  }

  /**
   * Records one outbound create call
   */
  recordCreateAttempt(success: boolean, durationSeconds: number) {
    const result = success ? 'success' : 'failure';
    this.createAttemptsTotal.inc({ result });
    this.createDuration.observe({ result }, durationSeconds);
  }

  /**
   * Records a retry scheduled after a transient failure
   */
  recordRetry(category: string) {
    this.retriesTotal.inc({ category });
  }

  /**
   * Records batch activation
   */
  recordActivation(success: boolean) {
    this.activationsTotal.inc({ status: success ? 'ACTIVATED' : 'FAILED' });
  }

  /**
   * Records end-to-end batch duration
   */
  recordBatchDuration(durationSeconds: number) {
    this.batchDuration.observe(durationSeconds);
  }

  /**
   * Updates in-flight create gauge
   */
  setCreatesInFlight(count: number) {
    this.createsInFlight.set(count);
  }

  /**
   * Records inbound API request
   */
  recordApiRequest(method: string, route: string, statusCode: number, durationSeconds: number) {
    this.apiRequestsTotal.inc({
      method,
      route,
      status_code: statusCode.toString()
    });
    this.apiDuration.observe({
      method,
      route,
      status_code: statusCode.toString()
    }, durationSeconds);
  }

  /**
   * Gets metrics in Prometheus text format
   */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  /**
   * Gets the content type of the Prometheus exposition format
   */
  getContentType(): string {
    return this.registry.contentType;
  }
}

/**
 * Global metrics instance
 */
export const metrics = new MetricsService();
