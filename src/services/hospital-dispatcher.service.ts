/**
 * Hospital Dispatcher Service
 *
 * Sends one create request per validated row with:
 * - A process-wide concurrency cap (Bottleneck permit per attempt)
 * - Retry with exponential backoff for transient failures
 * - Immediate failure for permanent (4xx) rejections
 * - Idempotency via sha256(batchId:row) keys, stable across attempts
 *
 * Outcomes are returned in input order regardless of completion order,
 * and dispatch() never rejects: every record ends as created or create_failed.
 */

import crypto from 'crypto';
import type { IHospitalDirectoryProvider } from '../providers/hospital-directory.provider.interface.js';
import { ConcurrencyLimiter, type ConcurrencyLimiterMetrics } from './concurrency-limiter.service.js';
import { RetryPolicyService } from './retry-policy.service.js';
import { logger } from './logger.service.js';
import { metrics } from './metrics.service.js';
import type { CreateHospitalResponse, HospitalCreateRequest } from '../types/hospital-api.types.js';
import type {
  CreatedOutcome,
  CreateFailedOutcome,
  DispatchOutcome,
  HospitalRecord,
} from '../types/hospital.types.js';
import type { DispatcherConfig, DispatcherMetrics } from '../types/dispatch.types.js';

/**
 * Generates the idempotency key for a row
 * Format: sha256(batchId:row)
 */
export function generateIdempotencyKey(batchId: string, row: number): string {
  return crypto.createHash('sha256').update(`${batchId}:${row}`).digest('hex');
}

/**
 * Builds the outbound payload for a validated row
 */
export function toCreateRequest(batchId: string, record: HospitalRecord): HospitalCreateRequest {
  const request: HospitalCreateRequest = {
    name: record.name,
    address: record.address,
    creation_batch_id: batchId,
  };
  if (record.phone) {
    request.phone = record.phone;
  }
  return request;
}

interface TimedCreateResponse {
  response: CreateHospitalResponse;
  durationMs: number;
}

export class HospitalDispatcher {
  private provider: IHospitalDirectoryProvider;
  private retryPolicy: RetryPolicyService;
  private limiter: ConcurrencyLimiter;
  private metrics: DispatcherMetrics;

  constructor(
    provider: IHospitalDirectoryProvider,
    retryPolicy: RetryPolicyService,
    config: Partial<DispatcherConfig> = {}
  ) {
    this.provider = provider;
    this.retryPolicy = retryPolicy;
    this.limiter = new ConcurrencyLimiter({
      maxConcurrent: config.maxConcurrency ?? 5,
      rateLimitPerMinute: config.rateLimitPerMinute ?? 0,
    });

    this.metrics = {
      totalRequests: 0,
      createdHospitals: 0,
      failedHospitals: 0,
      retriedAttempts: 0,
      inFlight: 0,
      maxObservedInFlight: 0,
      lastDispatchedAt: null,
    };
  }

  /**
   * Creates every record, concurrently under the permit cap
   * @param batchId - Creation batch attached to every hospital
   * @param records - Validated rows
   * @returns One outcome per record, index-aligned with `records`
   */
  async dispatch(batchId: string, records: readonly HospitalRecord[]): Promise<DispatchOutcome[]> {
    this.metrics.lastDispatchedAt = new Date();
    return Promise.all(records.map((record) => this.createWithRetry(batchId, record)));
  }

  private async createWithRetry(batchId: string, record: HospitalRecord): Promise<DispatchOutcome> {
    const request = toCreateRequest(batchId, record);
    const idempotencyKey = generateIdempotencyKey(batchId, record.row);
    const maxAttempts = this.retryPolicy.getMaxAttempts();

    for (let attempt = 1; ; attempt++) {
      const { response, durationMs } = await this.limiter.schedule(() =>
        this.send(batchId, record.row, attempt, request, idempotencyKey)
      );

      if (response.success) {
        this.metrics.createdHospitals++;
        logger.hospitalCreated({
          batchId,
          row: record.row,
          attempts: attempt,
          http_status: response.statusCode,
          hospitalId: response.hospitalId,
          duration: durationMs,
        });

        const outcome: CreatedOutcome = { kind: 'created', row: record.row, name: record.name, attempts: attempt };
        if (response.hospitalId !== undefined) {
          outcome.hospitalId = response.hospitalId;
        }
        return outcome;
      }

      const error = response.error ?? 'Unknown error';
      const decision = this.retryPolicy.shouldRetry(attempt, response.statusCode, {
        code: response.errorCode,
        message: error,
      });

      if (decision.shouldRetry && decision.delayMs !== undefined) {
        this.metrics.retriedAttempts++;
        metrics.recordRetry(decision.category);
        logger.hospitalCreateRetry({
          batchId,
          row: record.row,
          attempts: attempt,
          http_status: response.statusCode,
          error_code: response.errorCode ?? decision.category,
          error: `${decision.reason} (${error})`,
          delayMs: decision.delayMs,
        });
        logger.debug(`Row ${record.row} retry in ${this.retryPolicy.formatDelay(decision.delayMs)} (next attempt ${attempt + 1}/${maxAttempts})`, { batchId });

        await this.retryPolicy.wait(decision.delayMs);
        continue;
      }

      this.metrics.failedHospitals++;
      logger.hospitalCreateFailed({
        batchId,
        row: record.row,
        attempts: attempt,
        http_status: response.statusCode,
        error_code: response.errorCode ?? decision.category,
        error: `${decision.reason} (${error})`,
      });

      const outcome: CreateFailedOutcome = {
        kind: 'create_failed',
        row: record.row,
        name: record.name,
        category: decision.category,
        reason: decision.reason,
        detail: error,
        attempts: attempt,
      };
      if (response.statusCode !== undefined) {
        outcome.statusCode = response.statusCode;
      }
      return outcome;
    }
  }

  /**
   * Performs one create call while holding a permit
   * Duration covers the outbound call only, not the wait for the permit.
   * A provider that throws is reported as a failure without status code
   */
  private async send(
    batchId: string,
    row: number,
    attempt: number,
    request: HospitalCreateRequest,
    idempotencyKey: string
  ): Promise<TimedCreateResponse> {
    logger.hospitalCreating({ batchId, row, attempts: attempt });

    this.metrics.totalRequests++;
    this.metrics.inFlight++;
    this.metrics.maxObservedInFlight = Math.max(this.metrics.maxObservedInFlight, this.metrics.inFlight);
    metrics.setCreatesInFlight(this.metrics.inFlight);

    const startedAt = Date.now();
    let response: CreateHospitalResponse;

    try {
      response = await this.provider.createHospital(request, idempotencyKey);
    } catch (error) {
      logger.error('Hospital provider threw during create', { error });
      response = {
        success: false,
        error: error instanceof Error ? error.message : String(error),
      };
    } finally {
      this.metrics.inFlight--;
      metrics.setCreatesInFlight(this.metrics.inFlight);
    }

    const durationMs = Date.now() - startedAt;
    metrics.recordCreateAttempt(response.success, durationMs / 1000);
    return { response, durationMs };
  }

  /**
   * Gets current metrics
   */
  getMetrics(): DispatcherMetrics {
    return { ...this.metrics };
  }

  /**
   * Gets permit queue state
   */
  getLimiterMetrics(): ConcurrencyLimiterMetrics & { idle: boolean } {
    return { ...this.limiter.getMetrics(), idle: this.limiter.isIdle() };
  }
}
