import axios, { type AxiosInstance } from 'axios';
import type { IHospitalDirectoryProvider } from './hospital-directory.provider.interface.js';
import type {
  ActivateBatchResponse,
  ApiMetrics,
  CreateHospitalResponse,
  HospitalCreateRequest,
  HospitalDirectoryProviderConfig,
} from '../types/hospital-api.types.js';
import { logger } from '../services/logger.service.js';

const MAX_ERROR_LENGTH = 200;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function truncate(text: string): string {
  return text.length > MAX_ERROR_LENGTH ? `${text.substring(0, MAX_ERROR_LENGTH)}...` : text;
}

/**
 * Reads the hospital id from a create response body
 */
export function extractHospitalId(data: unknown): number | undefined {
  if (!isRecord(data)) {
    return undefined;
  }
  const { id } = data;
  const value = typeof id === 'string' && /^\d+$/.test(id) ? Number(id) : id;

  // Only ids representable exactly as a JSON integer
  return typeof value === 'number' && Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Extracts a short error message from an error response body
 * (`detail`, `message` or `error` field, or the raw body)
 */
export function extractErrorMessage(data: unknown): string | undefined {
  if (typeof data === 'string') {
    return data.trim() ? truncate(data.trim()) : undefined;
  }
  if (!isRecord(data)) {
    return undefined;
  }

  const { detail, message, error } = data;

  // Validation errors come back as detail: [{ loc, msg, type }]
  if (Array.isArray(detail)) {
    const messages = detail
      .map((item) => (isRecord(item) && typeof item.msg === 'string' ? item.msg : undefined))
      .filter((msg): msg is string => msg !== undefined);
    if (messages.length > 0) {
      return truncate(messages.join('; '));
    }
  }

  for (const candidate of [detail, message, error]) {
    if (typeof candidate === 'string' && candidate) {
      return truncate(candidate);
    }
  }

  return truncate(JSON.stringify(data));
}

/**
 * Hospital Directory API Provider
 *
 * Implementation of IHospitalDirectoryProvider over HTTP (axios).
 *
 * - POST {baseUrl}/hospitals/ creates one hospital (200/201 = success)
 * - PATCH {baseUrl}/hospitals/batch/{batchId}/activate activates a batch (200/204 = success)
 * - Sends an Idempotency-Key header so retried creates can be deduplicated upstream
 * - Non-2xx responses and transport errors are returned, never thrown
 */
export class HospitalDirectoryApiProvider implements IHospitalDirectoryProvider {
  private config: Required<HospitalDirectoryProviderConfig>;
  private http: AxiosInstance;
  private metrics: ApiMetrics;

  constructor(config: HospitalDirectoryProviderConfig, http: AxiosInstance = axios.create()) {
    this.config = {
      baseUrl: config.baseUrl.replace(/\/+$/, ''),
      timeout: config.timeout ?? 10000, // 10 seconds default
    };
    this.http = http;

    this.metrics = {
      totalRequests: 0,
      successfulRequests: 0,
      failedRequests: 0,
      requestsByStatusCode: {},
      lastRequestAt: null,
    };
  }

  /**
   * Creates a hospital via POST /hospitals/
   */
  async createHospital(
    request: HospitalCreateRequest,
    idempotencyKey?: string
  ): Promise<CreateHospitalResponse> {
    const url = `${this.config.baseUrl}/hospitals/`;
    this.metrics.totalRequests++;
    this.metrics.lastRequestAt = Date.now();

    try {
      const response = await this.http.post<unknown>(url, request, {
        headers: idempotencyKey ? { 'Idempotency-Key': idempotencyKey } : {},
        timeout: this.config.timeout,
        validateStatus: () => true,
      });

      const statusCode = response.status;

      if (statusCode === 200 || statusCode === 201) {
        this.updateMetrics(statusCode, true);
        return {
          success: true,
          hospitalId: extractHospitalId(response.data),
          statusCode,
        };
      }

      this.updateMetrics(statusCode, false);
      const error = extractErrorMessage(response.data) ?? `HTTP ${statusCode}`;
      logger.debug('Hospital create rejected', { http_status: statusCode, error });

      return { success: false, statusCode, error };
    } catch (error) {
      return this.transportFailure(error);
    }
  }

  /**
   * Activates a batch via PATCH /hospitals/batch/{batchId}/activate
   */
  async activateBatch(batchId: string): Promise<ActivateBatchResponse> {
    const url = `${this.config.baseUrl}/hospitals/batch/${encodeURIComponent(batchId)}/activate`;
    this.metrics.totalRequests++;
    this.metrics.lastRequestAt = Date.now();

    try {
      const response = await this.http.patch<unknown>(url, undefined, {
        timeout: this.config.timeout,
        validateStatus: () => true,
      });

      const statusCode = response.status;

      if (statusCode === 200 || statusCode === 204) {
        this.updateMetrics(statusCode, true);
        return { success: true, statusCode };
      }

      this.updateMetrics(statusCode, false);
      return {
        success: false,
        statusCode,
        error: extractErrorMessage(response.data) ?? `HTTP ${statusCode}`,
      };
    } catch (error) {
      return this.transportFailure(error);
    }
  }

  /**
   * Converts a thrown transport error (timeout, refused connection, ...) into a failed response
   */
  private transportFailure(error: unknown): { success: false; error: string; errorCode?: string } {
    this.updateMetrics(0, false);

    if (axios.isAxiosError(error)) {
      logger.debug('Hospital API unreachable', { error_code: error.code, error: error.message });
      return { success: false, error: error.message, errorCode: error.code };
    }

    const message = error instanceof Error ? error.message : String(error);
    return { success: false, error: message };
  }

  /**
   * Updates request metrics (status 0 = no response)
   */
  private updateMetrics(statusCode: number, success: boolean): void {
    if (success) {
      this.metrics.successfulRequests++;
    } else {
      this.metrics.failedRequests++;
    }

    this.metrics.requestsByStatusCode[statusCode] = (this.metrics.requestsByStatusCode[statusCode] ?? 0) + 1;
  }

  /**
   * Gets provider metrics
   */
  getMetrics(): ApiMetrics {
    return {
      ...this.metrics,
      requestsByStatusCode: { ...this.metrics.requestsByStatusCode },
    };
  }

  /**
   * Gets provider name
   */
  getName(): string {
    return 'HospitalDirectoryApi';
  }
}
