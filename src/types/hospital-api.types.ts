/**
 * Hospital directory API types
 */

/**
 * Body of POST /hospitals/
 */
export interface HospitalCreateRequest {
  name: string;
  address: string;
  phone?: string;
  creation_batch_id: string;
}

/**
 * Result of a single create call
 */
export interface CreateHospitalResponse {
  success: boolean;
  hospitalId?: number;
  error?: string;
  errorCode?: string;
  statusCode?: number;
}

/**
 * Result of a single activation call
 */
export interface ActivateBatchResponse {
  success: boolean;
  error?: string;
  errorCode?: string;
  statusCode?: number;
}

/**
 * Hospital directory provider configuration
 */
export interface HospitalDirectoryProviderConfig {
  baseUrl: string;
  timeout?: number;
}

/**
 * API request metrics
 */
export interface ApiMetrics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  requestsByStatusCode: Record<number, number>;
  lastRequestAt: number | null;
}

export type ErrorCategory =
  | 'client_error'
  | 'server_error'
  | 'rate_limit'
  | 'timeout'
  | 'network'
  | 'unknown';
