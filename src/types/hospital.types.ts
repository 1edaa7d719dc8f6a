/**
 * Bulk hospital processing types
 */

import type { ErrorCategory } from './hospital-api.types.js';
import type { RowInvalidReason } from './validation.types.js';

/**
 * A CSV row that passed validation
 */
export interface HospitalRecord {
  readonly row: number;
  readonly name: string;
  readonly address: string;
  readonly phone?: string;
}

export interface ValidationFailedOutcome {
  kind: 'validation_failed';
  row: number;
  name?: string;
  reason: RowInvalidReason;
  details: string;
}

export interface CreateFailedOutcome {
  kind: 'create_failed';
  row: number;
  name: string;
  statusCode?: number;
  category: ErrorCategory;
  reason: string;
  detail?: string;
  attempts: number;
}

export interface CreatedOutcome {
  kind: 'created';
  row: number;
  name: string;
  hospitalId?: number;
  attempts: number;
}

export type DispatchOutcome = CreatedOutcome | CreateFailedOutcome;

export type RowOutcome = ValidationFailedOutcome | DispatchOutcome;

export type ActivationOutcome =
  | { kind: 'activated'; statusCode?: number }
  | { kind: 'activation_failed'; statusCode?: number; reason: string };

export interface BatchSummary {
  total: number;
  succeeded: number;
  validationFailed: number;
  createFailed: number;
  failed: number;
}

export interface BatchResult {
  readonly batchId: string;
  readonly outcomes: readonly RowOutcome[];
  readonly activation: ActivationOutcome;
  readonly summary: BatchSummary;
  readonly processingTimeMs: number;
}

export type BatchStatus = 'PROCESSING' | 'COMPLETED';

/**
 * What the batch store keeps per upload
 */
export interface BatchRecord {
  batchId: string;
  filename: string;
  status: BatchStatus;
  totalRows: number;
  createdAt: Date;
  updatedAt: Date;
  result?: BatchResult;
}

/**
 * Per-row entry of the upload response
 */
export interface HospitalRowResult {
  row: number;
  hospitalId?: number;
  name?: string;
  status: string;
  outcome: RowOutcome['kind'];
  reason?: string;
  statusCode?: number;
  attempts: number;
}

export interface BulkUploadResponse {
  batchId: string;
  totalHospitals: number;
  processedHospitals: number;
  failedHospitals: number;
  processingTimeSeconds: number;
  batchActivated: boolean;
  activation: {
    status: ActivationOutcome['kind'];
    statusCode?: number;
    reason?: string;
  };
  summary: BatchSummary;
  hospitals: HospitalRowResult[];
}

export interface BatchStatusResponse {
  batchId: string;
  status: BatchStatus;
  filename: string;
  total: number;
  processed: number;
  failed: number;
  activated: boolean;
  createdAt: string;
  updatedAt: string;
  resultsSample: HospitalRowResult[];
}
