/**
 * Summary Builder
 *
 * Pure aggregation of row outcomes and the activation outcome into the
 * BatchResult and the HTTP response bodies derived from it.
 */

import { RowInvalidReason } from '../types/validation.types.js';
import type {
  ActivationOutcome,
  BatchRecord,
  BatchResult,
  BatchStatusResponse,
  BatchSummary,
  BulkUploadResponse,
  HospitalRowResult,
  RowOutcome,
} from '../types/hospital.types.js';

export const DEFAULT_STATUS_SAMPLE_SIZE = 10;

const INVALID_ROW_STATUS: Record<RowInvalidReason, string> = {
  [RowInvalidReason.MISSING_NAME_OR_ADDRESS]: 'invalid_row_missing_name_or_address',
  [RowInvalidReason.INVALID_PHONE_FORMAT]: 'invalid_phone_format',
};

export function summarizeOutcomes(outcomes: readonly RowOutcome[]): BatchSummary {
  const summary: BatchSummary = {
    total: outcomes.length,
    succeeded: 0,
    validationFailed: 0,
    createFailed: 0,
    failed: 0,
  };

  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case 'created':
        summary.succeeded++;
        break;
      case 'validation_failed':
        summary.validationFailed++;
        break;
      case 'create_failed':
        summary.createFailed++;
        break;
    }
  }

  summary.failed = summary.validationFailed + summary.createFailed;
  return summary;
}

export function buildBatchResult(
  batchId: string,
  outcomes: readonly RowOutcome[],
  activation: ActivationOutcome,
  processingTimeMs: number
): BatchResult {
  return Object.freeze({
    batchId,
    outcomes: Object.freeze([...outcomes]),
    activation,
    summary: summarizeOutcomes(outcomes),
    processingTimeMs,
  });
}

/**
 * Short status label for a row, e.g. "created_and_activated" or "create_failed_400"
 */
export function describeRowStatus(outcome: RowOutcome, activated: boolean): string {
  switch (outcome.kind) {
    case 'created':
      return activated ? 'created_and_activated' : 'created';
    case 'validation_failed':
      return INVALID_ROW_STATUS[outcome.reason];
    case 'create_failed':
      return outcome.statusCode !== undefined
        ? `create_failed_${outcome.statusCode}`
        : `create_exception_${outcome.category}`;
  }
}

export function toHospitalRowResult(outcome: RowOutcome, activated: boolean): HospitalRowResult {
  const result: HospitalRowResult = {
    row: outcome.row,
    status: describeRowStatus(outcome, activated),
    outcome: outcome.kind,
    attempts: outcome.kind === 'validation_failed' ? 0 : outcome.attempts,
  };

  if (outcome.name !== undefined) {
    result.name = outcome.name;
  }

  switch (outcome.kind) {
    case 'created':
      if (outcome.hospitalId !== undefined) {
        result.hospitalId = outcome.hospitalId;
      }
      break;
    case 'validation_failed':
      result.reason = outcome.details;
      break;
    case 'create_failed':
      result.reason = outcome.detail ? `${outcome.reason}: ${outcome.detail}` : outcome.reason;
      if (outcome.statusCode !== undefined) {
        result.statusCode = outcome.statusCode;
      }
      break;
  }

  return result;
}

export function toBulkUploadResponse(result: BatchResult): BulkUploadResponse {
  const { activation, summary } = result;
  const activated = activation.kind === 'activated';

  const activationBody: BulkUploadResponse['activation'] = { status: activation.kind };
  if (activation.statusCode !== undefined) {
    activationBody.statusCode = activation.statusCode;
  }
  if (activation.kind === 'activation_failed') {
    activationBody.reason = activation.reason;
  }

  return {
    batchId: result.batchId,
    totalHospitals: summary.total,
    processedHospitals: summary.total,
    failedHospitals: summary.failed,
    processingTimeSeconds: Math.round(result.processingTimeMs) / 1000,
    batchActivated: activated,
    activation: activationBody,
    summary: { ...summary },
    hospitals: result.outcomes.map((outcome) => toHospitalRowResult(outcome, activated)),
  };
}

export function toBatchStatusResponse(
  record: BatchRecord,
  sampleSize: number = DEFAULT_STATUS_SAMPLE_SIZE
): BatchStatusResponse {
  const { result } = record;
  const activated = result?.activation.kind === 'activated';

  return {
    batchId: record.batchId,
    status: record.status,
    filename: record.filename,
    total: record.totalRows,
    processed: result?.summary.total ?? 0,
    failed: result?.summary.failed ?? 0,
    activated,
    createdAt: record.createdAt.toISOString(),
    updatedAt: record.updatedAt.toISOString(),
    resultsSample: (result?.outcomes ?? [])
      .slice(0, sampleSize)
      .map((outcome) => toHospitalRowResult(outcome, activated)),
  };
}
