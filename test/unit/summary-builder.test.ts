import { describe, it, expect } from 'vitest';
import {
  buildBatchResult,
  describeRowStatus,
  summarizeOutcomes,
  toBatchStatusResponse,
  toBulkUploadResponse,
} from '../../src/services/summary-builder.service.js';
import { RowInvalidReason } from '../../src/types/validation.types.js';
import type { BatchRecord, RowOutcome } from '../../src/types/hospital.types.js';

const outcomes: RowOutcome[] = [
  { kind: 'created', row: 1, name: 'General', hospitalId: 101, attempts: 1 },
  {
    kind: 'validation_failed',
    row: 2,
    reason: RowInvalidReason.MISSING_NAME_OR_ADDRESS,
    details: 'Missing required field: name',
  },
  {
    kind: 'create_failed',
    row: 3,
    name: 'City',
    statusCode: 400,
    category: 'client_error',
    reason: 'Permanent error - 400 Bad Request - invalid request format',
    detail: 'name too long',
    attempts: 1,
  },
  {
    kind: 'create_failed',
    row: 4,
    name: 'County',
    category: 'timeout',
    reason: 'Max attempts exceeded (3/3) - Request timeout',
    attempts: 3,
  },
];

describe('Summary Builder', () => {
  it('counts outcomes by kind', () => {
    expect(summarizeOutcomes(outcomes)).toEqual({
      total: 4,
      succeeded: 1,
      validationFailed: 1,
      createFailed: 2,
      failed: 3,
    });
  });

  it('summarizes an empty batch', () => {
    expect(summarizeOutcomes([])).toEqual({ total: 0, succeeded: 0, validationFailed: 0, createFailed: 0, failed: 0 });
  });

  it('builds an immutable batch result', () => {
    const result = buildBatchResult('batch-1', outcomes, { kind: 'activated', statusCode: 200 }, 1234);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.outcomes)).toBe(true);
    expect(result.summary.succeeded).toBe(1);
    expect(result.processingTimeMs).toBe(1234);
  });

  describe('describeRowStatus', () => {
    it('labels each outcome', () => {
      expect(describeRowStatus(outcomes[0], true)).toBe('created_and_activated');
      expect(describeRowStatus(outcomes[0], false)).toBe('created');
      expect(describeRowStatus(outcomes[1], true)).toBe('invalid_row_missing_name_or_address');
      expect(describeRowStatus(outcomes[2], true)).toBe('create_failed_400');
      expect(describeRowStatus(outcomes[3], true)).toBe('create_exception_timeout');
    });

    it('labels an invalid phone', () => {
      const outcome: RowOutcome = {
        kind: 'validation_failed',
        row: 1,
        name: 'A',
        reason: RowInvalidReason.INVALID_PHONE_FORMAT,
        details: 'Invalid phone format: abc',
      };

      expect(describeRowStatus(outcome, true)).toBe('invalid_phone_format');
    });
  });

  describe('toBulkUploadResponse', () => {
    it('maps the batch result to the upload response', () => {
      const result = buildBatchResult(
        'batch-1',
        outcomes,
        { kind: 'activation_failed', statusCode: 500, reason: 'HTTP 500' },
        2345.6
      );

      expect(toBulkUploadResponse(result)).toEqual({
        batchId: 'batch-1',
        totalHospitals: 4,
        processedHospitals: 4,
        failedHospitals: 3,
        processingTimeSeconds: 2.346,
        batchActivated: false,
        activation: { status: 'activation_failed', statusCode: 500, reason: 'HTTP 500' },
        summary: { total: 4, succeeded: 1, validationFailed: 1, createFailed: 2, failed: 3 },
        hospitals: [
          { row: 1, hospitalId: 101, name: 'General', status: 'created', outcome: 'created', attempts: 1 },
          {
            row: 2,
            status: 'invalid_row_missing_name_or_address',
            outcome: 'validation_failed',
            reason: 'Missing required field: name',
            attempts: 0,
          },
          {
            row: 3,
            name: 'City',
            status: 'create_failed_400',
            outcome: 'create_failed',
            reason: 'Permanent error - 400 Bad Request - invalid request format: name too long',
            statusCode: 400,
            attempts: 1,
          },
          {
            row: 4,
            name: 'County',
            status: 'create_exception_timeout',
            outcome: 'create_failed',
            reason: 'Max attempts exceeded (3/3) - Request timeout',
            attempts: 3,
          },
        ],
      });
    });

    it('reports a successful activation without a reason', () => {
      const result = buildBatchResult('batch-1', [], { kind: 'activated', statusCode: 200 }, 0);

      expect(toBulkUploadResponse(result).activation).toEqual({ status: 'activated', statusCode: 200 });
      expect(toBulkUploadResponse(result).batchActivated).toBe(true);
    });
  });

  describe('toBatchStatusResponse', () => {
    const createdAt = new Date('2026-01-01T10:00:00.000Z');
    const updatedAt = new Date('2026-01-01T10:00:05.000Z');

    it('reports a processing batch without results', () => {
      const record: BatchRecord = {
        batchId: 'batch-1',
        filename: 'h.csv',
        status: 'PROCESSING',
        totalRows: 4,
        createdAt,
        updatedAt: createdAt,
      };

      expect(toBatchStatusResponse(record)).toEqual({
        batchId: 'batch-1',
        status: 'PROCESSING',
        filename: 'h.csv',
        total: 4,
        processed: 0,
        failed: 0,
        activated: false,
        createdAt: '2026-01-01T10:00:00.000Z',
        updatedAt: '2026-01-01T10:00:00.000Z',
        resultsSample: [],
      });
    });

    it('samples the first rows of a completed batch', () => {
      const record: BatchRecord = {
        batchId: 'batch-1',
        filename: 'h.csv',
        status: 'COMPLETED',
        totalRows: 4,
        createdAt,
        updatedAt,
        result: buildBatchResult('batch-1', outcomes, { kind: 'activated', statusCode: 200 }, 5000),
      };

      const response = toBatchStatusResponse(record, 2);

      expect(response.processed).toBe(4);
      expect(response.failed).toBe(3);
      expect(response.activated).toBe(true);
      expect(response.updatedAt).toBe('2026-01-01T10:00:05.000Z');
      expect(response.resultsSample.map((row) => row.row)).toEqual([1, 2]);
      expect(response.resultsSample[0].status).toBe('created_and_activated');
    });
  });
});
