/**
 * Bulk Hospital Service
 *
 * Runs one upload end to end:
 * 1. Registers the batch as PROCESSING
 * 2. Validates every row (invalid rows are never sent)
 * 3. Dispatches valid rows under the concurrency cap
 * 4. Activates the batch, whatever the row outcomes
 * 5. Builds and stores the BatchResult
 *
 * Usage:
 * ```typescript
 * const service = new BulkHospitalService({ dispatcher, activator, repository });
 * const result = await service.processUpload({ filename: 'hospitals.csv', rows });
 * ```
 */

import { randomUUID } from 'crypto';
import type { HospitalDispatcher } from './hospital-dispatcher.service.js';
import type { BatchActivator } from './batch-activator.service.js';
import type { IBatchRepository } from '../repositories/batch.repository.js';
import { rowValidationService } from './row-validation.service.js';
import { buildBatchResult } from './summary-builder.service.js';
import { logger } from './logger.service.js';
import { metrics } from './metrics.service.js';
import type { HospitalCsvRow } from '../types/csv.types.js';
import type { BatchRecord, BatchResult, HospitalRecord, RowOutcome } from '../types/hospital.types.js';
import type { RowValidationResult } from '../types/validation.types.js';

export interface BulkHospitalServiceDeps {
  dispatcher: HospitalDispatcher;
  activator: BatchActivator;
  repository: IBatchRepository;
  validateRow?: (row: HospitalCsvRow) => RowValidationResult;
  generateBatchId?: () => string;
  now?: () => number;
}

export interface BulkUploadInput {
  filename: string;
  rows: readonly HospitalCsvRow[];
}

export class BulkHospitalService {
  private dispatcher: HospitalDispatcher;
  private activator: BatchActivator;
  private repository: IBatchRepository;
  private validateRow: (row: HospitalCsvRow) => RowValidationResult;
  private generateBatchId: () => string;
  private now: () => number;
  private inFlight = new Set<Promise<BatchResult>>();

  constructor(deps: BulkHospitalServiceDeps) {
    this.dispatcher = deps.dispatcher;
    this.activator = deps.activator;
    this.repository = deps.repository;
    this.validateRow = deps.validateRow ?? ((row) => rowValidationService.validateRow(row));
    this.generateBatchId = deps.generateBatchId ?? randomUUID;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Processes an uploaded CSV
   * @returns The batch result, with exactly one outcome per row in row order
   */
  async processUpload(input: BulkUploadInput): Promise<BatchResult> {
    const run = this.run(input);
    this.inFlight.add(run);

    try {
      return await run;
    } finally {
      this.inFlight.delete(run);
    }
  }

  private async run({ filename, rows }: BulkUploadInput): Promise<BatchResult> {
    const startedAt = this.now();
    const batchId = this.generateBatchId();
    const createdAt = new Date(startedAt);

    await this.repository.put({
      batchId,
      filename,
      status: 'PROCESSING',
      totalRows: rows.length,
      createdAt,
      updatedAt: createdAt,
    });
    logger.batchUploaded({ batchId, filename, totalRows: rows.length });

    // Slot per row; valid rows are filled in after dispatch
    const outcomes: Array<RowOutcome | undefined> = new Array(rows.length);
    const records: HospitalRecord[] = [];
    const slots: number[] = [];

    rows.forEach((row, index) => {
      const validation = this.validateRow(row);
      if (validation.isValid) {
        records.push(validation.record);
        slots.push(index);
        return;
      }

      const name = (row.fields.name ?? '').trim();
      outcomes[index] = {
        kind: 'validation_failed',
        row: row.row,
        ...(name ? { name } : {}),
        reason: validation.reason,
        details: validation.details,
      };
      logger.rowInvalid({ batchId, row: row.row, reason: validation.reason, details: validation.details });
    });

    const dispatched = await this.dispatcher.dispatch(batchId, records);
    dispatched.forEach((outcome, position) => {
      outcomes[slots[position]] = outcome;
    });

    const activation = await this.activator.activate(batchId);

    const finalOutcomes = outcomes.filter((outcome): outcome is RowOutcome => outcome !== undefined);
    if (finalOutcomes.length !== rows.length) {
      throw new Error(`Batch ${batchId} produced ${finalOutcomes.length} outcomes for ${rows.length} rows`);
    }

    const finishedAt = this.now();
    const result = buildBatchResult(batchId, finalOutcomes, activation, finishedAt - startedAt);

    await this.repository.put({
      batchId,
      filename,
      status: 'COMPLETED',
      totalRows: rows.length,
      createdAt,
      updatedAt: new Date(finishedAt),
      result,
    });

    metrics.recordRowOutcomes(result.outcomes);
    metrics.recordBatchDuration(result.processingTimeMs / 1000);
    logger.batchCompleted({
      batchId,
      total: result.summary.total,
      succeeded: result.summary.succeeded,
      failed: result.summary.failed,
      activated: activation.kind === 'activated',
      duration: result.processingTimeMs,
    });

    return result;
  }

  /**
   * Gets a stored batch (PROCESSING or COMPLETED)
   */
  async getBatch(batchId: string): Promise<BatchRecord | null> {
    return this.repository.get(batchId);
  }

  /**
   * Number of stored batches
   */
  async countBatches(): Promise<number> {
    return this.repository.count();
  }

  /**
   * Number of uploads currently being processed
   */
  getInFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Resolves once every in-flight upload has settled
   */
  async waitForIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }
}
