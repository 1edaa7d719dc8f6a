import type { BatchRecord } from '../types/hospital.types.js';

/**
 * Batch storage capability
 *
 * The bulk service only needs get/put, so an external store can replace the
 * in-process map without touching the processing logic.
 */
export interface IBatchRepository {
  get(batchId: string): Promise<BatchRecord | null>;
  put(record: BatchRecord): Promise<void>;
  count(): Promise<number>;
}

/**
 * Non-persistent in-memory batch store.
 * Entries are lost on restart and never evicted.
 */
export class InMemoryBatchRepository implements IBatchRepository {
  private batches = new Map<string, BatchRecord>();

  get(batchId: string): Promise<BatchRecord | null> {
    const record = this.batches.get(batchId);
    return Promise.resolve(record ? { ...record } : null);
  }

  put(record: BatchRecord): Promise<void> {
    this.batches.set(record.batchId, { ...record });
    return Promise.resolve();
  }

  count(): Promise<number> {
    return Promise.resolve(this.batches.size);
  }
}
