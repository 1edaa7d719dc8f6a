import type {
  ActivateBatchResponse,
  ApiMetrics,
  CreateHospitalResponse,
  HospitalCreateRequest,
} from '../types/hospital-api.types.js';

/**
 * Hospital Directory Provider Interface
 *
 * Contract for the external hospital directory. Implementations report
 * failures in the response instead of throwing and never retry on their own.
 */
export interface IHospitalDirectoryProvider {
  /**
   * Creates one hospital
   * @param request - Hospital payload tagged with its creation batch
   * @param idempotencyKey - Stable key for every attempt of the same row
   */
  createHospital(request: HospitalCreateRequest, idempotencyKey?: string): Promise<CreateHospitalResponse>;

  /**
   * Activates every hospital created under a batch
   */
  activateBatch(batchId: string): Promise<ActivateBatchResponse>;

  /**
   * Gets provider metrics
   */
  getMetrics(): ApiMetrics;

  /**
   * Gets provider name
   */
  getName(): string;
}
