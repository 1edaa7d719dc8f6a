import type { IHospitalDirectoryProvider } from '../providers/hospital-directory.provider.interface.js';
import type { ActivationOutcome } from '../types/hospital.types.js';
import { logger } from './logger.service.js';
import { metrics } from './metrics.service.js';

/**
 * Batch Activator
 *
 * Issues exactly one activation call per batch, after every create attempt
 * has settled. Single attempt, no retry, no rollback of created rows.
 * Never rejects: failures become activation_failed outcomes.
 */
export class BatchActivator {
  constructor(private readonly provider: IHospitalDirectoryProvider) {}

  async activate(batchId: string): Promise<ActivationOutcome> {
    let outcome: ActivationOutcome;

    try {
      const response = await this.provider.activateBatch(batchId);

      if (response.success) {
        outcome = { kind: 'activated', statusCode: response.statusCode };
      } else {
        outcome = {
          kind: 'activation_failed',
          statusCode: response.statusCode,
          reason: response.error ?? `Activation returned status ${response.statusCode ?? 'unknown'}`,
        };
      }
    } catch (error) {
      outcome = {
        kind: 'activation_failed',
        reason: error instanceof Error ? error.message : String(error),
      };
    }

    metrics.recordActivation(outcome.kind === 'activated');
    logger.batchActivation({
      batchId,
      success: outcome.kind === 'activated',
      http_status: outcome.statusCode,
      error: outcome.kind === 'activation_failed' ? outcome.reason : undefined,
    });

    return outcome;
  }
}
