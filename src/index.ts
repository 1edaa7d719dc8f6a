import type { FastifyInstance } from 'fastify';
import { config } from './config/env.js';
import { buildApp } from './app.js';
import { HospitalDirectoryApiProvider } from './providers/hospital-directory-api.provider.js';
import { RetryPolicyService } from './services/retry-policy.service.js';
import { HospitalDispatcher } from './services/hospital-dispatcher.service.js';
import { BatchActivator } from './services/batch-activator.service.js';
import { BulkHospitalService } from './services/bulk-hospital.service.js';
import { InMemoryBatchRepository } from './repositories/batch.repository.js';
import { createGracefulShutdown } from './services/graceful-shutdown.service.js';
import { logger } from './services/logger.service.js';

// Track server state
let isAcceptingNewWork = true;

const start = async () => {
  let fastify: FastifyInstance | undefined;

  try {
    logger.info('Starting application', {
      hospitalApiUrl: config.hospitalApiUrl,
      concurrencyLimit: config.concurrencyLimit,
      maxAttempts: config.maxAttempts,
      maxRows: config.maxRows,
    });

    const provider = new HospitalDirectoryApiProvider({
      baseUrl: config.hospitalApiUrl,
      timeout: config.requestTimeoutMs,
    });

    const retryPolicy = new RetryPolicyService({
      maxAttempts: config.maxAttempts,
      baseDelayMs: config.retryBaseDelayMs,
      multiplier: config.retryBackoffMultiplier,
      maxDelayMs: config.retryMaxDelayMs,
      jitterPercent: config.retryJitterPercent,
    });

    // One dispatcher (and so one permit pool) for the whole process
    const dispatcher = new HospitalDispatcher(provider, retryPolicy, {
      maxConcurrency: config.concurrencyLimit,
      rateLimitPerMinute: config.rateLimitPerMinute,
    });

    const bulkService = new BulkHospitalService({
      dispatcher,
      activator: new BatchActivator(provider),
      repository: new InMemoryBatchRepository(),
    });

    const app = await buildApp({
      bulkService,
      provider,
      dispatcher,
      maxFileSizeBytes: config.maxFileSizeBytes,
      maxRows: config.maxRows,
      isAcceptingUploads: () => isAcceptingNewWork,
      logger: config.nodeEnv === 'development' ? {
        transport: {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      } : config.nodeEnv !== 'test',
    });
    fastify = app;

    const gracefulShutdown = createGracefulShutdown({
      timeout: config.shutdownTimeoutMs,
      forceTimeout: config.forceShutdownTimeoutMs,

      onShutdownStart: () => {
        isAcceptingNewWork = false;
      },

      onWaitForQueue: async () => {
        logger.info('Waiting for in-flight batches', { inFlight: bulkService.getInFlightCount() });
        await bulkService.waitForIdle();
      },

      onBeforeExit: async () => {
        await app.close();
      },
    });

    gracefulShutdown.registerHandlers();

    await app.listen({ port: config.port, host: config.host });
    logger.info(`Server running on port ${config.port}`);
  } catch (error) {
    logger.error('Failed to start server', { error });
    if (fastify) {
      await fastify.close();
    }
    process.exit(1);
  }
};

void start();
