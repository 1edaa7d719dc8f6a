import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import multipart from '@fastify/multipart';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { hospitalRoutes } from './routes/hospital.routes.js';
import type { BulkHospitalService } from './services/bulk-hospital.service.js';
import type { HospitalDispatcher } from './services/hospital-dispatcher.service.js';
import type { IHospitalDirectoryProvider } from './providers/hospital-directory.provider.interface.js';
import { metrics } from './services/metrics.service.js';
import { logger } from './services/logger.service.js';

export interface AppOptions {
  bulkService: BulkHospitalService;
  provider: IHospitalDirectoryProvider;
  dispatcher?: HospitalDispatcher;
  maxFileSizeBytes: number;
  maxRows: number;
  /** Returns false once shutdown has started: new uploads get 503 */
  isAcceptingUploads?: () => boolean;
  enableDocs?: boolean;
  logger?: FastifyServerOptions['logger'];
}

/**
 * Builds the Fastify application (plugins, hooks, routes) without listening
 */
export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const { bulkService, provider, dispatcher } = options;
  const isAcceptingUploads = options.isAcceptingUploads ?? (() => true);

  const fastify = Fastify({ logger: options.logger ?? false });

  // 1. Multipart plugin (needed by the upload route)
  await fastify.register(multipart, {
    limits: {
      fileSize: options.maxFileSizeBytes,
      files: 1,
    },
  });

  // 2. Swagger before the routes so it collects their schemas
  if (options.enableDocs ?? true) {
    await fastify.register(swagger, {
      openapi: {
        info: {
          title: 'Hospital Bulk Processor API',
          description: 'REST API for bulk hospital creation from CSV uploads with bounded concurrency and retry logic',
          version: '1.0.0',
          license: {
            name: 'ISC',
            url: 'https://opensource.org/licenses/ISC',
          },
        },
        servers: [
          {
            url: 'http://localhost:3000',
            description: 'Development server',
          },
        ],
        tags: [
          { name: 'Hospitals', description: 'Bulk hospital operations' },
          { name: 'Health', description: 'Health and monitoring endpoints' },
        ],
      },
    });
  }

  // 3. Hooks
  fastify.addHook('onResponse', async (request, reply) => {
    const route = request.routeOptions.url ?? request.url;
    metrics.recordApiRequest(request.method, route, reply.statusCode, reply.elapsedTime / 1000);
  });

  // Reject new uploads during shutdown
  fastify.addHook('onRequest', async (request, reply) => {
    if (!isAcceptingUploads() && request.method === 'POST' && request.url.startsWith('/hospitals/bulk')) {
      return reply.code(503).send({
        error: 'Service Unavailable',
        message: 'Server is shutting down. Not accepting new uploads.',
      });
    }
  });

  // 4. Application routes
  await fastify.register(hospitalRoutes, { bulkService, maxRows: options.maxRows });

  // Health check endpoint
  fastify.get('/health', {
    schema: {
      description: 'Health check endpoint - batch store and hospital directory client state',
      tags: ['Health'],
      response: {
        200: {
          description: 'Service is healthy',
          type: 'object',
          properties: {
            status: { type: 'string' },
            timestamp: { type: 'string', format: 'date-time' },
            acceptingUploads: { type: 'boolean' },
            batches: {
              type: 'object',
              properties: {
                stored: { type: 'integer' },
                inFlight: { type: 'integer' },
              },
            },
            hospitalApi: {
              type: 'object',
              properties: {
                provider: { type: 'string' },
                totalRequests: { type: 'integer' },
                successfulRequests: { type: 'integer' },
                failedRequests: { type: 'integer' },
                lastRequestAt: { type: 'string', format: 'date-time', nullable: true },
              },
            },
            dispatcher: {
              type: 'object',
              nullable: true,
              properties: {
                maxConcurrent: { type: 'integer' },
                running: { type: 'integer' },
                queued: { type: 'integer' },
                idle: { type: 'boolean' },
                maxObservedInFlight: { type: 'integer' },
              },
            },
          },
        },
      },
    },
  }, async () => {
    const apiMetrics = provider.getMetrics();
    const limiter = dispatcher?.getLimiterMetrics();

    return {
      status: isAcceptingUploads() ? 'ok' : 'shutting_down',
      timestamp: new Date().toISOString(),
      acceptingUploads: isAcceptingUploads(),
      batches: {
        stored: await bulkService.countBatches(),
        inFlight: bulkService.getInFlightCount(),
      },
      hospitalApi: {
        provider: provider.getName(),
        totalRequests: apiMetrics.totalRequests,
        successfulRequests: apiMetrics.successfulRequests,
        failedRequests: apiMetrics.failedRequests,
        lastRequestAt: apiMetrics.lastRequestAt !== null ? new Date(apiMetrics.lastRequestAt).toISOString() : null,
      },
      dispatcher: dispatcher && limiter
        ? {
          maxConcurrent: limiter.maxConcurrent,
          running: limiter.running,
          queued: limiter.queued,
          idle: limiter.idle,
          maxObservedInFlight: dispatcher.getMetrics().maxObservedInFlight,
        }
        : null,
    };
  });

  // Metrics endpoint
  fastify.get('/metrics', {
    schema: {
      description: 'Prometheus metrics endpoint - returns metrics in Prometheus text format',
      tags: ['Health'],
      response: {
        200: {
          description: 'Prometheus metrics',
          type: 'string',
        },
        500: {
          description: 'Failed to generate metrics',
          type: 'object',
          properties: {
            error: { type: 'string' },
          },
        },
      },
    },
  }, async (_request, reply) => {
    try {
      const metricsOutput = await metrics.getMetrics();
      reply.type(metrics.getContentType());
      return metricsOutput;
    } catch (error) {
      logger.error('Failed to generate metrics', { error });
      reply.code(500);
      return { error: 'Failed to generate metrics' };
    }
  });

  // 5. Swagger UI
  if (options.enableDocs ?? true) {
    await fastify.register(swaggerUi, {
      routePrefix: '/docs',
      uiConfig: {
        docExpansion: 'list',
        deepLinking: true,
        displayRequestDuration: true,
        filter: true,
      },
      staticCSP: true,
    });
  }

  await fastify.ready();
  return fastify;
}
