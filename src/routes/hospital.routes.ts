import type { FastifyPluginAsync } from 'fastify';
import type { BulkHospitalService } from '../services/bulk-hospital.service.js';
import { CsvUploadError, parseHospitalCsv } from '../services/csv.service.js';
import {
  DEFAULT_STATUS_SAMPLE_SIZE,
  toBatchStatusResponse,
  toBulkUploadResponse,
} from '../services/summary-builder.service.js';
import { logger } from '../services/logger.service.js';
import { batchStatusResponseSchema, bulkUploadResponseSchema, errorSchema } from './hospital.schemas.js';

export interface HospitalRoutesOptions {
  bulkService: BulkHospitalService;
  maxRows: number;
  statusSampleSize?: number;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export const hospitalRoutes: FastifyPluginAsync<HospitalRoutesOptions> = async (fastify, options) => {
  const { bulkService, maxRows } = options;
  const sampleSize = options.statusSampleSize ?? DEFAULT_STATUS_SAMPLE_SIZE;

  // POST /hospitals/bulk - Upload and process a hospital CSV
  fastify.post('/hospitals/bulk', {
    schema: {
      description: `Upload a CSV (headers: name,address,phone; at most ${maxRows} rows). ` +
        'Valid rows are created in the hospital directory, then the batch is activated.',
      tags: ['Hospitals'],
      consumes: ['multipart/form-data'],
      response: {
        200: bulkUploadResponseSchema,
        400: { description: 'Bad request - no file, wrong file type or invalid CSV', ...errorSchema },
        413: { description: 'Uploaded file is too large', ...errorSchema },
        500: { description: 'Internal server error', ...errorSchema },
        503: { description: 'Server is shutting down', ...errorSchema },
      },
    },
  }, async (request, reply) => {
    try {
      if (!request.isMultipart()) {
        return reply.code(400).send({
          error: 'Invalid content type',
          message: 'Request must be multipart/form-data with a CSV file',
        });
      }

      const data = await request.file();

      if (!data) {
        return reply.code(400).send({
          error: 'No file uploaded',
          message: 'Please upload a CSV file',
        });
      }

      if (!data.filename.toLowerCase().endsWith('.csv')) {
        return reply.code(400).send({
          error: 'Invalid file type',
          message: 'Only CSV files are allowed',
        });
      }

      let buffer: Buffer;
      try {
        buffer = await data.toBuffer();
      } catch (error) {
        if (hasErrorCode(error, 'FST_REQ_FILE_TOO_LARGE')) {
          return reply.code(413).send({
            error: 'File too large',
            message: 'Uploaded file exceeds the maximum allowed size',
          });
        }
        throw error;
      }

      const rows = parseHospitalCsv(buffer, { maxRows });
      const result = await bulkService.processUpload({ filename: data.filename, rows });

      return reply.code(200).send(toBulkUploadResponse(result));
    } catch (error) {
      if (error instanceof CsvUploadError) {
        return reply.code(400).send({
          error: error.error,
          message: error.message,
        });
      }

      logger.error('Bulk upload failed', { error });
      return reply.code(500).send({
        error: 'Upload failed',
        message: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  // GET /hospitals/bulk/:batchId/status - Get batch status and a sample of row results
  fastify.get<{ Params: { batchId: string } }>(
    '/hospitals/bulk/:batchId/status',
    {
      schema: {
        description: `Get the status of a bulk upload with the first ${sampleSize} row results`,
        tags: ['Hospitals'],
        params: {
          type: 'object',
          properties: {
            batchId: { type: 'string', description: 'Batch ID' },
          },
          required: ['batchId'],
        },
        response: {
          200: batchStatusResponseSchema,
          404: { description: 'Batch not found', ...errorSchema },
        },
      },
    },
    async (request, reply) => {
      const { batchId } = request.params;
      const record = await bulkService.getBatch(batchId);

      if (!record) {
        return reply.code(404).send({
          error: 'Batch not found',
          message: `No batch found with ID: ${batchId}`,
        });
      }

      return toBatchStatusResponse(record, sampleSize);
    }
  );
};
