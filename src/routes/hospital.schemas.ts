/**
 * JSON schemas for the bulk hospital endpoints
 *
 * Every property the handlers return is declared: the response serializer
 * drops anything a schema does not list.
 */

export const errorSchema = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    message: { type: 'string' },
  },
} as const;

export const batchSummarySchema = {
  type: 'object',
  properties: {
    total: { type: 'integer' },
    succeeded: { type: 'integer' },
    validationFailed: { type: 'integer' },
    createFailed: { type: 'integer' },
    failed: { type: 'integer' },
  },
} as const;

export const hospitalRowResultSchema = {
  type: 'object',
  properties: {
    row: { type: 'integer', description: '1-based CSV data row' },
    hospitalId: { type: 'integer' },
    name: { type: 'string' },
    status: { type: 'string', description: 'e.g. created_and_activated, invalid_phone_format, create_failed_400' },
    outcome: { type: 'string', enum: ['created', 'validation_failed', 'create_failed'] },
    reason: { type: 'string' },
    statusCode: { type: 'integer' },
    attempts: { type: 'integer' },
  },
} as const;

export const bulkUploadResponseSchema = {
  description: 'Batch processed (individual rows may still have failed)',
  type: 'object',
  properties: {
    batchId: { type: 'string', format: 'uuid' },
    totalHospitals: { type: 'integer' },
    processedHospitals: { type: 'integer' },
    failedHospitals: { type: 'integer' },
    processingTimeSeconds: { type: 'number' },
    batchActivated: { type: 'boolean' },
    activation: {
      type: 'object',
      properties: {
        status: { type: 'string', enum: ['activated', 'activation_failed'] },
        statusCode: { type: 'integer' },
        reason: { type: 'string' },
      },
    },
    summary: batchSummarySchema,
    hospitals: {
      type: 'array',
      items: hospitalRowResultSchema,
    },
  },
} as const;

export const batchStatusResponseSchema = {
  description: 'Batch status retrieved successfully',
  type: 'object',
  properties: {
    batchId: { type: 'string' },
    status: { type: 'string', enum: ['PROCESSING', 'COMPLETED'] },
    filename: { type: 'string' },
    total: { type: 'integer' },
    processed: { type: 'integer' },
    failed: { type: 'integer' },
    activated: { type: 'boolean' },
    createdAt: { type: 'string', format: 'date-time' },
    updatedAt: { type: 'string', format: 'date-time' },
    resultsSample: {
      type: 'array',
      items: hospitalRowResultSchema,
    },
  },
} as const;
