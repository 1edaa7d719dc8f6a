import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import FormData from 'form-data';
import { buildApp } from '../../src/app.js';
import { BulkHospitalService } from '../../src/services/bulk-hospital.service.js';
import { HospitalDispatcher } from '../../src/services/hospital-dispatcher.service.js';
import { BatchActivator } from '../../src/services/batch-activator.service.js';
import { RetryPolicyService } from '../../src/services/retry-policy.service.js';
import { InMemoryBatchRepository } from '../../src/repositories/batch.repository.js';
import { FakeHospitalDirectory, recordingSleep } from '../helpers/fake-hospital-directory.js';

/**
 * Integration Tests - HTTP API
 *
 * Full Fastify app (multipart, routes, swagger) over an in-process hospital directory.
 */

const BATCH_ID = '7c9e6679-7425-40de-944b-e07fc1f90ae7';

interface TestApp {
  app: FastifyInstance;
  provider: FakeHospitalDirectory;
}

async function createTestApp(options: { maxRows?: number; maxFileSizeBytes?: number; accepting?: boolean } = {}): Promise<TestApp> {
  const provider = new FakeHospitalDirectory();
  const retryPolicy = new RetryPolicyService({ sleep: recordingSleep().sleep });
  const dispatcher = new HospitalDispatcher(provider, retryPolicy, { maxConcurrency: 2 });
  const bulkService = new BulkHospitalService({
    dispatcher,
    activator: new BatchActivator(provider),
    repository: new InMemoryBatchRepository(),
    generateBatchId: () => BATCH_ID,
  });

  const app = await buildApp({
    bulkService,
    provider,
    dispatcher,
    maxRows: options.maxRows ?? 20,
    maxFileSizeBytes: options.maxFileSizeBytes ?? 1024 * 1024,
    isAcceptingUploads: () => options.accepting ?? true,
  });

  return { app, provider };
}

function csvUpload(content: string | Buffer, filename = 'hospitals.csv') {
  const form = new FormData();
  form.append('file', typeof content === 'string' ? Buffer.from(content) : content, {
    filename,
    contentType: 'text/csv',
  });
  return { payload: form.getBuffer(), headers: form.getHeaders() };
}

describe('Hospital Routes', () => {
  let app: FastifyInstance;
  let provider: FakeHospitalDirectory;

  beforeEach(async () => {
    ({ app, provider } = await createTestApp({ maxRows: 3, maxFileSizeBytes: 512 }));
  });

  afterEach(async () => {
    await app.close();
  });

  describe('POST /hospitals/bulk', () => {
    it('processes a CSV and returns the per-row summary', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/hospitals/bulk',
        ...csvUpload('name,address,phone\nGeneral,1 Main St,555-0100\nCity,,\n'),
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.batchId).toBe(BATCH_ID);
      expect(body.totalHospitals).toBe(2);
      expect(body.processedHospitals).toBe(2);
      expect(body.failedHospitals).toBe(1);
      expect(body.batchActivated).toBe(true);
      expect(body.activation).toEqual({ status: 'activated', statusCode: 200 });
      expect(body.summary).toEqual({ total: 2, succeeded: 1, validationFailed: 1, createFailed: 0, failed: 1 });
      expect(body.hospitals).toEqual([
        { row: 1, hospitalId: 101, name: 'General', status: 'created_and_activated', outcome: 'created', attempts: 1 },
        {
          row: 2,
          name: 'City',
          status: 'invalid_row_missing_name_or_address',
          outcome: 'validation_failed',
          reason: 'Missing required field: address',
          attempts: 0,
        },
      ]);
      expect(provider.createCalls.map((call) => call.request)).toEqual([
        { name: 'General', address: '1 Main St', phone: '555-0100', creation_batch_id: BATCH_ID },
      ]);
      expect(provider.activateCalls).toEqual([BATCH_ID]);
    });

    it('rejects a request that is not multipart', async () => {
      const response = await app.inject({ method: 'POST', url: '/hospitals/bulk', payload: { name: 'x' } });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: 'Invalid content type',
        message: 'Request must be multipart/form-data with a CSV file',
      });
    });

    it('rejects a multipart request without a file', async () => {
      const form = new FormData();
      form.append('note', 'no file here');

      const response = await app.inject({
        method: 'POST',
        url: '/hospitals/bulk',
        payload: form.getBuffer(),
        headers: form.getHeaders(),
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('No file uploaded');
    });

    it('rejects files that are not CSV', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/hospitals/bulk',
        ...csvUpload('name,address\nA,B\n', 'hospitals.txt'),
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: 'Invalid file type', message: 'Only CSV files are allowed' });
    });

    it('rejects an empty file', async () => {
      const response = await app.inject({ method: 'POST', url: '/hospitals/bulk', ...csvUpload(Buffer.alloc(0)) });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: 'Empty file', message: 'Empty file uploaded' });
    });

    it('rejects a CSV without the required headers', async () => {
      const response = await app.inject({ method: 'POST', url: '/hospitals/bulk', ...csvUpload('title,city\nA,B\n') });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('Missing required headers');
      expect(provider.activateCalls).toHaveLength(0);
    });

    it('rejects more rows than allowed', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/hospitals/bulk',
        ...csvUpload('name,address\nA,1\nB,2\nC,3\nD,4\n'),
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: 'Too many rows', message: 'CSV exceeds maximum allowed rows (3)' });
      expect(provider.createCalls).toHaveLength(0);
    });

    it('rejects files over the size limit', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/hospitals/bulk',
        ...csvUpload(`name,address\n${'A'.repeat(600)},1 Main St\n`),
      });

      expect(response.statusCode).toBe(413);
      expect(response.json().error).toBe('File too large');
    });
  });

  describe('GET /hospitals/bulk/:batchId/status', () => {
    it('returns 404 for an unknown batch', async () => {
      const response = await app.inject({ method: 'GET', url: '/hospitals/bulk/unknown/status' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: 'Batch not found', message: 'No batch found with ID: unknown' });
    });

    it('returns the stored result of a completed batch', async () => {
      await app.inject({ method: 'POST', url: '/hospitals/bulk', ...csvUpload('name,address\nA,1 St\nB,2 St\n') });

      const response = await app.inject({ method: 'GET', url: `/hospitals/bulk/${BATCH_ID}/status` });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.batchId).toBe(BATCH_ID);
      expect(body.status).toBe('COMPLETED');
      expect(body.filename).toBe('hospitals.csv');
      expect(body.total).toBe(2);
      expect(body.processed).toBe(2);
      expect(body.failed).toBe(0);
      expect(body.activated).toBe(true);
      expect(body.resultsSample).toHaveLength(2);
    });
  });

  describe('operational endpoints', () => {
    it('reports health', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.status).toBe('ok');
      expect(body.acceptingUploads).toBe(true);
      expect(body.batches).toEqual({ stored: 0, inFlight: 0 });
      expect(body.hospitalApi.provider).toBe('FakeHospitalDirectory');
      expect(body.dispatcher).toEqual({ maxConcurrent: 2, running: 0, queued: 0, idle: true, maxObservedInFlight: 0 });
    });

    it('exposes Prometheus metrics', async () => {
      const response = await app.inject({ method: 'GET', url: '/metrics' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toContain('text/plain');
      expect(response.body).toContain('# TYPE hospital_rows_total counter');
    });

    it('serves the OpenAPI document', async () => {
      const response = await app.inject({ method: 'GET', url: '/docs/json' });

      expect(response.statusCode).toBe(200);
      const paths = Object.keys(response.json().paths);
      expect(paths).toContain('/hospitals/bulk');
      expect(paths).toContain('/hospitals/bulk/{batchId}/status');
    });
  });
});

describe('Hospital Routes - shutting down', () => {
  it('rejects new uploads with 503', async () => {
    const { app, provider } = await createTestApp({ accepting: false });

    const response = await app.inject({ method: 'POST', url: '/hospitals/bulk', ...csvUpload('name,address\nA,B\n') });

    expect(response.statusCode).toBe(503);
    expect(response.json().error).toBe('Service Unavailable');
    expect(provider.createCalls).toHaveLength(0);
    await app.close();
  });
});
