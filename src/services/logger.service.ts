/**
 * Structured Logger Service
 *
 * Provides structured JSON logging with required fields for observability.
 *
 * Fields per event (when applicable):
 * - timestamp: ISO 8601 timestamp
 * - level: log level (info, warn, error, debug)
 * - batchId: batch identifier
 * - row: 1-based CSV data row
 * - status: current status (CREATING, CREATED, FAILED, etc.)
 * - attempts: number of attempts
 * - http_status: HTTP status code from the hospital directory API
 * - error_code: error category or transport error code
 * - message: human-readable message
 */

import pino from 'pino';
import { config } from '../config/env.js';

/**
 * Log context for batch events
 */
export interface BatchLogContext {
  batchId?: string;
  row?: number;
  name?: string;
  status?: string;
  attempts?: number;
  http_status?: number;
  error_code?: string;
  duration?: number;
  [key: string]: unknown;
}

/**
 * Create base logger instance
 */
const baseLogger = pino({
  level: config.logLevel,

  // Format options
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },

  // Base fields included in every log
  base: {
    service: 'hospital-bulk-processor',
    environment: config.nodeEnv,
  },

  // Timestamp in ISO 8601 format
  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

  // Pretty print in development
  transport: config.nodeEnv === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,
});

function describeError(error: unknown): { error?: string; stack?: string } {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  if (error === undefined) {
    return {};
  }
  return { error: String(error) };
}

/**
 * Structured Logger
 */
export class StructuredLogger {
  private logger: pino.Logger;

  constructor(logger: pino.Logger = baseLogger) {
    this.logger = logger;
  }

  /**
   * Logs batch upload event
   */
  batchUploaded(context: BatchLogContext & { filename: string; totalRows: number }) {
    this.logger.info({
      event: 'batch.uploaded',
      batchId: context.batchId,
      filename: context.filename,
      totalRows: context.totalRows,
      status: 'PROCESSING',
      message: `Batch uploaded: ${context.filename} (${context.totalRows} rows)`,
    });
  }

  /**
   * Logs a row rejected by validation
   */
  rowInvalid(context: BatchLogContext & { reason: string; details: string }) {
    this.logger.debug({
      event: 'row.invalid',
      batchId: context.batchId,
      row: context.row,
      reason: context.reason,
      message: `Row ${context.row} invalid (${context.reason}): ${context.details}`,
    });
  }

  /**
   * Logs hospital create attempt
   */
  hospitalCreating(context: BatchLogContext) {
    this.logger.debug({
      event: 'hospital.creating',
      batchId: context.batchId,
      row: context.row,
      status: 'CREATING',
      attempts: context.attempts ?? 1,
      message: `Creating hospital for row ${context.row} (attempt ${context.attempts ?? 1})`,
    });
  }

  /**
   * Logs successful hospital creation
   */
  hospitalCreated(context: BatchLogContext & { hospitalId?: number }) {
    this.logger.info({
      event: 'hospital.created',
      batchId: context.batchId,
      row: context.row,
      status: 'CREATED',
      attempts: context.attempts,
      http_status: context.http_status,
      hospitalId: context.hospitalId,
      duration: context.duration,
      message: `Hospital created for row ${context.row} (id: ${context.hospitalId ?? 'n/a'})`,
    });
  }

  /**
   * Logs failed create attempt that will be retried
   */
  hospitalCreateRetry(context: BatchLogContext & { error: string; delayMs: number }) {
    this.logger.warn({
      event: 'hospital.create_retry',
      batchId: context.batchId,
      row: context.row,
      status: 'RETRYING',
      attempts: context.attempts,
      http_status: context.http_status,
      error_code: context.error_code,
      error: context.error,
      delayMs: context.delayMs,
      message: `Create failed for row ${context.row} (attempt ${context.attempts}), retrying in ${context.delayMs}ms - ${context.error}`,
    });
  }

  /**
   * Logs permanent create failure
   */
  hospitalCreateFailed(context: BatchLogContext & { error: string }) {
    this.logger.error({
      event: 'hospital.create_failed',
      batchId: context.batchId,
      row: context.row,
      status: 'FAILED',
      attempts: context.attempts,
      http_status: context.http_status,
      error_code: context.error_code,
      error: context.error,
      message: `Create failed for row ${context.row} after ${context.attempts} attempt(s) - ${context.error}`,
    });
  }

  /**
   * Logs batch activation result
   */
  batchActivation(context: BatchLogContext & { success: boolean; error?: string }) {
    if (context.success) {
      this.logger.info({
        event: 'batch.activated',
        batchId: context.batchId,
        status: 'ACTIVATED',
        http_status: context.http_status,
        message: `Batch ${context.batchId} activated`,
      });
    } else {
      this.logger.error({
        event: 'batch.activation_failed',
        batchId: context.batchId,
        status: 'ACTIVATION_FAILED',
        http_status: context.http_status,
        error: context.error,
        message: `Batch ${context.batchId} activation failed: ${context.error}`,
      });
    }
  }

  /**
   * Logs batch completion
   */
  batchCompleted(context: BatchLogContext & { total: number; succeeded: number; failed: number; activated: boolean }) {
    this.logger.info({
      event: 'batch.completed',
      batchId: context.batchId,
      status: 'COMPLETED',
      total: context.total,
      succeeded: context.succeeded,
      failed: context.failed,
      activated: context.activated,
      duration: context.duration,
      message: `Batch ${context.batchId} completed: ${context.succeeded}/${context.total} created, activated=${context.activated}`,
    });
  }

  /**
   * Logs graceful shutdown
   */
  shutdownStarted(context: { signal: string }) {
    this.logger.warn({
      event: 'shutdown.started',
      signal: context.signal,
      message: `Graceful shutdown initiated (${context.signal})`,
    });
  }

  /**
   * Logs shutdown completion
   */
  shutdownCompleted(context: { duration: number }) {
    this.logger.info({
      event: 'shutdown.completed',
      duration: context.duration,
      message: `Graceful shutdown completed (${context.duration}ms)`,
    });
  }

  /**
   * Generic info log
   */
  info(message: string, context?: BatchLogContext) {
    this.logger.info({ ...context, message });
  }

  /**
   * Generic warn log
   */
  warn(message: string, context?: BatchLogContext) {
    this.logger.warn({ ...context, message });
  }

  /**
   * Generic error log
   */
  error(message: string, context?: BatchLogContext & { error?: unknown }) {
    this.logger.error({
      ...context,
      ...describeError(context?.error),
      message,
    });
  }

  /**
   * Generic debug log
   */
  debug(message: string, context?: BatchLogContext) {
    this.logger.debug({ ...context, message });
  }
}

/**
 * Global logger instance
 */
export const logger = new StructuredLogger();
