import { CsvError } from 'csv-parse';
import { parse } from 'csv-parse/sync';
import { decodeBuffer } from './encoding.service.js';
import { logger } from './logger.service.js';
import type { CsvParseOptions, HospitalCsvRow } from '../types/csv.types.js';

const DEFAULT_REQUIRED_HEADERS = ['name', 'address'] as const;

/**
 * Upload rejected before any row is processed (HTTP 400)
 */
export class CsvUploadError extends Error {
  constructor(
    public readonly error: string,
    message: string
  ) {
    super(message);
    this.name = 'CsvUploadError';
  }
}

/**
 * Normalizes a header cell: trimmed and lower-cased
 */
export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase();
}

/**
 * Parses an uploaded hospital CSV into rows keyed by normalized header
 *
 * Expected headers (case-insensitive): name,address,phone (phone optional).
 * Rejects empty uploads, missing required headers, malformed CSV and
 * files with more than `maxRows` data rows.
 *
 * @param buffer - Raw uploaded file
 * @param options - Parse options
 * @returns Data rows in file order, numbered from 1
 */
export function parseHospitalCsv(buffer: Buffer, options: CsvParseOptions): HospitalCsvRow[] {
  if (buffer.length === 0) {
    throw new CsvUploadError('Empty file', 'Empty file uploaded');
  }

  const { text, encoding } = decodeBuffer(buffer);
  logger.debug(`Detected encoding: ${encoding}`, { bytes: buffer.length });

  let records: string[][];
  try {
    records = parse(text, {
      skip_empty_lines: true,
      trim: true,
      delimiter: options.delimiter ?? ',',
      relax_column_count: true,
      bom: true,
    });
  } catch (error) {
    if (error instanceof CsvError) {
      throw new CsvUploadError('Malformed CSV', `CSV parsing error: ${error.message}`);
    }
    throw error;
  }

  const [headerRow, ...dataRows] = records;
  const headers = (headerRow ?? []).map(normalizeHeader);
  const required = options.requiredHeaders ?? DEFAULT_REQUIRED_HEADERS;
  const missing = required.filter((header) => !headers.includes(header));

  if (headers.length === 0 || missing.length > 0) {
    throw new CsvUploadError(
      'Missing required headers',
      'CSV must include headers: name,address,phone (phone optional)'
    );
  }

  if (dataRows.length > options.maxRows) {
    throw new CsvUploadError(
      'Too many rows',
      `CSV exceeds maximum allowed rows (${options.maxRows})`
    );
  }

  return dataRows.map((cells, index) => {
    const fields: Record<string, string> = {};
    headers.forEach((header, column) => {
      // First occurrence wins for duplicated headers
      if (!(header in fields)) {
        fields[header] = cells[column] ?? '';
      }
    });
    return { row: index + 1, fields };
  });
}
