export interface CsvParseOptions {
  maxRows: number;
  requiredHeaders?: readonly string[];
  delimiter?: string;
}

/**
 * One CSV data line, keyed by normalized header name
 */
export interface HospitalCsvRow {
  /** 1-based position among the data rows (header excluded) */
  row: number;
  fields: Record<string, string>;
}
