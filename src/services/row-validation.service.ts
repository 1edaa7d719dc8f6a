import { RowInvalidReason, type RowValidationResult } from '../types/validation.types.js';
import type { HospitalCsvRow } from '../types/csv.types.js';
import type { HospitalRecord } from '../types/hospital.types.js';

/**
 * Optional leading +, a digit, then at least three more digits, dashes or spaces
 */
export const PHONE_PATTERN = /^\+?\d[\d\-\s]{3,}$/;

/**
 * Row validation service
 *
 * Rules:
 * 1. name and address are required (non-empty after trimming)
 * 2. phone is optional, but must match PHONE_PATTERN when present
 *
 * Malformed rows are an expected condition: this never throws.
 */
class RowValidationService {
  validateRow(row: HospitalCsvRow): RowValidationResult {
    const name = (row.fields.name ?? '').trim();
    const address = (row.fields.address ?? '').trim();
    const phone = (row.fields.phone ?? '').trim();

    if (!name || !address) {
      const missing = [!name && 'name', !address && 'address'].filter(Boolean).join(' and ');
      return {
        isValid: false,
        reason: RowInvalidReason.MISSING_NAME_OR_ADDRESS,
        details: `Missing required field: ${missing}`,
      };
    }

    if (phone && !this.isValidPhone(phone)) {
      return {
        isValid: false,
        reason: RowInvalidReason.INVALID_PHONE_FORMAT,
        details: `Invalid phone format: ${phone}`,
      };
    }

    const record: HospitalRecord = phone
      ? { row: row.row, name, address, phone }
      : { row: row.row, name, address };

    return { isValid: true, record };
  }

  isValidPhone(phone: string): boolean {
    return PHONE_PATTERN.test(phone);
  }
}

export const rowValidationService = new RowValidationService();
