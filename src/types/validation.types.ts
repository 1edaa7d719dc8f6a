/**
 * Row validation types and enums
 */

import type { HospitalRecord } from './hospital.types.js';

/**
 * Reasons why a CSV row is rejected before reaching the external API
 */
export enum RowInvalidReason {
  MISSING_NAME_OR_ADDRESS = 'missing_name_or_address',
  INVALID_PHONE_FORMAT = 'invalid_phone_format',
}

export type RowValidationResult =
  | { isValid: true; record: HospitalRecord }
  | { isValid: false; reason: RowInvalidReason; details: string };
