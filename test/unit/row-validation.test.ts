import { describe, it, expect } from 'vitest';
import { rowValidationService } from '../../src/services/row-validation.service.js';
import { RowInvalidReason } from '../../src/types/validation.types.js';

const row = (fields: Record<string, string>, n = 1) => ({ row: n, fields });

describe('Row Validation', () => {
  it('accepts a row with name, address and phone', () => {
    const result = rowValidationService.validateRow(
      row({ name: ' General Hospital ', address: ' 1 Main St ', phone: '555-0100' }, 3)
    );

    expect(result).toEqual({
      isValid: true,
      record: { row: 3, name: 'General Hospital', address: '1 Main St', phone: '555-0100' },
    });
  });

  it('omits phone from the record when it is blank', () => {
    const result = rowValidationService.validateRow(row({ name: 'A', address: 'B', phone: '   ' }));

    expect(result).toEqual({ isValid: true, record: { row: 1, name: 'A', address: 'B' } });
  });

  it('accepts a row without a phone column', () => {
    const result = rowValidationService.validateRow(row({ name: 'A', address: 'B' }));

    expect(result.isValid).toBe(true);
  });

  it('rejects a missing name', () => {
    const result = rowValidationService.validateRow(row({ name: '', address: 'B' }));

    expect(result).toEqual({
      isValid: false,
      reason: RowInvalidReason.MISSING_NAME_OR_ADDRESS,
      details: 'Missing required field: name',
    });
  });

  it('rejects a whitespace-only address', () => {
    const result = rowValidationService.validateRow(row({ name: 'A', address: '  ' }));

    expect(result).toEqual({
      isValid: false,
      reason: RowInvalidReason.MISSING_NAME_OR_ADDRESS,
      details: 'Missing required field: address',
    });
  });

  it('names both fields when both are missing', () => {
    const result = rowValidationService.validateRow(row({}));

    expect(result).toEqual({
      isValid: false,
      reason: RowInvalidReason.MISSING_NAME_OR_ADDRESS,
      details: 'Missing required field: name and address',
    });
  });

  it('checks required fields before the phone format', () => {
    const result = rowValidationService.validateRow(row({ name: '', address: 'B', phone: 'abc' }));

    expect(result.isValid).toBe(false);
    if (!result.isValid) {
      expect(result.reason).toBe(RowInvalidReason.MISSING_NAME_OR_ADDRESS);
    }
  });

  it('rejects a malformed phone', () => {
    const result = rowValidationService.validateRow(row({ name: 'A', address: 'B', phone: 'abc' }));

    expect(result).toEqual({
      isValid: false,
      reason: RowInvalidReason.INVALID_PHONE_FORMAT,
      details: 'Invalid phone format: abc',
    });
  });

  describe('phone format', () => {
    it.each(['+1 555 0100', '555-0100', '1234', '+44 20 7946 0000'])('accepts %s', (phone) => {
      expect(rowValidationService.isValidPhone(phone)).toBe(true);
    });

    it.each(['abc', '123', '+', '-1234', '555.0100', '12a4'])('rejects %s', (phone) => {
      expect(rowValidationService.isValidPhone(phone)).toBe(false);
    });
  });
});
