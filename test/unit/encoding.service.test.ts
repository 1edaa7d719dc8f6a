import { describe, it, expect } from 'vitest';
import { decodeBuffer, detectEncoding } from '../../src/services/encoding.service.js';

describe('Encoding Service', () => {
  it('detects plain UTF-8', () => {
    expect(detectEncoding(Buffer.from('name,address\nCafé,Rua 1\n', 'utf-8'))).toBe('utf-8');
  });

  it('detects a UTF-8 BOM and drops it when decoding', () => {
    const buffer = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('name')]);

    expect(detectEncoding(buffer)).toBe('utf-8-bom');
    expect(decodeBuffer(buffer)).toEqual({ text: 'name', encoding: 'utf-8-bom' });
  });

  it('keeps valid UTF-8 that contains a literal replacement character', () => {
    const buffer = Buffer.from('São Paulo \ufffd', 'utf-8');

    expect(decodeBuffer(buffer)).toEqual({ text: 'São Paulo \ufffd', encoding: 'utf-8' });
  });

  it('falls back to Latin-1 for invalid UTF-8', () => {
    const buffer = Buffer.from([0x43, 0x61, 0x66, 0xe9]); // "Café" in Latin-1

    expect(decodeBuffer(buffer)).toEqual({ text: 'Café', encoding: 'iso-8859-1' });
  });
});
