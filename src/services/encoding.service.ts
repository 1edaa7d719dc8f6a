export type Encoding = 'utf-8' | 'utf-8-bom' | 'iso-8859-1';

export interface DecodedText {
  text: string;
  encoding: Encoding;
}

const UTF8_BOM = [0xef, 0xbb, 0xbf];

function hasUtf8Bom(buffer: Buffer): boolean {
  return buffer.length >= 3 && UTF8_BOM.every((byte, index) => buffer[index] === byte);
}

// Throws on the first malformed sequence instead of substituting U+FFFD
const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

function isValidUtf8(buffer: Buffer): boolean {
  try {
    strictUtf8.decode(buffer);
    return true;
  } catch {
    return false;
  }
}

/**
 * Detects the encoding of an uploaded file by checking for a BOM and validating UTF-8
 * @param buffer - File contents
 * @returns Detected encoding
 */
export function detectEncoding(buffer: Buffer): Encoding {
  if (hasUtf8Bom(buffer)) {
    return 'utf-8-bom';
  }

  return isValidUtf8(buffer) ? 'utf-8' : 'iso-8859-1';
}

/**
 * Decodes an uploaded file to text, dropping the UTF-8 BOM and
 * falling back to Latin-1 for bytes that are not valid UTF-8
 */
export function decodeBuffer(buffer: Buffer): DecodedText {
  const encoding = detectEncoding(buffer);

  switch (encoding) {
    case 'utf-8-bom':
      return { text: buffer.subarray(3).toString('utf-8'), encoding };
    case 'iso-8859-1':
      return { text: buffer.toString('latin1'), encoding };
    default:
      return { text: buffer.toString('utf-8'), encoding };
  }
}
