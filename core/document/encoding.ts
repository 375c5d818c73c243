/**
 * Charset detection and decoding for document content.
 *
 * Detection strategy:
 * 1. Byte order mark
 * 2. Heuristic scan of the first 8KB
 * 3. UTF-8 when the scan is clean, Latin-1 otherwise
 */

export type Charset = 'utf-8' | 'utf-16le' | 'utf-16be' | 'iso-8859-1';

export interface CharsetDetectionResult {
  charset: Charset;
  hasBOM: boolean;
}

/** Short names shown in the buffer list charset column. */
const CHARSET_DISPLAY_NAMES: Record<Charset, string> = {
  'utf-8': 'utf8',
  'utf-16le': 'ucs2le',
  'utf-16be': 'ucs2be',
  'iso-8859-1': '8859-1',
};

export function charsetDisplayName(charset: Charset): string {
  return CHARSET_DISPLAY_NAMES[charset];
}

export function detectCharset(bytes: Uint8Array): CharsetDetectionResult {
  if (bytes.length >= 3 && bytes[0] === 0xEF && bytes[1] === 0xBB && bytes[2] === 0xBF) {
    return { charset: 'utf-8', hasBOM: true };
  }
  if (bytes.length >= 2 && bytes[0] === 0xFF && bytes[1] === 0xFE) {
    return { charset: 'utf-16le', hasBOM: true };
  }
  if (bytes.length >= 2 && bytes[0] === 0xFE && bytes[1] === 0xFF) {
    return { charset: 'utf-16be', hasBOM: true };
  }

  const scanLength = Math.min(bytes.length, 8192);

  // Zero bytes concentrated on one parity suggest UTF-16 without BOM
  let evenZeros = 0;
  let oddZeros = 0;
  for (let i = 0; i < scanLength; i++) {
    if (bytes[i] !== 0) continue;
    if (i % 2 === 0) evenZeros++;
    else oddZeros++;
  }
  if (evenZeros + oddZeros > scanLength * 0.1) {
    if (oddZeros > evenZeros * 2) return { charset: 'utf-16le', hasBOM: false };
    if (evenZeros > oddZeros * 2) return { charset: 'utf-16be', hasBOM: false };
  }

  if (isValidUtf8(bytes, scanLength)) {
    return { charset: 'utf-8', hasBOM: false };
  }
  return { charset: 'iso-8859-1', hasBOM: false };
}

function continuationBytes(lead: number): number {
  if (lead < 0x80) return 0;
  if ((lead & 0xE0) === 0xC0) return 1;
  if ((lead & 0xF0) === 0xE0) return 2;
  if ((lead & 0xF8) === 0xF0) return 3;
  return -1;
}

function isValidUtf8(bytes: Uint8Array, length: number): boolean {
  let i = 0;
  while (i < length) {
    const extra = continuationBytes(bytes[i]);
    if (extra < 0) return false;
    // A sequence cut off by the scan window is not evidence either way
    if (i + extra >= length) break;
    for (let k = 1; k <= extra; k++) {
      if ((bytes[i + k] & 0xC0) !== 0x80) return false;
    }
    i += extra + 1;
  }
  return true;
}

/** Decode bytes, stripping a BOM when one was detected. */
export function decodeBytes(bytes: Uint8Array, charset: Charset, hasBOM: boolean): string {
  let data = bytes;
  if (hasBOM) data = bytes.subarray(charset === 'utf-8' ? 3 : 2);
  return new TextDecoder(charset).decode(data);
}
