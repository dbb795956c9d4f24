import type { Utf8Fault } from '../types/error.js';

export function utf8Bytes(value: string): Uint8Array {
  return new TextEncoder().encode(value);
}

// Well-formed byte sequences, Unicode 15 table 3-7. Only the second byte has a
// lead-dependent range; later continuation bytes are always 80..BF.
function secondByteRange(lead: number): [number, number] {
  if (lead === 0xe0) return [0xa0, 0xbf];
  if (lead === 0xed) return [0x80, 0x9f];
  if (lead === 0xf0) return [0x90, 0xbf];
  if (lead === 0xf4) return [0x80, 0x8f];
  return [0x80, 0xbf];
}

function sequenceWidth(lead: number): number {
  if (lead < 0x80) return 1;
  if (lead >= 0xc2 && lead <= 0xdf) return 2;
  if (lead >= 0xe0 && lead <= 0xef) return 3;
  if (lead >= 0xf0 && lead <= 0xf4) return 4;
  return 0;
}

export function findUtf8Fault(bytes: Uint8Array): Utf8Fault | null {
  let i = 0;
  while (i < bytes.length) {
    const lead = bytes[i];
    const width = sequenceWidth(lead);
    if (width === 0) {
      return { validUpTo: i, errorLength: 1 };
    }
    for (let k = 1; k < width; k += 1) {
      if (i + k >= bytes.length) {
        return { validUpTo: i, errorLength: null };
      }
      const [min, max] = k === 1 ? secondByteRange(lead) : [0x80, 0xbf];
      const byte = bytes[i + k];
      if (byte < min || byte > max) {
        return { validUpTo: i, errorLength: k };
      }
    }
    i += width;
  }
  return null;
}

export type Utf8DecodeResult = { ok: true; value: string } | { ok: false; fault: Utf8Fault };

export function decodeUtf8(bytes: Uint8Array): Utf8DecodeResult {
  const fault = findUtf8Fault(bytes);
  if (fault) {
    return { ok: false, fault };
  }
  // ignoreBOM keeps a leading U+FEFF in the output
  return { ok: true, value: new TextDecoder('utf-8', { ignoreBOM: true }).decode(bytes) };
}
