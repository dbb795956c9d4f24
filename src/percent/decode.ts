import type { DecodeResult } from '../types/error.js';
import { decodeUtf8 } from '../utils/utf8.js';
import { PercentDecodeError, utf8Reconstruction } from './errors.js';
import { isUnreserved } from './unreserved.js';
import { validate } from './validate.js';

function hexToByte(hex: string): number {
  return Number.parseInt(hex, 16);
}

export function decode(text: string): DecodeResult {
  const validation = validate(text);
  if (!validation.ok) {
    return validation;
  }
  const chars = Array.from(text);
  const bytes: number[] = [];
  for (let i = 0; i < chars.length; i += 1) {
    const ch = chars[i];
    if (isUnreserved(ch)) {
      bytes.push(ch.charCodeAt(0));
    } else if (ch === '%') {
      bytes.push(hexToByte(chars[i + 1] + chars[i + 2]));
      i += 2;
    } else {
      // unreachable after a successful validate()
      break;
    }
  }
  const buffer = new Uint8Array(bytes);
  const decoded = decodeUtf8(buffer);
  if (!decoded.ok) {
    return { ok: false, error: utf8Reconstruction(buffer, decoded.fault) };
  }
  return { ok: true, value: decoded.value };
}

export function decodeOrThrow(text: string): string {
  const result = decode(text);
  if (!result.ok) {
    throw new PercentDecodeError(result.error);
  }
  return result.value;
}
