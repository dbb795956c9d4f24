import { utf8Bytes } from '../utils/utf8.js';
import { isUnreservedCode } from './unreserved.js';

function toUpperHex(byte: number): string {
  return byte.toString(16).toUpperCase().padStart(2, '0');
}

export function encode(text: string): string {
  let out = '';
  for (const byte of utf8Bytes(text)) {
    if (isUnreservedCode(byte)) {
      out += String.fromCharCode(byte);
    } else {
      out += `%${toUpperHex(byte)}`;
    }
  }
  return out;
}
