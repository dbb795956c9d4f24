import type { InvalidCharacterError, ValidationResult } from '../types/error.js';
import { invalidCharacter } from './errors.js';
import { isHexDigit, isUnreserved } from './unreserved.js';

// A truncated triplet is reported at its '%', not where the digit was expected.
function checkTriplet(chars: string[], percentIndex: number): InvalidCharacterError | null {
  for (let offset = 1; offset <= 2; offset += 1) {
    const index = percentIndex + offset;
    if (index >= chars.length) {
      return invalidCharacter('%', percentIndex);
    }
    if (!isHexDigit(chars[index])) {
      return invalidCharacter(chars[index], index);
    }
  }
  return null;
}

/**
 * Checks that `text` holds only unreserved characters and `%XX` triplets.
 * Stops at the first offending character; indices count code points.
 */
export function validate(text: string): ValidationResult {
  const chars = Array.from(text);
  for (let i = 0; i < chars.length; i += 1) {
    const ch = chars[i];
    if (isUnreserved(ch)) {
      continue;
    }
    if (ch === '%') {
      const error = checkTriplet(chars, i);
      if (error) {
        return { ok: false, error };
      }
      i += 2;
      continue;
    }
    return { ok: false, error: invalidCharacter(ch, i) };
  }
  return { ok: true };
}

export function isEncoded(text: string): boolean {
  return validate(text).ok;
}
