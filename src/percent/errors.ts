import { ErrorCode } from '../types/enums.js';
import type {
  DecodeError,
  InvalidCharacterError,
  Utf8Fault,
  Utf8ReconstructionError
} from '../types/error.js';

export function invalidCharacter(character: string, index: number): InvalidCharacterError {
  const error: InvalidCharacterError = { code: ErrorCode.INVALID_CHARACTER, character, index };
  return Object.freeze(error);
}

export function utf8Reconstruction(bytes: Uint8Array, fault: Utf8Fault): Utf8ReconstructionError {
  const details = Object.freeze({ bytes, validUpTo: fault.validUpTo, errorLength: fault.errorLength });
  const error: Utf8ReconstructionError = { code: ErrorCode.UTF8_RECONSTRUCTION, details };
  return Object.freeze(error);
}

export function describeDecodeError(error: DecodeError): string {
  switch (error.code) {
    case ErrorCode.INVALID_CHARACTER:
      return `Invalid character ${JSON.stringify(error.character)} at index ${error.index}`;
    case ErrorCode.UTF8_RECONSTRUCTION:
      if (error.details.errorLength === null) {
        return `Incomplete UTF-8 sequence at byte ${error.details.validUpTo}`;
      }
      return `Invalid UTF-8 sequence at byte ${error.details.validUpTo}`;
  }
}

export class PercentDecodeError extends Error {
  readonly code: ErrorCode;
  readonly error: DecodeError;

  constructor(error: DecodeError) {
    super(describeDecodeError(error));
    this.code = error.code;
    this.error = error;
  }
}
