import { ErrorCode } from './enums.js';

export interface InvalidCharacterError {
  readonly code: ErrorCode.INVALID_CHARACTER;
  readonly character: string;
  /** Zero-based code point index into the input. */
  readonly index: number;
}

export interface Utf8Fault {
  /** Number of leading bytes that form valid UTF-8. */
  readonly validUpTo: number;
  /** Length of the invalid sequence, or null when the input ends inside a sequence. */
  readonly errorLength: number | null;
}

export interface Utf8FaultDetails extends Utf8Fault {
  readonly bytes: Uint8Array;
}

export interface Utf8ReconstructionError {
  readonly code: ErrorCode.UTF8_RECONSTRUCTION;
  readonly details: Utf8FaultDetails;
}

export type DecodeError = InvalidCharacterError | Utf8ReconstructionError;

export type DecodeResult = { ok: true; value: string } | { ok: false; error: DecodeError };

export type ValidationResult = { ok: true } | { ok: false; error: InvalidCharacterError };
