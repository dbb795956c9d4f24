export { encode } from './percent/encode.js';
export { decode, decodeOrThrow } from './percent/decode.js';
export { validate, isEncoded } from './percent/validate.js';
export { isUnreserved } from './percent/unreserved.js';
export { PercentDecodeError, describeDecodeError } from './percent/errors.js';
export { findUtf8Fault } from './utils/utf8.js';
export { ErrorCode } from './types/enums.js';
export type {
  DecodeError,
  DecodeResult,
  InvalidCharacterError,
  Utf8Fault,
  Utf8FaultDetails,
  Utf8ReconstructionError,
  ValidationResult
} from './types/error.js';
