export enum ErrorCode {
  INVALID_CHARACTER = 'INVALID_CHARACTER',
  UTF8_RECONSTRUCTION = 'UTF8_RECONSTRUCTION'
}
