export type ValidationErrorCode =
  | 'TOO_SHORT'
  | 'TOO_LONG'
  | 'NON_DIGIT_CHARACTER'
  | 'INVALID_CALENDAR_DATE'
  | 'UNKNOWN_REGION_CODE'
  | 'CHECKSUM_MISMATCH'
  | 'INVALID_GENDER_MARKER'
  | 'LENGTH_MISMATCH'
  | 'UNRECOGNIZED_FORMAT';

export class IdCardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised by the low-level digit and checksum helpers. The validators catch it
 * and report `code` instead of letting it escape.
 */
export class MalformedInputError extends IdCardError {
  constructor(
    readonly code: ValidationErrorCode,
    message: string,
  ) {
    super(message);
  }
}

export class UpgradeError extends IdCardError {}

export class GenerateFakeIdError extends IdCardError {}
