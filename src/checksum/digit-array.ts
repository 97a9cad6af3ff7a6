import { MalformedInputError } from '../common/errors';

export function isDigits(value: string): boolean {
  return /^[0-9]+$/.test(value);
}

/** Converts a numeric string into its digit values, keeping the input order. */
export function toDigitArray(value: string): number[] {
  if (!isDigits(value)) {
    throw new MalformedInputError(
      'NON_DIGIT_CHARACTER',
      `Expected only ASCII digits, got "${value}"`,
    );
  }
  return Array.from(value, (ch) => ch.charCodeAt(0) - 48);
}
