import { MalformedInputError } from '../common/errors';
import { toDigitArray } from './digit-array';

/** Weights for the first 17 positions of an 18-digit mainland number. */
export const CN_WEIGHTS: readonly number[] = [
  7, 9, 10, 5, 8, 4, 2, 1, 6, 3, 7, 9, 10, 5, 8, 4, 2,
];

// index = sum % 11
const CN_CHECK_SYMBOLS = ['1', '0', 'X', '9', '8', '7', '6', '5', '4', '3', '2'];

/**
 * Sum of `digits[i] * weights[i]`. A length mismatch is a caller bug and
 * throws rather than producing a sum that could match by coincidence.
 */
export function weightedSum(
  digits: readonly number[],
  weights: readonly number[],
): number {
  if (digits.length !== weights.length) {
    throw new MalformedInputError(
      'LENGTH_MISMATCH',
      `Cannot weight ${digits.length} digits with ${weights.length} weights`,
    );
  }
  return digits.reduce((sum, digit, i) => sum + digit * weights[i], 0);
}

export function checkSymbol(sum: number): string {
  return CN_CHECK_SYMBOLS[sum % 11];
}

/** Check symbol for the 17 significant digits of a mainland number. */
export function cnCheckSymbol(first17: string): string {
  return checkSymbol(weightedSum(toDigitArray(first17), CN_WEIGHTS));
}
