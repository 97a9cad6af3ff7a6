import { toDigitArray, weightedSum } from '../../checksum';
import { ValidationErrorCode } from '../../common/errors';
import { Jurisdiction } from '../enums/jurisdiction.enum';
import { JurisdictionValidator } from './jurisdiction-validator.interface';

// Case-sensitive on purpose: a lowercase check character is not a valid card.
const PATTERN = /^[A-Z]{1,2}[0-9]{6}\(?[0-9A]\)?$/;
const PARENTHESES = /[()]/g;

const DIGIT_WEIGHTS = [7, 6, 5, 4, 3, 2];

// Single-letter cards stand in for the missing first letter with a fixed
// contribution at weight 9.
const SINGLE_LETTER_BASE = 522;

/** A=10 … Z=35, for every letter of the alphabet. */
function letterValue(letter: string): number {
  return letter.charCodeAt(0) - 55;
}

export class HongKongValidator implements JurisdictionValidator {
  readonly jurisdiction = Jurisdiction.HK;

  matches(input: string): boolean {
    return PATTERN.test(input);
  }

  check(input: string): ValidationErrorCode | undefined {
    const number = input.replace(PARENTHESES, '');

    let sum: number;
    let card: string;
    if (number.length === 9) {
      sum = letterValue(number[0]) * 9 + letterValue(number[1]) * 8;
      card = number.slice(1);
    } else {
      sum = SINGLE_LETTER_BASE + letterValue(number[0]) * 8;
      card = number;
    }

    sum += weightedSum(toDigitArray(card.slice(1, 7)), DIGIT_WEIGHTS);

    const last = card[7];
    sum += last === 'A' ? 10 : toDigitArray(last)[0];

    return sum % 11 === 0 ? undefined : 'CHECKSUM_MISMATCH';
  }
}
