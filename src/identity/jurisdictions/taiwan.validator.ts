import { toDigitArray, weightedSum } from '../../checksum';
import { MalformedInputError, ValidationErrorCode } from '../../common/errors';
import {
  TAIWAN_PREFIXES,
  TaiwanPrefix,
} from '../constants/taiwan-prefixes';
import { Gender } from '../enums/gender.enum';
import { Jurisdiction } from '../enums/jurisdiction.enum';
import { JurisdictionValidator } from './jurisdiction-validator.interface';

const PATTERN = /^[A-Z][0-9]{9}$/;
const PARENTHESES = /[()]/g;

const DIGIT_WEIGHTS = [8, 7, 6, 5, 4, 3, 2, 1];

function normalize(input: string): string {
  return input.trim().replace(PARENTHESES, '').toUpperCase();
}

function prefixOf(letter: string): TaiwanPrefix | undefined {
  return Object.prototype.hasOwnProperty.call(TAIWAN_PREFIXES, letter)
    ? TAIWAN_PREFIXES[letter]
    : undefined;
}

export class TaiwanValidator implements JurisdictionValidator {
  readonly jurisdiction = Jurisdiction.TW;

  matches(input: string): boolean {
    return PATTERN.test(normalize(input));
  }

  check(input: string): ValidationErrorCode | undefined {
    const number = normalize(input);

    const marker = number[1];
    if (marker !== '1' && marker !== '2') {
      return 'INVALID_GENDER_MARKER';
    }

    const prefix = prefixOf(number[0]);
    if (!prefix) {
      return 'UNRECOGNIZED_FORMAT';
    }

    const sum =
      Math.floor(prefix.code / 10) +
      (prefix.code % 10) * 9 +
      weightedSum(toDigitArray(number.slice(1, 9)), DIGIT_WEIGHTS);
    const expected = (10 - (sum % 10)) % 10;

    return expected === toDigitArray(number[9])[0]
      ? undefined
      : 'CHECKSUM_MISMATCH';
  }

  isValid(input: string): boolean {
    if (!this.matches(input)) {
      return false;
    }
    try {
      return this.check(input) === undefined;
    } catch (error) {
      if (error instanceof MalformedInputError) {
        return false;
      }
      throw error;
    }
  }

  gender(input: string): Gender | undefined {
    if (!this.isValid(input)) {
      return undefined;
    }
    return normalize(input)[1] === '1' ? Gender.Male : Gender.Female;
  }

  /** Place of first registration, from the prefix letter. */
  region(input: string): string | undefined {
    if (!this.isValid(input)) {
      return undefined;
    }
    return prefixOf(normalize(input)[0])?.place;
  }
}
