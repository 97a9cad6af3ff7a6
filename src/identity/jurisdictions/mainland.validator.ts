import {
  CN_WEIGHTS,
  checkSymbol,
  isDigits,
  toDigitArray,
  weightedSum,
} from '../../checksum';
import { ValidationErrorCode } from '../../common/errors';
import { parseCompactDate } from '../../common/utils/calendar';
import { ProvinceLookup } from '../../region/interfaces/region-lookup.interface';
import { Jurisdiction } from '../enums/jurisdiction.enum';
import { JurisdictionValidator } from './jurisdiction-validator.interface';

export const CN15_LENGTH = 15;
export const CN18_LENGTH = 18;

/**
 * Legacy numbers carry a two-digit year that is always read as 19xx, and no
 * check digit, so the province prefix is the only extra guard.
 */
export class Cn15Validator implements JurisdictionValidator {
  readonly jurisdiction = Jurisdiction.CN15;

  constructor(private readonly provinces: ProvinceLookup) {}

  matches(input: string): boolean {
    return input.length === CN15_LENGTH;
  }

  check(input: string): ValidationErrorCode | undefined {
    if (!isDigits(input)) {
      return 'NON_DIGIT_CHARACTER';
    }
    if (this.provinces.province(input.slice(0, 2)) === undefined) {
      return 'UNKNOWN_REGION_CODE';
    }
    if (!parseCompactDate(`19${input.slice(6, 12)}`)) {
      return 'INVALID_CALENDAR_DATE';
    }
    return undefined;
  }
}

export class Cn18Validator implements JurisdictionValidator {
  readonly jurisdiction = Jurisdiction.CN18;

  matches(input: string): boolean {
    return input.length === CN18_LENGTH;
  }

  check(input: string): ValidationErrorCode | undefined {
    const number = input.toUpperCase();

    if (!parseCompactDate(number.slice(6, 14))) {
      return 'INVALID_CALENDAR_DATE';
    }

    const digits = toDigitArray(number.slice(0, 17));
    if (checkSymbol(weightedSum(digits, CN_WEIGHTS)) !== number[17]) {
      return 'CHECKSUM_MISMATCH';
    }
    return undefined;
  }
}
