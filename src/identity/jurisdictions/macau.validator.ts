import { ValidationErrorCode } from '../../common/errors';
import { Jurisdiction } from '../enums/jurisdiction.enum';
import { JurisdictionValidator } from './jurisdiction-validator.interface';

const PATTERN = /^[157][0-9]{6}[0-9A-Z]$/;
const PARENTHESES = /[()]/g;

/** Macau cards publish no check-digit algorithm; only the shape is checked. */
export class MacauValidator implements JurisdictionValidator {
  readonly jurisdiction = Jurisdiction.MO;

  matches(input: string): boolean {
    return PATTERN.test(input.replace(PARENTHESES, ''));
  }

  check(): ValidationErrorCode | undefined {
    return undefined;
  }
}
