import { ValidationErrorCode } from '../../common/errors';
import { Jurisdiction } from '../enums/jurisdiction.enum';

export interface JurisdictionValidator {
  readonly jurisdiction: Jurisdiction;

  /** Whether the trimmed input has this jurisdiction's shape. */
  matches(input: string): boolean;

  /**
   * Returns the first failed rule for an input that `matches`, or `undefined`
   * when the number is valid. May throw `MalformedInputError`.
   */
  check(input: string): ValidationErrorCode | undefined;
}
