import { MalformedInputError, ValidationErrorCode } from '../common/errors';
import { ProvinceLookup } from '../region/interfaces/region-lookup.interface';
import { Jurisdiction } from './enums/jurisdiction.enum';
import { ValidationResult } from './interfaces/validation-result.interface';
import {
  CN18_LENGTH,
  Cn15Validator,
  Cn18Validator,
  HongKongValidator,
  JurisdictionValidator,
  MacauValidator,
  TaiwanValidator,
} from './jurisdictions';

const MAINLAND_LIKE = /^[0-9]+X?$/;

/**
 * Detects the jurisdiction of a raw number by its shape and runs that
 * jurisdiction's rules. Accepts any string and never throws for bad input.
 */
export class IdNumberValidator {
  private readonly validators: readonly JurisdictionValidator[];

  constructor(provinces: ProvinceLookup) {
    this.validators = [
      new Cn15Validator(provinces),
      new Cn18Validator(),
      new HongKongValidator(),
      new MacauValidator(),
      new TaiwanValidator(),
    ];
  }

  detect(raw: string): JurisdictionValidator | undefined {
    const trimmed = raw.trim();
    return this.validators.find((validator) =>
      validator.jurisdiction === Jurisdiction.HK
        ? validator.matches(trimmed)
        : validator.matches(trimmed.toUpperCase()),
    );
  }

  inspect(raw: string): ValidationResult {
    const trimmed = raw.trim();
    const validator = this.detect(trimmed);
    if (!validator) {
      return { valid: false, error: unrecognized(trimmed.toUpperCase()) };
    }

    const input =
      validator.jurisdiction === Jurisdiction.HK
        ? trimmed
        : trimmed.toUpperCase();

    let error: ValidationErrorCode | undefined;
    try {
      error = validator.check(input);
    } catch (e) {
      if (!(e instanceof MalformedInputError)) {
        throw e;
      }
      error = e.code;
    }

    return error
      ? { valid: false, jurisdiction: validator.jurisdiction, error }
      : { valid: true, jurisdiction: validator.jurisdiction };
  }

  validate(raw: string): boolean {
    return this.inspect(raw).valid;
  }
}

function unrecognized(input: string): ValidationErrorCode {
  if (!MAINLAND_LIKE.test(input)) {
    return 'UNRECOGNIZED_FORMAT';
  }
  return input.length < CN18_LENGTH ? 'TOO_SHORT' : 'TOO_LONG';
}
