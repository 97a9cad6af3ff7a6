import { Inject, Injectable, Logger } from '@nestjs/common';
import { UpgradeError } from '../common/errors';
import { CLOCK, Clock } from '../common/providers/clock.provider';
import { RegionService } from '../region/region.service';
import { Gender } from './enums/gender.enum';
import { IdNumberValidator } from './id-number.validator';
import { Identity } from './identity';
import { IdentityDetails } from './interfaces/identity-summary.interface';
import { ValidationResult } from './interfaces/validation-result.interface';
import { TaiwanValidator } from './jurisdictions';
import { upgradeToV2 } from './upgrade';

@Injectable()
export class IdentityService {
  private readonly logger = new Logger(IdentityService.name);
  private readonly validator: IdNumberValidator;
  private readonly taiwan = new TaiwanValidator();

  constructor(
    private readonly regionService: RegionService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.validator = new IdNumberValidator(regionService);
  }

  /**
   * Validates a mainland, Hong Kong, Macau or Taiwan number
   */
  validate(number: string): boolean {
    return this.inspect(number).valid;
  }

  inspect(number: string): ValidationResult {
    const result = this.validator.inspect(number);
    if (!result.valid) {
      this.logger.debug(
        `Rejected "${number}" (${result.jurisdiction ?? 'unknown'}): ${result.error}`,
      );
    }
    return result;
  }

  parse(number: string): Identity {
    return Identity.parse(number, this.validator);
  }

  upgrade(number: string): string {
    try {
      return upgradeToV2(number);
    } catch (error) {
      if (error instanceof UpgradeError) {
        this.logger.warn(`Upgrade failed: ${error.message}`);
      }
      throw error;
    }
  }

  province(identity: Identity): string | undefined {
    const code = identity.provinceCode();
    return code === undefined ? undefined : this.regionService.province(code);
  }

  region(identity: Identity): string | undefined {
    const code = identity.regionCode();
    return code === undefined ? undefined : this.regionService.lookup(code);
  }

  age(identity: Identity): number | undefined {
    return identity.age(this.clock());
  }

  /**
   * Decodes a mainland number with names resolved from the region registry.
   * Returns `undefined` for numbers that are not valid mainland numbers.
   */
  describe(number: string): IdentityDetails | undefined {
    const identity = this.parse(number);
    if (!identity.isValid()) {
      return undefined;
    }
    return {
      ...identity.toJSON(),
      age: this.age(identity),
      province: this.province(identity),
      region: this.region(identity),
    };
  }

  taiwanGender(number: string): Gender | undefined {
    return this.taiwan.gender(number);
  }

  taiwanRegion(number: string): string | undefined {
    return this.taiwan.region(number);
  }
}
