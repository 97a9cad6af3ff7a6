import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { cnCheckSymbol } from '../checksum';
import { GenerateFakeIdError } from '../common/errors';
import { CLOCK, Clock } from '../common/providers/clock.provider';
import {
  RANDOM_SOURCE,
  RandomSource,
} from '../common/providers/random.provider';
import {
  dayOfYear,
  daysInYear,
  fromDayOfYear,
  parseCompactDate,
} from '../common/utils/calendar';
import { Gender } from '../identity/enums/gender.enum';
import { RegionService } from '../region/region.service';
import { FakeOptions, FakeOptionsDto } from './dto/fake-options.dto';

export const DEFAULT_FAKE_MAX_AGE = 100;

const REGION_CODE = /^\d{6}$/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Synthesizes 18-digit mainland numbers that pass validation, for tests and
 * fixtures. The region, birth date and gender are honoured exactly; only the
 * sequence digits are random.
 */
@Injectable()
export class FakeService {
  private readonly logger = new Logger(FakeService.name);

  constructor(
    private readonly regionService: RegionService,
    private readonly configService: ConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(RANDOM_SOURCE) private readonly random: RandomSource,
  ) {}

  /**
   * Builds a number for an exact region code and birth date. The region does
   * not have to be registered.
   */
  create(
    region: string,
    year: number,
    month: number,
    day: number,
    gender: Gender,
  ): string {
    if (!REGION_CODE.test(region)) {
      throw new GenerateFakeIdError(
        'The length of region code must be 6 digits',
      );
    }

    const birthDate = `${pad(year, 4)}${pad(month, 2)}${pad(day, 2)}`;
    if (!parseCompactDate(birthDate)) {
      throw new GenerateFakeIdError('Invalid date of birth');
    }

    const body = `${region}${birthDate}${pad(this.sequenceFor(gender), 3)}`;
    return body + cnCheckSymbol(body);
  }

  /**
   * Draws a random number under the given constraints. `minYear` defaults to
   * `FAKE_MAX_AGE` years ago and `maxYear` to the current year.
   */
  generate(options: FakeOptions = {}): string {
    const opts = this.validateOptions(options);
    const today = this.clock();
    const currentYear = today.getFullYear();

    if (opts.maxYear !== undefined && opts.maxYear > currentYear) {
      throw new GenerateFakeIdError(
        `Max year must be less than or equal to ${currentYear}`,
      );
    }
    if (opts.minYear !== undefined && opts.minYear > currentYear) {
      throw new GenerateFakeIdError(
        `Min year must be less than or equal to ${currentYear}`,
      );
    }
    if (
      opts.minYear !== undefined &&
      opts.maxYear !== undefined &&
      opts.maxYear < opts.minYear
    ) {
      throw new GenerateFakeIdError(
        'Max year must be greater than or equal to min year',
      );
    }

    const region = this.resolveRegion(opts.region);

    const maxSpan = this.configService.get<number>(
      'FAKE_MAX_AGE',
      DEFAULT_FAKE_MAX_AGE,
    );
    const minAge = opts.maxYear !== undefined ? currentYear - opts.maxYear : 0;
    // An old maxYear without a minYear widens the span instead of inverting it
    const maxAge = Math.max(
      opts.minYear !== undefined ? currentYear - opts.minYear : maxSpan,
      minAge,
    );
    const age =
      minAge === maxAge ? minAge : this.random.nextInt(minAge, maxAge);

    const birthYear = currentYear - age;
    const lastDay =
      birthYear === currentYear
        ? dayOfYear({
            year: currentYear,
            month: today.getMonth() + 1,
            day: today.getDate(),
          })
        : daysInYear(birthYear);
    const birth = fromDayOfYear(birthYear, this.random.nextInt(1, lastDay));

    const gender =
      opts.gender ??
      (this.random.nextInt(0, 1) === 0 ? Gender.Male : Gender.Female);

    this.logger.debug(
      `Generating ${gender} number for region ${region}, born ${birthYear}-${birth.month}-${birth.day}`,
    );
    return this.create(region, birth.year, birth.month, birth.day, gender);
  }

  generateMany(count: number, options: FakeOptions = {}): string[] {
    if (!Number.isInteger(count) || count < 1) {
      throw new GenerateFakeIdError('Count must be a positive integer');
    }
    const numbers = Array.from({ length: count }, () =>
      this.generate(options),
    );
    this.logger.log(`Generated ${numbers.length} fake numbers`);
    return numbers;
  }

  private validateOptions(options: FakeOptions): FakeOptionsDto {
    const dto = plainToInstance(FakeOptionsDto, options);
    const errors = validateSync(dto);
    if (errors.length > 0) {
      const message = errors
        .flatMap((error) => Object.values(error.constraints ?? {}))
        .join('; ');
      this.logger.warn(`Rejected fake options: ${message}`);
      throw new GenerateFakeIdError(message);
    }
    return dto;
  }

  private resolveRegion(prefix: string | undefined): string {
    if (prefix === undefined) {
      return this.regionService.randomCode();
    }
    const code = this.regionService.randomCodeWithPrefix(prefix);
    if (!code) {
      throw new GenerateFakeIdError('Invalid region code');
    }
    return code;
  }

  // Odd sequence for men, even for women
  private sequenceFor(gender: Gender): number {
    let sequence = this.random.nextInt(0, 998);
    if (gender === Gender.Male && sequence % 2 === 0) {
      sequence += 1;
    }
    if (gender === Gender.Female && sequence % 2 === 1) {
      sequence += 1;
    }
    return sequence;
  }
}
