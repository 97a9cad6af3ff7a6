import {
  CELESTIAL_STEMS,
  CHINESE_ZODIAC,
  CONSTELLATIONS,
  TERRESTRIAL_BRANCHES,
} from './constants/birth-signs';
import { Gender } from './enums/gender.enum';
import { Jurisdiction } from './enums/jurisdiction.enum';
import { IdNumberValidator } from './id-number.validator';
import { IdentitySummary } from './interfaces/identity-summary.interface';
import { upgradeToV2 } from './upgrade';

function cycleIndex(year: number, length: number): number {
  return (((year - 3) % length) + length) % length;
}

/**
 * A mainland identity number in its 18-digit form. Legacy 15-digit input is
 * upgraded on parse. Every derived field is read from a fixed slice of the
 * number:
 *
 * ```
 * [0, 6)   region code
 * [6, 14)  birth date, YYYYMMDD
 * [14, 17) sequence; odd last digit = male
 * [17]     check symbol
 * ```
 *
 * Accessors return `undefined` when the number is not valid.
 */
export class Identity {
  private constructor(
    readonly number: string,
    private readonly valid: boolean,
  ) {}

  static parse(raw: string, validator: IdNumberValidator): Identity {
    const number = raw.trim().toUpperCase();
    const result = validator.inspect(number);

    if (result.valid && result.jurisdiction === Jurisdiction.CN15) {
      return new Identity(upgradeToV2(number), true);
    }
    return new Identity(
      number,
      result.valid && result.jurisdiction === Jurisdiction.CN18,
    );
  }

  isValid(): boolean {
    return this.valid;
  }

  isEmpty(): boolean {
    return this.number.length === 0;
  }

  get length(): number {
    return this.number.length;
  }

  private slice(start: number, end: number): string | undefined {
    return this.valid ? this.number.slice(start, end) : undefined;
  }

  private numeric(start: number, end: number): number | undefined {
    const value = this.slice(start, end);
    return value === undefined ? undefined : Number(value);
  }

  regionCode(): string | undefined {
    return this.slice(0, 6);
  }

  provinceCode(): string | undefined {
    return this.slice(0, 2);
  }

  /** `YYYY-MM-DD` */
  birthDate(): string | undefined {
    const birth = this.slice(6, 14);
    if (birth === undefined) {
      return undefined;
    }
    return `${birth.slice(0, 4)}-${birth.slice(4, 6)}-${birth.slice(6, 8)}`;
  }

  year(): number | undefined {
    return this.numeric(6, 10);
  }

  month(): number | undefined {
    return this.numeric(10, 12);
  }

  day(): number | undefined {
    return this.numeric(12, 14);
  }

  sequence(): string | undefined {
    return this.slice(14, 17);
  }

  checkSymbol(): string | undefined {
    return this.slice(17, 18);
  }

  gender(): Gender | undefined {
    const code = this.numeric(16, 17);
    if (code === undefined) {
      return undefined;
    }
    return code % 2 === 1 ? Gender.Male : Gender.Female;
  }

  age(now: Date = new Date()): number | undefined {
    return this.ageIn(now.getFullYear());
  }

  /** Age reached during `year`; absent for years before the birth year. */
  ageIn(year: number): number | undefined {
    const birthYear = this.year();
    if (birthYear === undefined || year < birthYear) {
      return undefined;
    }
    return year - birthYear;
  }

  constellation(): string | undefined {
    const month = this.month();
    const day = this.day();
    if (month === undefined || day === undefined) {
      return undefined;
    }

    let sign = CONSTELLATIONS[CONSTELLATIONS.length - 1];
    for (const range of CONSTELLATIONS) {
      const [fromMonth, fromDay] = range.from;
      if (month > fromMonth || (month === fromMonth && day >= fromDay)) {
        sign = range;
      }
    }
    return sign.name;
  }

  /** Sexagenary-cycle name of the birth year, e.g. 壬戌 for 1982. */
  chineseEra(): string | undefined {
    const year = this.year();
    if (year === undefined) {
      return undefined;
    }
    return (
      CELESTIAL_STEMS[cycleIndex(year, 10)] +
      TERRESTRIAL_BRANCHES[cycleIndex(year, 12)]
    );
  }

  chineseZodiac(): string | undefined {
    const year = this.year();
    if (year === undefined) {
      return undefined;
    }
    return CHINESE_ZODIAC[cycleIndex(year, 12)];
  }

  equals(other: Identity): boolean {
    return this.number === other.number && this.valid === other.valid;
  }

  toJSON(): IdentitySummary {
    return {
      number: this.number,
      valid: this.valid,
      birthDate: this.birthDate(),
      year: this.year(),
      month: this.month(),
      day: this.day(),
      gender: this.gender(),
      regionCode: this.regionCode(),
      constellation: this.constellation(),
      chineseEra: this.chineseEra(),
      chineseZodiac: this.chineseZodiac(),
    };
  }
}
