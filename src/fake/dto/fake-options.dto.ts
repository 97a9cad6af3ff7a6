import {
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Min,
} from 'class-validator';
import { Gender } from '../../identity/enums/gender.enum';

export interface FakeOptions {
  /** Exact six-digit region code, or a shorter prefix to draw one from. */
  region?: string;
  minYear?: number;
  maxYear?: number;
  gender?: Gender;
}

export class FakeOptionsDto implements FakeOptions {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @Matches(/^\d{1,6}$/, {
    message: 'region must be a numeric prefix of 1 to 6 digits',
  })
  region?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  minYear?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  maxYear?: number;

  @IsOptional()
  @IsEnum(Gender)
  gender?: Gender;
}
