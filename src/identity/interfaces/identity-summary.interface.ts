import { Gender } from '../enums/gender.enum';

export interface IdentitySummary {
  number: string;
  valid: boolean;
  birthDate?: string;
  year?: number;
  month?: number;
  day?: number;
  gender?: Gender;
  regionCode?: string;
  constellation?: string;
  chineseEra?: string;
  chineseZodiac?: string;
}

export interface IdentityDetails extends IdentitySummary {
  age?: number;
  province?: string;
  region?: string;
}
