export { IdentityModule } from './identity.module';
export { IdentityService } from './identity.service';
export { Identity } from './identity';
export { IdNumberValidator } from './id-number.validator';
export { upgradeToV2 } from './upgrade';
export { Gender } from './enums/gender.enum';
export { Jurisdiction } from './enums/jurisdiction.enum';
export {
  IdentitySummary,
  IdentityDetails,
} from './interfaces/identity-summary.interface';
export { ValidationResult } from './interfaces/validation-result.interface';
export * from './jurisdictions';
