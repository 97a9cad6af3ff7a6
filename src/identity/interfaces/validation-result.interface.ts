import { ValidationErrorCode } from '../../common/errors';
import { Jurisdiction } from '../enums/jurisdiction.enum';

export interface ValidationResult {
  valid: boolean;
  jurisdiction?: Jurisdiction;
  error?: ValidationErrorCode;
}
