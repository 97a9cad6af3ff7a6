export { JurisdictionValidator } from './jurisdiction-validator.interface';
export {
  Cn15Validator,
  Cn18Validator,
  CN15_LENGTH,
  CN18_LENGTH,
} from './mainland.validator';
export { HongKongValidator } from './hong-kong.validator';
export { MacauValidator } from './macau.validator';
export { TaiwanValidator } from './taiwan.validator';
