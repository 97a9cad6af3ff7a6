export {
  IdCardError,
  MalformedInputError,
  UpgradeError,
  GenerateFakeIdError,
  ValidationErrorCode,
} from './id-card.error';
