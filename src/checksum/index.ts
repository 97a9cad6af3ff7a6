export { isDigits, toDigitArray } from './digit-array';
export {
  CN_WEIGHTS,
  weightedSum,
  checkSymbol,
  cnCheckSymbol,
} from './checksum';
