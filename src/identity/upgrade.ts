import { cnCheckSymbol, isDigits } from '../checksum';
import { UpgradeError } from '../common/errors';
import { parseCompactDate } from '../common/utils/calendar';
import { CN15_LENGTH } from './jurisdictions';

/**
 * Converts a 15-digit mainland number to the 18-digit form by inserting the
 * `19` century and appending the check symbol. Province membership is not
 * checked here.
 */
export function upgradeToV2(raw: string): string {
  const number = raw.trim().toUpperCase();

  if (number.length !== CN15_LENGTH || !isDigits(number)) {
    throw new UpgradeError(
      `Only 15-digit numbers can be upgraded, got "${number}"`,
    );
  }

  const birthDate = `19${number.slice(6, 12)}`;
  if (!parseCompactDate(birthDate)) {
    throw new UpgradeError(`Invalid date of birth ${birthDate} in ${number}`);
  }

  const body = `${number.slice(0, 6)}19${number.slice(6)}`;
  return body + cnCheckSymbol(body);
}
