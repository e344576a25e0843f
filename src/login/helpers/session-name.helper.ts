import { createHash } from 'crypto';
import { LOGIN_CONSTANTS } from '../constants/login.constants';

/**
 * Storage slot for the account session of a (user, phone number) pair.
 * Same pair, same name; SHA-256 keeps distinct pairs apart.
 */
export function deriveSessionName(userId: number, phoneNumber: string): string {
  const digest = createHash('sha256').update(`${userId}_${phoneNumber}`).digest('hex');
  return `${LOGIN_CONSTANTS.SESSION.NAME_PREFIX}${digest}`;
}
