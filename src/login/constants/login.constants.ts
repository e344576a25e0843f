/**
 * Login flow constants and user-facing texts.
 * Replies never include provider details; every text here is fixed.
 */

export const LOGIN_CONSTANTS = {
  PHONE: {
    /** Minimum length of a submitted phone number, including the leading plus */
    MIN_LENGTH: 10,
    PREFIX: '+',
  },
  SESSION: {
    NAME_PREFIX: 'session_',
  },
} as const;

export const LOGIN_MESSAGES = {
  ASK_PHONE:
    '📱 Please send your phone number in international format.\n' +
    'Example: +1234567890\n\n' +
    'Make sure to include the country code!',
  INVALID_PHONE:
    '❌ Invalid phone number format.\nPlease use international format: +1234567890',
  SENDING_CODE: '⏳ Sending verification code...',
  CODE_SENT:
    '📨 Verification code sent successfully.\n\nPlease enter the verification code you received:',
  ALREADY_AUTHORIZED: '✅ This number is already authenticated!',
  PROVIDER_REJECTED_PHONE: '❌ This phone number was rejected. Please check it and try again.',
  RATE_LIMITED: (waitSeconds: number) =>
    `❌ Too many attempts. Please wait ${waitSeconds} seconds and try again.`,
  LOGIN_SUCCESS: '✅ Authentication successful! Your session has been saved.',
  TWO_FACTOR_SUCCESS: '✅ 2FA authentication successful! Your session has been saved.',
  ASK_TWO_FACTOR: '🔐 Two-factor authentication is enabled.\nPlease enter your 2FA password:',
  CODE_INVALID: '❌ Invalid verification code. Please try again:',
  CODE_EXPIRED: '❌ Verification code expired. Send /cancel and add the number again.',
  CODE_FAILED: '❌ Could not verify the code. Try again or send /cancel to start over.',
  TWO_FACTOR_INVALID: '❌ Invalid 2FA password. Please add the number again.',
  NO_PENDING_LOGIN: '❌ No login in progress. Please start over with ➕ Add Number.',
  GENERIC_FAILURE: '❌ Something went wrong. Please try again later.',
  CANCELLED: '🚫 Login cancelled.',
  NOTHING_TO_CANCEL: 'ℹ️ There is nothing to cancel.',
} as const;
