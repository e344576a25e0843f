export const BOT_COMMANDS = {
  START: '/start',
  HELP: '/help',
  CANCEL: '/cancel',
} as const;

export const MENU_BUTTONS = {
  ADD_NUMBER: '➕ Add Number',
  MY_NUMBERS: '📱 My Numbers',
  HELP: 'ℹ️ Help',
} as const;

export const CALLBACK_DATA = {
  NUMBER_PREFIX: 'number_',
  BACK_NUMBERS: 'back_numbers',
  BACK_MAIN: 'back_main',
  NONE: 'none',
} as const;

export const BOT_MESSAGES = {
  WELCOME: (firstName: string) =>
    `🔐 Welcome to Account Login Bot, ${firstName}!\n\n` +
    'This bot signs in your messaging accounts and keeps their sessions.\n\n' +
    'Available commands:\n' +
    '• Add Number - Add new phone number\n' +
    '• My Numbers - View your numbers\n' +
    '• Help - Get assistance\n\n' +
    'Choose an option from the menu below:',
  HELP:
    '🔐 <b>Account Login Bot Help</b>\n\n' +
    '<b>How to use:</b>\n' +
    "1. Tap '➕ Add Number' to add a new phone number\n" +
    '2. Enter the phone number in international format (+1234567890)\n' +
    '3. Wait for the verification code\n' +
    '4. Enter the received code\n' +
    '5. If you have 2FA enabled, enter your password\n' +
    '6. Your session is saved\n\n' +
    'Send /cancel at any time to stop a login.\n\n' +
    '<b>Security Notes:</b>\n' +
    '• Never share your verification codes\n' +
    '• Use strong 2FA passwords',
  MAIN_MENU: '🔐 Main Menu',
  NUMBERS_TITLE: '📱 Your registered numbers:',
  NUMBER_NOT_FOUND: '❌ Number not found.',
  NO_NUMBERS: 'No numbers added',
  BACK: '🔙 Back',
} as const;
