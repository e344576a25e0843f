import { PhoneNumber } from '../../accounts/entities/phone-number.entity';
import { BOT_MESSAGES, CALLBACK_DATA, MENU_BUTTONS } from '../constants/bot.constants';
import { InlineKeyboard, ReplyKeyboard } from '../types/bot.types';

export function mainMenuKeyboard(): ReplyKeyboard {
  return {
    type: 'reply',
    rows: [[MENU_BUTTONS.ADD_NUMBER], [MENU_BUTTONS.MY_NUMBERS], [MENU_BUTTONS.HELP]],
  };
}

/**
 * One button per record in the order given, then a back button.
 */
export function numbersKeyboard(records: PhoneNumber[]): InlineKeyboard {
  if (records.length === 0) {
    return {
      type: 'inline',
      rows: [[{ text: BOT_MESSAGES.NO_NUMBERS, data: CALLBACK_DATA.NONE }]],
    };
  }

  const rows = records.map((record) => [
    {
      text: `${record.isAuthenticated ? '✅' : '⏳'} ${record.phoneNumber} (${record.status})`,
      data: `${CALLBACK_DATA.NUMBER_PREFIX}${record.id}`,
    },
  ]);

  return {
    type: 'inline',
    rows: [...rows, [{ text: BOT_MESSAGES.BACK, data: CALLBACK_DATA.BACK_MAIN }]],
  };
}

export function numberDetailsKeyboard(): InlineKeyboard {
  return {
    type: 'inline',
    rows: [[{ text: BOT_MESSAGES.BACK, data: CALLBACK_DATA.BACK_NUMBERS }]],
  };
}

/**
 * @returns Record id of a `number_<id>` payload, or null for anything else
 */
export function parseNumberCallback(data: string): number | null {
  if (!data.startsWith(CALLBACK_DATA.NUMBER_PREFIX)) {
    return null;
  }

  const id = Number(data.slice(CALLBACK_DATA.NUMBER_PREFIX.length));
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}
