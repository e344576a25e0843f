/**
 * Transport-neutral keyboards. BotApiService turns them into Bot API markup.
 */

export interface ReplyKeyboard {
  type: 'reply';
  rows: string[][];
}

export interface InlineButton {
  text: string;
  data: string;
}

export interface InlineKeyboard {
  type: 'inline';
  rows: InlineButton[][];
}

export type Keyboard = ReplyKeyboard | InlineKeyboard;
