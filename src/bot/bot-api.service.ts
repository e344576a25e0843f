import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import TelegramBot, {
  InlineKeyboardMarkup,
  ReplyKeyboardMarkup,
  Update,
} from 'node-telegram-bot-api';
import { InlineKeyboard, Keyboard } from './types/bot.types';

const ALLOWED_UPDATES = ['message', 'callback_query'];

export function toReplyMarkup(keyboard: Keyboard): ReplyKeyboardMarkup | InlineKeyboardMarkup {
  if (keyboard.type === 'reply') {
    return {
      keyboard: keyboard.rows.map((row) => row.map((text) => ({ text }))),
      resize_keyboard: true,
    };
  }

  return toInlineMarkup(keyboard);
}

function toInlineMarkup(keyboard: InlineKeyboard): InlineKeyboardMarkup {
  return {
    inline_keyboard: keyboard.rows.map((row) =>
      row.map((button) => ({ text: button.text, callback_data: button.data })),
    ),
  };
}

/**
 * Bot API transport. Polling is driven by UpdateDispatcherService, not by the library.
 * Every message is sent with HTML parse mode.
 */
@Injectable()
export class BotApiService {
  private readonly logger = new Logger(BotApiService.name);
  private readonly bot: TelegramBot;

  constructor(private configService: ConfigService) {
    this.bot = new TelegramBot(this.configService.get<string>('bot.token', ''), {
      polling: false,
    });
    this.logger.log('Bot API client initialized');
  }

  async getUpdates(offset: number, timeoutSeconds: number): Promise<Update[]> {
    return await this.bot.getUpdates({
      offset,
      timeout: timeoutSeconds,
      allowed_updates: ALLOWED_UPDATES,
    });
  }

  async sendMessage(chatId: number, text: string, keyboard?: Keyboard): Promise<void> {
    await this.bot.sendMessage(chatId, text, {
      parse_mode: 'HTML',
      reply_markup: keyboard ? toReplyMarkup(keyboard) : undefined,
    });
  }

  async editMessage(
    chatId: number,
    messageId: number,
    text: string,
    keyboard?: InlineKeyboard,
  ): Promise<void> {
    await this.bot.editMessageText(text, {
      chat_id: chatId,
      message_id: messageId,
      parse_mode: 'HTML',
      reply_markup: keyboard ? toInlineMarkup(keyboard) : undefined,
    });
  }

  async answerCallback(callbackQueryId: string, text?: string): Promise<void> {
    await this.bot.answerCallbackQuery(callbackQueryId, text ? { text } : {});
  }
}
