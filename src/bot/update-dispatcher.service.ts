import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CallbackQuery, Message, Update } from 'node-telegram-bot-api';
import { AccountStoreService } from '../accounts/account-store.service';
import { MetricsService } from '../common/services/metrics.service';
import { LoginOrchestratorService } from '../login/login-orchestrator.service';
import { LoginReply } from '../login/types/login.types';
import { BotApiService } from './bot-api.service';
import { BOT_COMMANDS, BOT_MESSAGES, CALLBACK_DATA, MENU_BUTTONS } from './constants/bot.constants';
import {
  mainMenuKeyboard,
  numberDetailsKeyboard,
  numbersKeyboard,
  parseNumberCallback,
} from './helpers/keyboard.helper';
import { escapeHtml, formatNumberDetails, parseCommand } from './helpers/message.helper';

/**
 * Long-polling loop. Updates are handled one at a time in arrival order, which is
 * what keeps login state of a user free of concurrent access.
 */
@Injectable()
export class UpdateDispatcherService implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(UpdateDispatcherService.name);
  private offset = 0;
  private running = false;
  private loop: Promise<void> | null = null;

  constructor(
    private botApi: BotApiService,
    private orchestrator: LoginOrchestratorService,
    private accountStore: AccountStoreService,
    private configService: ConfigService,
    private metricsService: MetricsService,
  ) {}

  onApplicationBootstrap(): void {
    this.running = true;
    this.loop = this.runLoop();
    this.logger.log('Bot started polling for updates');
  }

  async onApplicationShutdown(): Promise<void> {
    this.running = false;
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
    this.logger.log('Bot stopped polling');
  }

  get nextOffset(): number {
    return this.offset;
  }

  /**
   * Fetches and handles one batch.
   *
   * @returns Number of updates in the batch
   */
  async pollOnce(): Promise<number> {
    const timeoutSeconds = this.configService.get<number>('bot.pollTimeoutSeconds', 30);

    let updates: Update[];
    try {
      updates = await this.botApi.getUpdates(this.offset, timeoutSeconds);
    } catch (error) {
      this.logger.error(
        'Failed to fetch updates',
        error instanceof Error ? error.stack : String(error),
      );
      await this.delay(this.configService.get<number>('bot.errorDelayMs', 5000));
      return 0;
    }

    for (const update of updates) {
      this.offset = update.update_id + 1;
      await this.processUpdate(update);
    }

    if (updates.length === 0) {
      await this.delay(this.configService.get<number>('bot.idleDelayMs', 1000));
    }

    return updates.length;
  }

  private async runLoop(): Promise<void> {
    while (this.running) {
      await this.pollOnce();
    }
  }

  private async processUpdate(update: Update): Promise<void> {
    try {
      if (update.message) {
        await this.handleMessage(update.message);
      } else if (update.callback_query) {
        await this.handleCallback(update.callback_query);
      } else {
        this.metricsService.incrementUpdateProcessed('ignored');
      }
    } catch (error) {
      this.metricsService.incrementUpdateFailure();
      this.logger.error(
        `Error processing update ${update.update_id}`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  private async handleMessage(message: Message): Promise<void> {
    const user = message.from;
    if (message.chat.type !== 'private' || !user) {
      this.metricsService.incrementUpdateProcessed('ignored');
      return;
    }

    this.metricsService.incrementUpdateProcessed('message');
    await this.accountStore.upsertUser({
      id: user.id,
      username: user.username,
      firstName: user.first_name,
      lastName: user.last_name,
    });

    const text = message.text;
    if (!text) {
      return;
    }

    const chatId = message.chat.id;
    const awaitingPassword = this.orchestrator.awaitsPassword(user.id);

    // A password is taken verbatim; only a bare /cancel still ends the flow
    const command = awaitingPassword
      ? text.trim() === BOT_COMMANDS.CANCEL
        ? BOT_COMMANDS.CANCEL
        : null
      : parseCommand(text);

    switch (command) {
      case BOT_COMMANDS.START:
        await this.botApi.sendMessage(
          chatId,
          BOT_MESSAGES.WELCOME(escapeHtml(user.first_name || 'User')),
          mainMenuKeyboard(),
        );
        return;
      case BOT_COMMANDS.HELP:
        await this.botApi.sendMessage(chatId, BOT_MESSAGES.HELP);
        return;
      case BOT_COMMANDS.CANCEL:
        await this.sendReply(chatId, await this.orchestrator.cancel(user.id));
        return;
    }

    switch (awaitingPassword ? null : text) {
      case MENU_BUTTONS.ADD_NUMBER:
        await this.sendReply(chatId, this.orchestrator.startAddNumber(user.id));
        return;
      case MENU_BUTTONS.MY_NUMBERS: {
        const records = await this.accountStore.listPhoneNumbers(user.id);
        await this.botApi.sendMessage(chatId, BOT_MESSAGES.NUMBERS_TITLE, numbersKeyboard(records));
        return;
      }
      case MENU_BUTTONS.HELP:
        await this.botApi.sendMessage(chatId, BOT_MESSAGES.HELP);
        return;
    }

    const reply = await this.orchestrator.handleText(user.id, text, (progress) =>
      this.botApi.sendMessage(chatId, progress),
    );
    if (reply) {
      await this.sendReply(chatId, reply);
    }
  }

  private async handleCallback(query: CallbackQuery): Promise<void> {
    await this.botApi.answerCallback(query.id);
    this.metricsService.incrementUpdateProcessed('callback_query');

    const { data, message } = query;
    if (!data || !message) {
      return;
    }

    const chatId = message.chat.id;
    const messageId = message.message_id;

    if (data === CALLBACK_DATA.BACK_MAIN) {
      await this.botApi.editMessage(chatId, messageId, BOT_MESSAGES.MAIN_MENU);
      return;
    }

    if (data === CALLBACK_DATA.BACK_NUMBERS) {
      const records = await this.accountStore.listPhoneNumbers(query.from.id);
      await this.botApi.editMessage(
        chatId,
        messageId,
        BOT_MESSAGES.NUMBERS_TITLE,
        numbersKeyboard(records),
      );
      return;
    }

    const recordId = parseNumberCallback(data);
    if (recordId === null) {
      return;
    }

    const record = await this.accountStore.getPhoneNumber(query.from.id, recordId);
    let text: string = BOT_MESSAGES.NUMBER_NOT_FOUND;
    if (record) {
      const sessionRef = await this.accountStore.getActiveSessionRef(
        query.from.id,
        record.phoneNumber,
      );
      text = formatNumberDetails(record, sessionRef !== null);
    }

    await this.botApi.editMessage(chatId, messageId, text, numberDetailsKeyboard());
  }

  private async sendReply(chatId: number, reply: LoginReply): Promise<void> {
    await this.botApi.sendMessage(
      chatId,
      reply.text,
      reply.keyboard === 'main' ? mainMenuKeyboard() : undefined,
    );
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
