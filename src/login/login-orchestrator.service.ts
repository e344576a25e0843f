import { Injectable, Logger } from '@nestjs/common';
import { AccountStoreService } from '../accounts/account-store.service';
import { ConversationStateService } from './conversation-state.service';
import { PendingAuthRegistry } from './pending-auth.registry';
import { LOGIN_MESSAGES } from './constants/login.constants';
import {
  InvalidPhoneFormatError,
  LoginErrorCode,
  ProviderError,
  ProviderRateLimitedError,
} from './errors/login.errors';
import { describeError } from './helpers/error.helper';
import {
  ConversationStep,
  LoginReply,
  MenuKeyboard,
  ProgressCallback,
  SignInOutcome,
} from './types/login.types';

/**
 * Drives the phone → code → second factor conversation.
 *
 * Each text input is mapped to one registry call; the outcome decides the next
 * step and which fixed reply the user gets. Provider details only reach the log.
 */
@Injectable()
export class LoginOrchestratorService {
  private readonly logger = new Logger(LoginOrchestratorService.name);

  constructor(
    private conversationState: ConversationStateService,
    private registry: PendingAuthRegistry,
    private accountStore: AccountStoreService,
  ) {}

  startAddNumber(userId: number): LoginReply {
    return this.reply(userId, LOGIN_MESSAGES.ASK_PHONE, ConversationStep.AWAITING_PHONE);
  }

  /**
   * @returns null when the user has no login in progress
   */
  async handleText(
    userId: number,
    text: string,
    onProgress?: ProgressCallback,
  ): Promise<LoginReply | null> {
    const step = this.conversationState.getStep(userId);

    try {
      switch (step) {
        case ConversationStep.AWAITING_PHONE:
          return await this.handlePhoneNumber(userId, text, onProgress);
        case ConversationStep.AWAITING_CODE:
          return await this.handleCode(userId, text);
        case ConversationStep.AWAITING_TWO_FACTOR:
          return await this.handleTwoFactor(userId, text);
        default:
          return null;
      }
    } catch (error) {
      this.logger.error(
        `[${LoginErrorCode.INTERNAL_ERROR}] Login step ${step} failed for user ${userId}: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      await this.registry.abandon(userId);
      return this.reply(userId, LOGIN_MESSAGES.GENERIC_FAILURE, ConversationStep.IDLE, 'main');
    }
  }

  /**
   * True while the next text is a second-factor password, which may look like a command.
   */
  awaitsPassword(userId: number): boolean {
    return this.conversationState.getStep(userId) === ConversationStep.AWAITING_TWO_FACTOR;
  }

  async cancel(userId: number): Promise<LoginReply> {
    const hadFlow = this.conversationState.getStep(userId) !== ConversationStep.IDLE;
    const hadPending = await this.registry.abandon(userId);

    const text =
      hadFlow || hadPending ? LOGIN_MESSAGES.CANCELLED : LOGIN_MESSAGES.NOTHING_TO_CANCEL;
    return this.reply(userId, text, ConversationStep.IDLE, 'main');
  }

  private async handlePhoneNumber(
    userId: number,
    text: string,
    onProgress?: ProgressCallback,
  ): Promise<LoginReply> {
    const validation = this.conversationState.validatePhoneNumber(text);
    if (!validation.isValid) {
      this.logger.debug(
        `[${LoginErrorCode.VALIDATION_ERROR}] User ${userId}: ${validation.errors.join('; ')}`,
      );
      return this.reply(userId, LOGIN_MESSAGES.INVALID_PHONE, ConversationStep.AWAITING_PHONE);
    }

    const { phoneNumber } = validation;
    const phoneRecordId = await this.accountStore.insertPhoneNumber(userId, phoneNumber);

    if (onProgress) {
      await onProgress(LOGIN_MESSAGES.SENDING_CODE);
    }

    try {
      const result = await this.registry.begin({ userId, phoneNumber, phoneRecordId });

      if (result.status === 'already_authorized') {
        return this.reply(
          userId,
          LOGIN_MESSAGES.ALREADY_AUTHORIZED,
          ConversationStep.IDLE,
          'main',
        );
      }

      return this.reply(userId, LOGIN_MESSAGES.CODE_SENT, ConversationStep.AWAITING_CODE);
    } catch (error) {
      if (error instanceof InvalidPhoneFormatError) {
        this.logger.warn(`[${LoginErrorCode.PROVIDER_REJECTED}] ${error.message}`);
        return this.reply(
          userId,
          LOGIN_MESSAGES.PROVIDER_REJECTED_PHONE,
          ConversationStep.IDLE,
          'main',
        );
      }

      if (error instanceof ProviderRateLimitedError) {
        return this.reply(
          userId,
          LOGIN_MESSAGES.RATE_LIMITED(error.waitSeconds),
          ConversationStep.IDLE,
          'main',
        );
      }

      if (error instanceof ProviderError) {
        return this.reply(userId, LOGIN_MESSAGES.GENERIC_FAILURE, ConversationStep.IDLE, 'main');
      }

      throw error;
    }
  }

  private async handleCode(userId: number, text: string): Promise<LoginReply> {
    const outcome = await this.registry.submitCode(userId, text.trim());

    switch (outcome.status) {
      case 'success':
        this.logSuccess(userId, outcome);
        return this.reply(userId, LOGIN_MESSAGES.LOGIN_SUCCESS, ConversationStep.IDLE, 'main');
      case 'two_factor_required':
        return this.reply(
          userId,
          LOGIN_MESSAGES.ASK_TWO_FACTOR,
          ConversationStep.AWAITING_TWO_FACTOR,
        );
      case 'retryable':
        return this.reply(
          userId,
          outcome.reason === 'code_invalid'
            ? LOGIN_MESSAGES.CODE_INVALID
            : LOGIN_MESSAGES.CODE_EXPIRED,
          ConversationStep.AWAITING_CODE,
        );
      case 'failed':
        this.logger.warn(`Code sign-in for user ${userId} failed: ${outcome.detail}`);
        return this.reply(userId, LOGIN_MESSAGES.CODE_FAILED, ConversationStep.AWAITING_CODE);
      case 'no_pending_auth':
        return this.noPendingLogin(userId);
    }
  }

  private async handleTwoFactor(userId: number, password: string): Promise<LoginReply> {
    const outcome = await this.registry.submitTwoFactor(userId, password);

    switch (outcome.status) {
      case 'success':
        this.logSuccess(userId, outcome);
        return this.reply(
          userId,
          LOGIN_MESSAGES.TWO_FACTOR_SUCCESS,
          ConversationStep.IDLE,
          'main',
        );
      case 'failed':
        this.logger.warn(`Password sign-in for user ${userId} failed: ${outcome.detail}`);
        return this.reply(
          userId,
          outcome.reason === 'password_invalid'
            ? LOGIN_MESSAGES.TWO_FACTOR_INVALID
            : LOGIN_MESSAGES.GENERIC_FAILURE,
          ConversationStep.IDLE,
          'main',
        );
      case 'no_pending_auth':
        return this.noPendingLogin(userId);
      default:
        this.logger.warn(`Unexpected password outcome ${outcome.status} for user ${userId}`);
        await this.registry.abandon(userId);
        return this.reply(userId, LOGIN_MESSAGES.GENERIC_FAILURE, ConversationStep.IDLE, 'main');
    }
  }

  private noPendingLogin(userId: number): LoginReply {
    this.logger.warn(`[${LoginErrorCode.NO_PENDING_AUTHENTICATION}] User ${userId}`);
    return this.reply(userId, LOGIN_MESSAGES.NO_PENDING_LOGIN, ConversationStep.IDLE, 'main');
  }

  private logSuccess(userId: number, outcome: Extract<SignInOutcome, { status: 'success' }>): void {
    this.logger.log(`User ${userId} signed in account ${outcome.account.accountId}`);
  }

  private reply(
    userId: number,
    text: string,
    step: ConversationStep,
    keyboard?: MenuKeyboard,
  ): LoginReply {
    this.conversationState.setStep(userId, step);
    return keyboard ? { text, step, keyboard } : { text, step };
  }
}
