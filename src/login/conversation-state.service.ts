import { Injectable } from '@nestjs/common';
import { validateSync } from 'class-validator';
import { ConversationState, ConversationStep } from './types/login.types';
import { PhoneNumberInputDto } from './dto/phone-number-input.dto';

export interface PhoneValidationResult {
  isValid: boolean;
  phoneNumber: string;
  errors: string[];
}

/**
 * Per-user record of which input the bot expects next.
 * Holds no login logic; transitions are decided by the orchestrator.
 */
@Injectable()
export class ConversationStateService {
  private readonly states = new Map<number, ConversationState>();

  getStep(userId: number): ConversationStep {
    return this.states.get(userId)?.step ?? ConversationStep.IDLE;
  }

  /**
   * Setting IDLE drops the entry.
   */
  setStep(userId: number, step: ConversationStep): void {
    if (step === ConversationStep.IDLE) {
      this.states.delete(userId);
      return;
    }

    this.states.set(userId, { userId, step, lastActivityAt: new Date() });
  }

  clear(userId: number): void {
    this.states.delete(userId);
  }

  get size(): number {
    return this.states.size;
  }

  /**
   * Drops states untouched since `cutoff`.
   *
   * @returns User ids whose state was dropped
   */
  expireOlderThan(cutoff: Date): number[] {
    const expired: number[] = [];

    for (const [userId, state] of this.states) {
      if (state.lastActivityAt < cutoff) {
        this.states.delete(userId);
        expired.push(userId);
      }
    }

    return expired;
  }

  validatePhoneNumber(text: string): PhoneValidationResult {
    const input = new PhoneNumberInputDto(text.trim());
    const errors = validateSync(input).flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );

    return { isValid: errors.length === 0, phoneNumber: input.phoneNumber, errors };
  }
}
