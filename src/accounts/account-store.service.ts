import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { BotUser } from './entities/bot-user.entity';
import { PhoneNumber, PhoneNumberStatus } from './entities/phone-number.entity';
import { AccountSession } from './entities/account-session.entity';

export interface BotUserProfile {
  id: number;
  username?: string;
  firstName?: string;
  lastName?: string;
}

/**
 * Persistence for bot users, submitted phone numbers and account session handles.
 * Every write is a single-row statement.
 */
@Injectable()
export class AccountStoreService {
  constructor(
    @InjectRepository(BotUser)
    private userRepository: Repository<BotUser>,
    @InjectRepository(PhoneNumber)
    private phoneNumberRepository: Repository<PhoneNumber>,
    @InjectRepository(AccountSession)
    private sessionRepository: Repository<AccountSession>,
  ) {}

  /**
   * Creates the user on first contact and refreshes the display fields afterwards.
   */
  async upsertUser(profile: BotUserProfile): Promise<void> {
    await this.userRepository.upsert(
      {
        id: profile.id,
        username: profile.username ?? null,
        firstName: profile.firstName ?? null,
        lastName: profile.lastName ?? null,
        isActive: true,
      },
      ['id'],
    );
  }

  /**
   * Records a phone number submission.
   *
   * @returns Id of the new record
   */
  async insertPhoneNumber(userId: number, phoneNumber: string): Promise<number> {
    const record = this.phoneNumberRepository.create({
      userId,
      phoneNumber,
      isAuthenticated: false,
      status: PhoneNumberStatus.PENDING,
    });
    const saved = await this.phoneNumberRepository.save(record);
    return saved.id;
  }

  /**
   * All submissions of a user, newest first.
   */
  async listPhoneNumbers(userId: number): Promise<PhoneNumber[]> {
    return await this.phoneNumberRepository.find({
      where: { userId },
      order: { addedAt: 'DESC', id: 'DESC' },
    });
  }

  async getPhoneNumber(userId: number, recordId: number): Promise<PhoneNumber | null> {
    return await this.phoneNumberRepository.findOne({
      where: { id: recordId, userId },
    });
  }

  async updatePhoneStatus(
    recordId: number,
    status: PhoneNumberStatus,
    authenticated: boolean,
  ): Promise<void> {
    await this.phoneNumberRepository.update(recordId, {
      status,
      isAuthenticated: authenticated,
      ...(authenticated ? { lastLoginAt: new Date() } : {}),
    });
  }

  /**
   * Stores the session reference, replacing any existing one for the same pair.
   */
  async upsertSession(userId: number, phoneNumber: string, sessionRef: string): Promise<void> {
    await this.sessionRepository.upsert(
      {
        userId,
        phoneNumber,
        sessionRef,
        isActive: true,
      },
      ['userId', 'phoneNumber'],
    );
  }

  async getActiveSessionRef(userId: number, phoneNumber: string): Promise<string | null> {
    const session = await this.sessionRepository.findOne({
      where: { userId, phoneNumber, isActive: true },
    });
    return session ? session.sessionRef : null;
  }
}
