import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AccountClientService } from '../account-client/account-client.service';
import {
  AccountClientConnection,
  AccountClientError,
  AccountIdentity,
} from '../account-client/account-client.types';
import { AccountStoreService } from '../accounts/account-store.service';
import { PhoneNumberStatus } from '../accounts/entities/phone-number.entity';
import { AuditLoggerService } from '../common/services/audit-logger.service';
import { MetricsService } from '../common/services/metrics.service';
import { RedisService } from '../redis/redis.service';
import {
  InvalidPhoneFormatError,
  LoginError,
  ProviderError,
  ProviderRateLimitedError,
} from './errors/login.errors';
import { deriveSessionName } from './helpers/session-name.helper';
import { describeError } from './helpers/error.helper';
import {
  BeginLoginRequest,
  CodeRequestResult,
  PendingAuthentication,
  SignInOutcome,
} from './types/login.types';

/**
 * In-memory registry of in-flight logins, at most one per user.
 *
 * Owns the account-client connection of every entry: connections are closed
 * when an entry completes, fails terminally, is replaced, abandoned or expires.
 */
@Injectable()
export class PendingAuthRegistry implements OnModuleDestroy {
  private readonly logger = new Logger(PendingAuthRegistry.name);
  private readonly pending = new Map<number, PendingAuthentication>();

  constructor(
    private accountClient: AccountClientService,
    private accountStore: AccountStoreService,
    private redisService: RedisService,
    private configService: ConfigService,
    private auditLogger: AuditLoggerService,
    private metricsService: MetricsService,
  ) {}

  async onModuleDestroy(): Promise<void> {
    const entries = [...this.pending.values()];
    this.pending.clear();
    this.metricsService.setPendingFlows(0);
    await Promise.all(entries.map((entry) => this.closeConnection(entry.connection)));
  }

  has(userId: number): boolean {
    return this.pending.has(userId);
  }

  get size(): number {
    return this.pending.size;
  }

  /**
   * Requests a login code for the phone number and registers the attempt.
   * Any earlier attempt of the same user is closed first.
   *
   * @throws InvalidPhoneFormatError when the provider rejects the number
   * @throws ProviderRateLimitedError when the provider asks to wait
   * @throws ProviderError for any other failure
   */
  async begin(request: BeginLoginRequest): Promise<CodeRequestResult> {
    const { userId, phoneNumber } = request;

    if (await this.discard(userId)) {
      this.logger.log(`Replaced pending login of user ${userId}`);
    }

    try {
      return await this.requestCode(request);
    } catch (error) {
      const loginError = await this.toBeginError(phoneNumber, error);
      await this.accountStore.updatePhoneStatus(
        request.phoneRecordId,
        PhoneNumberStatus.FAILED,
        false,
      );

      if (loginError instanceof ProviderRateLimitedError) {
        this.auditLogger.logRateLimited(userId, phoneNumber, loginError.waitSeconds);
        this.metricsService.incrementCodeRequest('rate_limited');
      } else {
        this.logger.warn(`Code request failed for user ${userId}: ${loginError.message}`);
        this.auditLogger.logCodeRequestFailed(userId, phoneNumber, loginError.code);
        this.metricsService.incrementCodeRequest('failed');
      }

      throw loginError;
    }
  }

  /**
   * Completes the login with the code the user received.
   * The entry survives every outcome except success.
   */
  async submitCode(userId: number, code: string): Promise<SignInOutcome> {
    const entry = this.pending.get(userId);
    if (!entry) {
      return { status: 'no_pending_auth' };
    }

    entry.lastActivityAt = new Date();
    const startTime = Date.now();

    let account: AccountIdentity;
    try {
      account = await entry.connection.signInWithCode(entry.phoneNumber, code, entry.codeToken);
    } catch (error) {
      return this.toCodeOutcome(entry, error);
    } finally {
      this.metricsService.recordSignInDuration((Date.now() - startTime) / 1000);
    }

    return await this.complete(entry, account, 'code');
  }

  /**
   * Completes the login with the second-factor password.
   * A failure ends the attempt; there is no retry.
   */
  async submitTwoFactor(userId: number, password: string): Promise<SignInOutcome> {
    const entry = this.pending.get(userId);
    if (!entry) {
      return { status: 'no_pending_auth' };
    }

    entry.lastActivityAt = new Date();
    const startTime = Date.now();

    let account: AccountIdentity;
    try {
      account = await entry.connection.signInWithPassword(password);
    } catch (error) {
      this.remove(entry);
      await this.closeConnection(entry.connection);
      await this.accountStore.updatePhoneStatus(
        entry.phoneRecordId,
        PhoneNumberStatus.FAILED,
        false,
      );

      const detail = describeError(error);
      const passwordRejected =
        error instanceof AccountClientError && error.reason === 'PASSWORD_HASH_INVALID';

      this.auditLogger.logSignInFailed(userId, entry.phoneNumber, 'password', detail);
      this.metricsService.incrementSignIn('password', 'failed');

      return {
        status: 'failed',
        reason: passwordRejected ? 'password_invalid' : 'provider_error',
        detail,
      };
    } finally {
      this.metricsService.recordSignInDuration((Date.now() - startTime) / 1000);
    }

    return await this.complete(entry, account, 'password');
  }

  /**
   * Drops the user's attempt, if any, and closes its connection.
   *
   * @returns true when an attempt was dropped
   */
  async abandon(userId: number): Promise<boolean> {
    const entry = this.pending.get(userId);
    const dropped = await this.discard(userId);

    if (entry && dropped) {
      this.auditLogger.logFlowClosed(userId, entry.phoneNumber, false);
    }

    return dropped;
  }

  /**
   * Drops attempts idle since before `cutoff`.
   *
   * @returns User ids whose attempt was dropped
   */
  async expireOlderThan(cutoff: Date): Promise<number[]> {
    const expired = [...this.pending.values()].filter((entry) => entry.lastActivityAt < cutoff);

    // Entries leave the map before the first await so a login restarted while
    // connections are closing is never touched.
    for (const entry of expired) {
      this.remove(entry);
    }

    for (const entry of expired) {
      await this.closeConnection(entry.connection);
      this.auditLogger.logFlowClosed(entry.userId, entry.phoneNumber, true);
    }

    if (expired.length > 0) {
      this.metricsService.incrementExpiredFlows(expired.length);
    }

    return expired.map((entry) => entry.userId);
  }

  private async requestCode(request: BeginLoginRequest): Promise<CodeRequestResult> {
    const { userId, phoneNumber, phoneRecordId } = request;

    const cooldown = await this.readCooldown(phoneNumber);
    if (cooldown > 0) {
      throw new ProviderRateLimitedError(cooldown);
    }

    const sessionName = deriveSessionName(userId, phoneNumber);
    const connection = await this.accountClient.connect(sessionName);

    try {
      if (await connection.isAuthorized()) {
        const sessionRef = await connection.saveSession();
        await this.accountStore.upsertSession(userId, phoneNumber, sessionRef);
        await this.accountStore.updatePhoneStatus(
          phoneRecordId,
          PhoneNumberStatus.AUTHENTICATED,
          true,
        );
        await this.closeConnection(connection);

        this.auditLogger.logAlreadyAuthorized(userId, phoneNumber);
        this.metricsService.incrementCodeRequest('already_authorized');
        return { status: 'already_authorized', phoneNumber };
      }

      const codeToken = await connection.requestCode(phoneNumber);
      const now = new Date();

      this.pending.set(userId, {
        userId,
        phoneNumber,
        phoneRecordId,
        connection,
        codeToken,
        sessionName,
        startedAt: now,
        lastActivityAt: now,
      });
      this.metricsService.setPendingFlows(this.pending.size);

      this.auditLogger.logCodeRequested(userId, phoneNumber);
      this.metricsService.incrementCodeRequest('sent');
      return { status: 'code_sent', phoneNumber };
    } catch (error) {
      await this.closeConnection(connection);
      throw error;
    }
  }

  private toCodeOutcome(entry: PendingAuthentication, error: unknown): SignInOutcome {
    const { userId, phoneNumber } = entry;

    if (error instanceof AccountClientError) {
      switch (error.reason) {
        case 'SESSION_PASSWORD_NEEDED':
          this.auditLogger.logTwoFactorRequired(userId, phoneNumber);
          this.metricsService.incrementSignIn('code', 'two_factor_required');
          return { status: 'two_factor_required', phoneNumber };
        case 'PHONE_CODE_INVALID':
          this.metricsService.incrementSignIn('code', 'retryable');
          return { status: 'retryable', reason: 'code_invalid' };
        case 'PHONE_CODE_EXPIRED':
          this.metricsService.incrementSignIn('code', 'retryable');
          return { status: 'retryable', reason: 'code_expired' };
      }
    }

    const detail = describeError(error);
    this.logger.error(`Code sign-in failed for user ${userId}: ${detail}`);
    this.auditLogger.logSignInFailed(userId, phoneNumber, 'code', detail);
    this.metricsService.incrementSignIn('code', 'failed');
    return { status: 'failed', reason: 'provider_error', detail };
  }

  private async complete(
    entry: PendingAuthentication,
    account: AccountIdentity,
    step: 'code' | 'password',
  ): Promise<SignInOutcome> {
    const sessionRef = await entry.connection.saveSession();
    await this.accountStore.upsertSession(entry.userId, entry.phoneNumber, sessionRef);
    await this.accountStore.updatePhoneStatus(
      entry.phoneRecordId,
      PhoneNumberStatus.AUTHENTICATED,
      true,
    );

    this.remove(entry);
    await this.closeConnection(entry.connection);

    this.auditLogger.logSignInSucceeded(entry.userId, entry.phoneNumber, step);
    this.metricsService.incrementSignIn(step, 'success');

    return { status: 'success', phoneNumber: entry.phoneNumber, account };
  }

  private async toBeginError(phoneNumber: string, error: unknown): Promise<LoginError> {
    if (error instanceof LoginError) {
      return error;
    }

    if (error instanceof AccountClientError) {
      if (error.reason === 'PHONE_NUMBER_INVALID') {
        return new InvalidPhoneFormatError(phoneNumber);
      }

      if (error.reason === 'FLOOD_WAIT') {
        const waitSeconds = error.waitSeconds ?? 0;
        if (waitSeconds > 0) {
          await this.storeCooldown(phoneNumber, waitSeconds);
        }
        return new ProviderRateLimitedError(waitSeconds);
      }
    }

    return new ProviderError(describeError(error));
  }

  private async discard(userId: number): Promise<boolean> {
    const entry = this.pending.get(userId);
    if (!entry) {
      return false;
    }

    this.remove(entry);
    await this.closeConnection(entry.connection);
    return true;
  }

  /**
   * Deletes the entry only while it is still the user's current one.
   */
  private remove(entry: PendingAuthentication): void {
    if (this.pending.get(entry.userId) !== entry) {
      return;
    }

    this.pending.delete(entry.userId);
    this.metricsService.setPendingFlows(this.pending.size);
  }

  private async closeConnection(connection: AccountClientConnection): Promise<void> {
    try {
      await connection.disconnect();
    } catch (error) {
      this.logger.warn(
        `Failed to disconnect ${connection.sessionName}: ${describeError(error)}`,
      );
    }
  }

  /**
   * Remaining flood wait in seconds. The cooldown is advisory: without Redis
   * the provider is asked and answers with its own wait.
   */
  private async readCooldown(phoneNumber: string): Promise<number> {
    try {
      return await this.redisService.ttl(this.floodKey(phoneNumber));
    } catch (error) {
      this.logger.warn(`Failed to read flood cooldown: ${describeError(error)}`);
      return 0;
    }
  }

  private async storeCooldown(phoneNumber: string, waitSeconds: number): Promise<void> {
    try {
      await this.redisService.setex(this.floodKey(phoneNumber), waitSeconds, '1');
    } catch (error) {
      this.logger.warn(`Failed to store flood cooldown: ${describeError(error)}`);
    }
  }

  private floodKey(phoneNumber: string): string {
    const prefix = this.configService.get<string>('login.floodKeyPrefix', 'login:flood:');
    return `${prefix}${phoneNumber}`;
  }
}
