import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { PendingAuthRegistry } from './pending-auth.registry';
import { AccountClientService } from '../account-client/account-client.service';
import { AccountClientError } from '../account-client/account-client.types';
import { AccountStoreService } from '../accounts/account-store.service';
import { PhoneNumberStatus } from '../accounts/entities/phone-number.entity';
import { AuditLoggerService } from '../common/services/audit-logger.service';
import { MetricsService } from '../common/services/metrics.service';
import { RedisService } from '../redis/redis.service';
import {
  InvalidPhoneFormatError,
  ProviderError,
  ProviderRateLimitedError,
} from './errors/login.errors';
import { deriveSessionName } from './helpers/session-name.helper';

describe('PendingAuthRegistry', () => {
  let registry: PendingAuthRegistry;

  const USER_ID = 1001;
  const PHONE = '+15551234567';
  const RECORD_ID = 7;
  const identity = { accountId: '555', username: 'ada' };

  const createConnection = () => ({
    sessionName: deriveSessionName(USER_ID, PHONE),
    isAuthorized: jest.fn().mockResolvedValue(false),
    requestCode: jest.fn().mockResolvedValue('code-token'),
    signInWithCode: jest.fn().mockResolvedValue(identity),
    signInWithPassword: jest.fn().mockResolvedValue(identity),
    saveSession: jest.fn().mockResolvedValue('sessions/test.session'),
    disconnect: jest.fn().mockResolvedValue(undefined),
  });

  let connection: ReturnType<typeof createConnection>;

  const mockAccountClient = {
    connect: jest.fn(),
  };

  const mockAccountStore = {
    upsertSession: jest.fn(),
    updatePhoneStatus: jest.fn(),
  };

  const mockRedisService = {
    ttl: jest.fn(),
    setex: jest.fn(),
  };

  const mockConfigService = {
    get: jest.fn((_key: string, defaultValue?: unknown) => defaultValue),
  };

  const mockAuditLogger = {
    logCodeRequested: jest.fn(),
    logCodeRequestFailed: jest.fn(),
    logAlreadyAuthorized: jest.fn(),
    logSignInSucceeded: jest.fn(),
    logSignInFailed: jest.fn(),
    logTwoFactorRequired: jest.fn(),
    logRateLimited: jest.fn(),
    logFlowClosed: jest.fn(),
  };

  const mockMetricsService = {
    incrementCodeRequest: jest.fn(),
    incrementSignIn: jest.fn(),
    recordSignInDuration: jest.fn(),
    setPendingFlows: jest.fn(),
    incrementExpiredFlows: jest.fn(),
  };

  const begin = () =>
    registry.begin({ userId: USER_ID, phoneNumber: PHONE, phoneRecordId: RECORD_ID });

  beforeEach(async () => {
    jest.clearAllMocks();

    connection = createConnection();
    mockAccountClient.connect.mockResolvedValue(connection);
    mockRedisService.ttl.mockResolvedValue(-2);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PendingAuthRegistry,
        { provide: AccountClientService, useValue: mockAccountClient },
        { provide: AccountStoreService, useValue: mockAccountStore },
        { provide: RedisService, useValue: mockRedisService },
        { provide: ConfigService, useValue: mockConfigService },
        { provide: AuditLoggerService, useValue: mockAuditLogger },
        { provide: MetricsService, useValue: mockMetricsService },
      ],
    }).compile();

    registry = module.get<PendingAuthRegistry>(PendingAuthRegistry);
  });

  describe('begin', () => {
    it('should request a code and register the attempt', async () => {
      const result = await begin();

      expect(result).toEqual({ status: 'code_sent', phoneNumber: PHONE });
      expect(mockAccountClient.connect).toHaveBeenCalledWith(deriveSessionName(USER_ID, PHONE));
      expect(connection.requestCode).toHaveBeenCalledWith(PHONE);
      expect(registry.has(USER_ID)).toBe(true);
      expect(registry.size).toBe(1);
      expect(connection.disconnect).not.toHaveBeenCalled();
      expect(mockMetricsService.incrementCodeRequest).toHaveBeenCalledWith('sent');
    });

    it('should replace an earlier attempt and close its connection', async () => {
      await begin();
      const second = createConnection();
      mockAccountClient.connect.mockResolvedValue(second);

      await begin();

      expect(connection.disconnect).toHaveBeenCalledTimes(1);
      expect(second.disconnect).not.toHaveBeenCalled();
      expect(registry.size).toBe(1);
    });

    it('should persist a still-authorized session without requesting a code', async () => {
      connection.isAuthorized.mockResolvedValue(true);

      const result = await begin();

      expect(result).toEqual({ status: 'already_authorized', phoneNumber: PHONE });
      expect(connection.requestCode).not.toHaveBeenCalled();
      expect(mockAccountStore.upsertSession).toHaveBeenCalledWith(
        USER_ID,
        PHONE,
        'sessions/test.session',
      );
      expect(mockAccountStore.updatePhoneStatus).toHaveBeenCalledWith(
        RECORD_ID,
        PhoneNumberStatus.AUTHENTICATED,
        true,
      );
      expect(connection.disconnect).toHaveBeenCalledTimes(1);
      expect(registry.has(USER_ID)).toBe(false);
    });

    it('should map a rejected phone number and mark the record failed', async () => {
      connection.requestCode.mockRejectedValue(
        new AccountClientError('PHONE_NUMBER_INVALID', 'PHONE_NUMBER_INVALID'),
      );

      await expect(begin()).rejects.toBeInstanceOf(InvalidPhoneFormatError);

      expect(connection.disconnect).toHaveBeenCalledTimes(1);
      expect(mockAccountStore.updatePhoneStatus).toHaveBeenCalledWith(
        RECORD_ID,
        PhoneNumberStatus.FAILED,
        false,
      );
      expect(registry.has(USER_ID)).toBe(false);
      expect(mockMetricsService.incrementCodeRequest).toHaveBeenCalledWith('failed');
    });

    it('should store the flood wait as a cooldown', async () => {
      connection.requestCode.mockRejectedValue(
        new AccountClientError('FLOOD_WAIT', 'A wait of 120 seconds is required', 120),
      );

      const error = await begin().catch((rejection: unknown) => rejection);

      expect(error).toBeInstanceOf(ProviderRateLimitedError);
      expect(error).toMatchObject({ waitSeconds: 120 });

      expect(mockRedisService.setex).toHaveBeenCalledWith(`login:flood:${PHONE}`, 120, '1');
      expect(mockAuditLogger.logRateLimited).toHaveBeenCalledWith(USER_ID, PHONE, 120);
      expect(mockMetricsService.incrementCodeRequest).toHaveBeenCalledWith('rate_limited');
    });

    it('should still report the flood wait when the cooldown cannot be stored', async () => {
      connection.requestCode.mockRejectedValue(
        new AccountClientError('FLOOD_WAIT', 'A wait of 120 seconds is required', 120),
      );
      mockRedisService.setex.mockRejectedValueOnce(new Error('ECONNREFUSED'));

      const error = await begin().catch((rejection: unknown) => rejection);

      expect(error).toBeInstanceOf(ProviderRateLimitedError);
      expect(error).toMatchObject({ waitSeconds: 120 });
      expect(mockAccountStore.updatePhoneStatus).toHaveBeenCalledWith(
        RECORD_ID,
        PhoneNumberStatus.FAILED,
        false,
      );
      expect(mockAuditLogger.logRateLimited).toHaveBeenCalledWith(USER_ID, PHONE, 120);
    });

    it('should request a code when the cooldown cannot be read', async () => {
      mockRedisService.ttl.mockRejectedValueOnce(new Error('ECONNREFUSED'));

      const result = await begin();

      expect(result).toEqual({ status: 'code_sent', phoneNumber: PHONE });
      expect(connection.requestCode).toHaveBeenCalledWith(PHONE);
      expect(registry.has(USER_ID)).toBe(true);
    });

    it('should fail fast during a cooldown without connecting', async () => {
      mockRedisService.ttl.mockResolvedValue(45);

      await expect(begin()).rejects.toMatchObject({ waitSeconds: 45 });

      expect(mockRedisService.ttl).toHaveBeenCalledWith(`login:flood:${PHONE}`);
      expect(mockAccountClient.connect).not.toHaveBeenCalled();
      expect(mockAccountStore.updatePhoneStatus).toHaveBeenCalledWith(
        RECORD_ID,
        PhoneNumberStatus.FAILED,
        false,
      );
    });

    it('should wrap unexpected provider failures', async () => {
      connection.requestCode.mockRejectedValue(new Error('socket closed'));

      const error = await begin().catch((rejection: unknown) => rejection);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ detail: 'socket closed' });
      expect(connection.disconnect).toHaveBeenCalledTimes(1);
    });

    it('should wrap connection failures', async () => {
      mockAccountClient.connect.mockRejectedValue(new Error('network unreachable'));

      await expect(begin()).rejects.toBeInstanceOf(ProviderError);
      expect(mockAccountStore.updatePhoneStatus).toHaveBeenCalledWith(
        RECORD_ID,
        PhoneNumberStatus.FAILED,
        false,
      );
    });
  });

  describe('submitCode', () => {
    it('should report no pending login without touching the store', async () => {
      const outcome = await registry.submitCode(USER_ID, '12345');

      expect(outcome).toEqual({ status: 'no_pending_auth' });
      expect(mockAccountStore.upsertSession).not.toHaveBeenCalled();
      expect(mockAccountStore.updatePhoneStatus).not.toHaveBeenCalled();
    });

    it('should persist the session exactly once on success', async () => {
      await begin();

      const outcome = await registry.submitCode(USER_ID, '12345');

      expect(outcome).toEqual({ status: 'success', phoneNumber: PHONE, account: identity });
      expect(connection.signInWithCode).toHaveBeenCalledWith(PHONE, '12345', 'code-token');
      expect(mockAccountStore.upsertSession).toHaveBeenCalledTimes(1);
      expect(mockAccountStore.updatePhoneStatus).toHaveBeenCalledTimes(1);
      expect(mockAccountStore.updatePhoneStatus).toHaveBeenCalledWith(
        RECORD_ID,
        PhoneNumberStatus.AUTHENTICATED,
        true,
      );
      expect(registry.has(USER_ID)).toBe(false);
      expect(connection.disconnect).toHaveBeenCalledTimes(1);
    });

    it('should keep the attempt when a second factor is required', async () => {
      await begin();
      connection.signInWithCode.mockRejectedValue(
        new AccountClientError('SESSION_PASSWORD_NEEDED', 'SESSION_PASSWORD_NEEDED'),
      );

      const outcome = await registry.submitCode(USER_ID, '12345');

      expect(outcome).toEqual({ status: 'two_factor_required', phoneNumber: PHONE });
      expect(registry.has(USER_ID)).toBe(true);
      expect(connection.disconnect).not.toHaveBeenCalled();
    });

    it.each([
      ['PHONE_CODE_INVALID', 'code_invalid'],
      ['PHONE_CODE_EXPIRED', 'code_expired'],
    ] as const)('should report %s as retryable', async (reason, retryReason) => {
      await begin();
      connection.signInWithCode.mockRejectedValue(new AccountClientError(reason, reason));

      const outcome = await registry.submitCode(USER_ID, '00000');

      expect(outcome).toEqual({ status: 'retryable', reason: retryReason });
      expect(registry.has(USER_ID)).toBe(true);
    });

    it('should keep the attempt after other provider failures', async () => {
      await begin();
      connection.signInWithCode.mockRejectedValue(new Error('timeout'));

      const outcome = await registry.submitCode(USER_ID, '12345');

      expect(outcome).toEqual({ status: 'failed', reason: 'provider_error', detail: 'timeout' });
      expect(registry.has(USER_ID)).toBe(true);
      expect(mockAccountStore.updatePhoneStatus).not.toHaveBeenCalled();
    });
  });

  describe('submitTwoFactor', () => {
    beforeEach(async () => {
      await begin();
      connection.signInWithCode.mockRejectedValue(
        new AccountClientError('SESSION_PASSWORD_NEEDED', 'SESSION_PASSWORD_NEEDED'),
      );
      await registry.submitCode(USER_ID, '12345');
    });

    it('should report no pending login for other users', async () => {
      await expect(registry.submitTwoFactor(2002, 'test-password')).resolves.toEqual({
        status: 'no_pending_auth',
      });
    });

    it('should complete the login with the password', async () => {
      const outcome = await registry.submitTwoFactor(USER_ID, 'test-password');

      expect(outcome).toEqual({ status: 'success', phoneNumber: PHONE, account: identity });
      expect(mockAccountStore.upsertSession).toHaveBeenCalledTimes(1);
      expect(mockAuditLogger.logSignInSucceeded).toHaveBeenCalledWith(USER_ID, PHONE, 'password');
      expect(registry.has(USER_ID)).toBe(false);
    });

    it('should end the attempt on a wrong password', async () => {
      connection.signInWithPassword.mockRejectedValue(
        new AccountClientError('PASSWORD_HASH_INVALID', 'PASSWORD_HASH_INVALID'),
      );

      const outcome = await registry.submitTwoFactor(USER_ID, 'wrong');

      expect(outcome).toEqual({
        status: 'failed',
        reason: 'password_invalid',
        detail: 'PASSWORD_HASH_INVALID',
      });
      expect(registry.has(USER_ID)).toBe(false);
      expect(connection.disconnect).toHaveBeenCalledTimes(1);
      expect(mockAccountStore.upsertSession).not.toHaveBeenCalled();
      expect(mockAccountStore.updatePhoneStatus).toHaveBeenCalledWith(
        RECORD_ID,
        PhoneNumberStatus.FAILED,
        false,
      );
    });
  });

  describe('abandon', () => {
    it('should close and drop the attempt', async () => {
      await begin();

      await expect(registry.abandon(USER_ID)).resolves.toBe(true);
      expect(connection.disconnect).toHaveBeenCalledTimes(1);
      expect(mockAuditLogger.logFlowClosed).toHaveBeenCalledWith(USER_ID, PHONE, false);
      await expect(registry.abandon(USER_ID)).resolves.toBe(false);
    });

    it('should survive a failing disconnect', async () => {
      await begin();
      connection.disconnect.mockRejectedValue(new Error('already closed'));

      await expect(registry.abandon(USER_ID)).resolves.toBe(true);
      expect(registry.size).toBe(0);
    });
  });

  describe('expireOlderThan', () => {
    afterEach(() => {
      jest.useRealTimers();
    });

    it('should drop only attempts idle since before the cutoff', async () => {
      jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate'] });
      jest.setSystemTime(new Date('2024-05-01T10:00:00Z'));
      await begin();

      jest.setSystemTime(new Date('2024-05-01T10:30:00Z'));
      const other = createConnection();
      mockAccountClient.connect.mockResolvedValue(other);
      await registry.begin({ userId: 2002, phoneNumber: '+15557654321', phoneRecordId: 8 });

      const expired = await registry.expireOlderThan(new Date('2024-05-01T10:10:00Z'));

      expect(expired).toEqual([USER_ID]);
      expect(connection.disconnect).toHaveBeenCalledTimes(1);
      expect(other.disconnect).not.toHaveBeenCalled();
      expect(registry.has(2002)).toBe(true);
      expect(mockAuditLogger.logFlowClosed).toHaveBeenCalledWith(USER_ID, PHONE, true);
      expect(mockMetricsService.incrementExpiredFlows).toHaveBeenCalledWith(1);
    });

    it('should keep a login restarted while expired connections are closing', async () => {
      let releaseDisconnect: () => void = () => undefined;
      connection.disconnect.mockImplementation(
        () =>
          new Promise<void>((resolve) => {
            releaseDisconnect = resolve;
          }),
      );
      await begin();

      const stale = createConnection();
      mockAccountClient.connect.mockResolvedValue(stale);
      await registry.begin({ userId: 2002, phoneNumber: '+15557654321', phoneRecordId: 8 });

      const sweep = registry.expireOlderThan(new Date(Date.now() + 60_000));

      const fresh = createConnection();
      mockAccountClient.connect.mockResolvedValue(fresh);
      await registry.begin({ userId: 2002, phoneNumber: '+15557654321', phoneRecordId: 8 });

      releaseDisconnect();
      const expired = await sweep;

      expect(expired).toEqual([USER_ID, 2002]);
      expect(registry.has(USER_ID)).toBe(false);
      expect(registry.has(2002)).toBe(true);
      expect(stale.disconnect).toHaveBeenCalledTimes(1);
      expect(fresh.disconnect).not.toHaveBeenCalled();
    });
  });

  describe('onModuleDestroy', () => {
    it('should close every pending connection', async () => {
      await begin();

      await registry.onModuleDestroy();

      expect(connection.disconnect).toHaveBeenCalledTimes(1);
      expect(registry.size).toBe(0);
    });
  });
});
