import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { AccountClientService } from './account-client.service';
import { AccountClientError } from './account-client.types';
import { toAccountClientError } from './providers/telegram-account-client.provider';

describe('AccountClientService', () => {
  let service: AccountClientService;
  let config: Record<string, unknown>;

  const mockConfigService = {
    get: jest.fn((key: string, defaultValue?: unknown) => config[key] ?? defaultValue),
    getOrThrow: jest.fn((key: string) => config[key]),
  };

  const createService = async (): Promise<AccountClientService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AccountClientService,
        {
          provide: ConfigService,
          useValue: mockConfigService,
        },
      ],
    }).compile();

    return module.get<AccountClientService>(AccountClientService);
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    config = {
      'account.sandbox': true,
      'account.sandboxCode': '24680',
    };
    service = await createService();
  });

  describe('initialization', () => {
    it('should build the MTProto provider when the sandbox is off', async () => {
      config = {
        'account.sandbox': false,
        'account.apiId': 12345,
        'account.apiHash': 'test-api-hash',
      };

      const productionService = await createService();

      expect(productionService).toBeDefined();
      expect(mockConfigService.getOrThrow).toHaveBeenCalledWith('account.apiId');
      expect(mockConfigService.getOrThrow).toHaveBeenCalledWith('account.apiHash');
    });
  });

  describe('sandbox provider', () => {
    it('should sign in with the configured code', async () => {
      const connection = await service.connect('session_a');

      await expect(connection.isAuthorized()).resolves.toBe(false);
      const token = await connection.requestCode('+15551234567');
      const identity = await connection.signInWithCode('+15551234567', '24680', token);

      expect(identity).toEqual({ accountId: 'sandbox-15551234567', displayName: 'Sandbox 4567' });
      await expect(connection.saveSession()).resolves.toBe('sandbox:session_a');
    });

    it('should reject a phone number with too few digits', async () => {
      const connection = await service.connect('session_a');

      await expect(connection.requestCode('+1234')).rejects.toMatchObject({
        reason: 'PHONE_NUMBER_INVALID',
      });
    });

    it('should reject a wrong code', async () => {
      const connection = await service.connect('session_a');
      const token = await connection.requestCode('+15551234567');

      await expect(
        connection.signInWithCode('+15551234567', '11111', token),
      ).rejects.toMatchObject({ reason: 'PHONE_CODE_INVALID' });
    });

    it('should treat an unknown token as an expired code', async () => {
      const connection = await service.connect('session_a');
      await connection.requestCode('+15551234567');

      await expect(
        connection.signInWithCode('+15551234567', '24680', 'stale-token'),
      ).rejects.toMatchObject({ reason: 'PHONE_CODE_EXPIRED' });
    });

    it('should report saved sessions as authorized on the next connect', async () => {
      const first = await service.connect('session_b');
      const token = await first.requestCode('+15551234567');
      await first.signInWithCode('+15551234567', '24680', token);
      await first.saveSession();
      await first.disconnect();

      const second = await service.connect('session_b');

      await expect(second.isAuthorized()).resolves.toBe(true);
    });

    it('should refuse to save an unauthorized session', async () => {
      const connection = await service.connect('session_c');

      await expect(connection.saveSession()).rejects.toThrow('is not authorized');
    });
  });

  describe('sandbox provider with a second factor', () => {
    beforeEach(async () => {
      config = {
        'account.sandbox': true,
        'account.sandboxCode': '24680',
        'account.sandboxPassword': 'test-password',
      };
      service = await createService();
    });

    it('should ask for the password after a correct code', async () => {
      const connection = await service.connect('session_a');
      const token = await connection.requestCode('+15551234567');

      await expect(
        connection.signInWithCode('+15551234567', '24680', token),
      ).rejects.toMatchObject({ reason: 'SESSION_PASSWORD_NEEDED' });

      await expect(connection.signInWithPassword('test-password')).resolves.toEqual({
        accountId: 'sandbox-15551234567',
        displayName: 'Sandbox 4567',
      });
    });

    it('should reject a wrong password', async () => {
      const connection = await service.connect('session_a');
      const token = await connection.requestCode('+15551234567');
      await connection.signInWithCode('+15551234567', '24680', token).catch(() => undefined);

      await expect(connection.signInWithPassword('wrong')).rejects.toBeInstanceOf(
        AccountClientError,
      );
    });
  });

  describe('toAccountClientError', () => {
    it('should pass through errors that are not RPC errors', () => {
      const error = new Error('socket closed');

      expect(toAccountClientError(error)).toBe(error);
    });
  });
});
