import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BaseAccountClientProvider } from './providers/base-account-client.provider';
import { SandboxAccountClientProvider } from './providers/sandbox-account-client.provider';
import { TelegramAccountClientProvider } from './providers/telegram-account-client.provider';
import { AccountClientConnection } from './account-client.types';

/**
 * Account client capability. Picks the sandbox or the MTProto provider from configuration.
 */
@Injectable()
export class AccountClientService {
  private readonly logger = new Logger(AccountClientService.name);
  private readonly provider: BaseAccountClientProvider;

  constructor(private configService: ConfigService) {
    const isSandbox = this.configService.get<boolean>('account.sandbox');

    if (isSandbox) {
      this.provider = new SandboxAccountClientProvider({
        loginCode: this.configService.get<string>('account.sandboxCode', '12345'),
        twoFactorPassword: this.configService.get<string>('account.sandboxPassword'),
      });
      this.logger.log('Account client initialized with SandboxAccountClientProvider');
    } else {
      this.provider = new TelegramAccountClientProvider({
        apiId: this.configService.getOrThrow<number>('account.apiId'),
        apiHash: this.configService.getOrThrow<string>('account.apiHash'),
        connectionRetries: this.configService.get<number>('account.connectionRetries', 5),
        sessionsDir: this.configService.get<string>('account.sessionsDir', 'sessions'),
      });
      this.logger.log('Account client initialized with TelegramAccountClientProvider');
    }
  }

  async connect(sessionName: string): Promise<AccountClientConnection> {
    try {
      return await this.provider.connect(sessionName);
    } catch (error) {
      this.logger.error(`Failed to connect account client for ${sessionName}:`, error);
      throw error;
    }
  }
}
