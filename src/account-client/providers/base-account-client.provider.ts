import { Logger } from '@nestjs/common';
import { AccountClientConnection } from '../account-client.types';

/**
 * Base class for account client providers (Strategy pattern).
 */
export abstract class BaseAccountClientProvider {
  protected readonly logger: Logger;

  constructor(loggerContext: string) {
    this.logger = new Logger(loggerContext);
  }

  /**
   * Opens a connection bound to the session stored under `sessionName`, if any.
   */
  abstract connect(sessionName: string): Promise<AccountClientConnection>;

  protected countDigits(phoneNumber: string): number {
    return phoneNumber.replace(/\D/g, '').length;
  }
}
