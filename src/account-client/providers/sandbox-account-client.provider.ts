import { randomUUID } from 'crypto';
import { BaseAccountClientProvider } from './base-account-client.provider';
import {
  AccountClientConnection,
  AccountClientError,
  AccountIdentity,
} from '../account-client.types';

export interface SandboxAccountClientOptions {
  loginCode: string;
  twoFactorPassword?: string;
}

const MIN_PHONE_DIGITS = 8;

/**
 * In-process provider for development and tests.
 * Accepts one fixed code and, when configured, one fixed second-factor password.
 */
export class SandboxAccountClientProvider extends BaseAccountClientProvider {
  private readonly savedSessions = new Set<string>();

  constructor(private readonly options: SandboxAccountClientOptions) {
    super('SandboxAccountClientProvider');
  }

  async connect(sessionName: string): Promise<AccountClientConnection> {
    this.logger.debug(`[SANDBOX] Connecting session ${sessionName}`);
    return new SandboxConnection(sessionName, this.options, this.savedSessions, (phone) =>
      this.countDigits(phone),
    );
  }
}

class SandboxConnection implements AccountClientConnection {
  private issuedToken: string | null = null;
  private awaitingPassword = false;
  private authorized: boolean;
  private phoneNumber: string | null = null;

  constructor(
    readonly sessionName: string,
    private readonly options: SandboxAccountClientOptions,
    private readonly savedSessions: Set<string>,
    private readonly countDigits: (phone: string) => number,
  ) {
    this.authorized = savedSessions.has(sessionName);
  }

  async isAuthorized(): Promise<boolean> {
    return this.authorized;
  }

  async requestCode(phoneNumber: string): Promise<string> {
    if (this.countDigits(phoneNumber) < MIN_PHONE_DIGITS) {
      throw new AccountClientError('PHONE_NUMBER_INVALID', 'PHONE_NUMBER_INVALID');
    }

    this.phoneNumber = phoneNumber;
    this.issuedToken = `sandbox-${randomUUID()}`;
    return this.issuedToken;
  }

  async signInWithCode(
    phoneNumber: string,
    code: string,
    codeToken: string,
  ): Promise<AccountIdentity> {
    if (!this.issuedToken || codeToken !== this.issuedToken || phoneNumber !== this.phoneNumber) {
      throw new AccountClientError('PHONE_CODE_EXPIRED', 'PHONE_CODE_EXPIRED');
    }

    if (code.trim() !== this.options.loginCode) {
      throw new AccountClientError('PHONE_CODE_INVALID', 'PHONE_CODE_INVALID');
    }

    if (this.options.twoFactorPassword) {
      this.awaitingPassword = true;
      throw new AccountClientError('SESSION_PASSWORD_NEEDED', 'SESSION_PASSWORD_NEEDED');
    }

    return this.authorize();
  }

  async signInWithPassword(password: string): Promise<AccountIdentity> {
    if (!this.awaitingPassword || password !== this.options.twoFactorPassword) {
      throw new AccountClientError('PASSWORD_HASH_INVALID', 'PASSWORD_HASH_INVALID');
    }

    return this.authorize();
  }

  async saveSession(): Promise<string> {
    if (!this.authorized) {
      throw new Error(`Session ${this.sessionName} is not authorized`);
    }

    this.savedSessions.add(this.sessionName);
    return `sandbox:${this.sessionName}`;
  }

  async disconnect(): Promise<void> {
    this.issuedToken = null;
    this.awaitingPassword = false;
  }

  private authorize(): AccountIdentity {
    this.authorized = true;
    this.awaitingPassword = false;
    const digits = (this.phoneNumber ?? '').replace(/\D/g, '');
    return {
      accountId: `sandbox-${digits}`,
      displayName: `Sandbox ${digits.slice(-4)}`,
    };
  }
}
