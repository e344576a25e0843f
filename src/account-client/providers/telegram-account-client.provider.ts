import { promises as fs } from 'fs';
import * as path from 'path';
import { Api, TelegramClient } from 'telegram';
import { StringSession } from 'telegram/sessions';
import { FloodWaitError, RPCError } from 'telegram/errors';
import { computeCheck } from 'telegram/Password';
import { BaseAccountClientProvider } from './base-account-client.provider';
import {
  AccountClientConnection,
  AccountClientError,
  AccountClientErrorReason,
  AccountIdentity,
} from '../account-client.types';

export interface TelegramAccountClientOptions {
  apiId: number;
  apiHash: string;
  connectionRetries: number;
  sessionsDir: string;
}

const KNOWN_RPC_ERRORS: readonly AccountClientErrorReason[] = [
  'PHONE_NUMBER_INVALID',
  'PHONE_CODE_INVALID',
  'PHONE_CODE_EXPIRED',
  'SESSION_PASSWORD_NEEDED',
  'PASSWORD_HASH_INVALID',
];

/**
 * Converts GramJS RPC failures into AccountClientError; other errors pass through untouched.
 */
export function toAccountClientError(error: unknown): unknown {
  if (error instanceof FloodWaitError) {
    return new AccountClientError('FLOOD_WAIT', error.message, error.seconds);
  }

  if (error instanceof RPCError) {
    const reason = KNOWN_RPC_ERRORS.find((known) => known === error.errorMessage);
    if (reason) {
      return new AccountClientError(reason, error.errorMessage);
    }
  }

  return error;
}

/**
 * MTProto provider backed by GramJS.
 * Sessions are StringSession payloads kept in one file per session name.
 */
export class TelegramAccountClientProvider extends BaseAccountClientProvider {
  constructor(private readonly options: TelegramAccountClientOptions) {
    super('TelegramAccountClientProvider');
  }

  async connect(sessionName: string): Promise<AccountClientConnection> {
    const sessionFile = path.join(this.options.sessionsDir, `${sessionName}.session`);
    const session = new StringSession(await this.readSession(sessionFile));

    const client = new TelegramClient(session, this.options.apiId, this.options.apiHash, {
      connectionRetries: this.options.connectionRetries,
    });

    await client.connect();
    this.logger.debug(`Connected client for ${sessionName}`);

    return new TelegramConnection(sessionName, sessionFile, client, session, this.options);
  }

  private async readSession(sessionFile: string): Promise<string> {
    try {
      return (await fs.readFile(sessionFile, 'utf8')).trim();
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return '';
      }
      throw error;
    }
  }
}

class TelegramConnection implements AccountClientConnection {
  constructor(
    readonly sessionName: string,
    private readonly sessionFile: string,
    private readonly client: TelegramClient,
    private readonly session: StringSession,
    private readonly options: TelegramAccountClientOptions,
  ) {}

  async isAuthorized(): Promise<boolean> {
    return await this.client.checkAuthorization();
  }

  async requestCode(phoneNumber: string): Promise<string> {
    try {
      const result = await this.client.sendCode(
        { apiId: this.options.apiId, apiHash: this.options.apiHash },
        phoneNumber,
      );
      return result.phoneCodeHash;
    } catch (error) {
      throw toAccountClientError(error);
    }
  }

  async signInWithCode(
    phoneNumber: string,
    code: string,
    codeToken: string,
  ): Promise<AccountIdentity> {
    try {
      const result = await this.client.invoke(
        new Api.auth.SignIn({
          phoneNumber,
          phoneCodeHash: codeToken,
          phoneCode: code.trim(),
        }),
      );
      return this.toIdentity(result);
    } catch (error) {
      throw toAccountClientError(error);
    }
  }

  async signInWithPassword(password: string): Promise<AccountIdentity> {
    try {
      const passwordInfo = await this.client.invoke(new Api.account.GetPassword());
      const check = await computeCheck(passwordInfo, password);
      const result = await this.client.invoke(new Api.auth.CheckPassword({ password: check }));
      return this.toIdentity(result);
    } catch (error) {
      throw toAccountClientError(error);
    }
  }

  async saveSession(): Promise<string> {
    await fs.mkdir(path.dirname(this.sessionFile), { recursive: true });
    await fs.writeFile(this.sessionFile, this.session.save(), { mode: 0o600 });
    return this.sessionFile;
  }

  async disconnect(): Promise<void> {
    await this.client.disconnect();
  }

  private toIdentity(result: Api.auth.TypeAuthorization): AccountIdentity {
    if (result instanceof Api.auth.AuthorizationSignUpRequired) {
      throw new AccountClientError('SIGN_UP_REQUIRED', 'Phone number has no account');
    }

    const user = result.user;
    if (user instanceof Api.User) {
      const displayName = [user.firstName, user.lastName].filter(Boolean).join(' ');
      return {
        accountId: user.id.toString(),
        username: user.username,
        displayName: displayName || undefined,
      };
    }

    return { accountId: user.id.toString() };
  }
}
