/**
 * Provider error reasons the login flow reacts to. Anything else surfaces as a plain Error.
 */
export type AccountClientErrorReason =
  | 'PHONE_NUMBER_INVALID'
  | 'FLOOD_WAIT'
  | 'PHONE_CODE_INVALID'
  | 'PHONE_CODE_EXPIRED'
  | 'SESSION_PASSWORD_NEEDED'
  | 'PASSWORD_HASH_INVALID'
  | 'SIGN_UP_REQUIRED';

export class AccountClientError extends Error {
  constructor(
    readonly reason: AccountClientErrorReason,
    message: string,
    readonly waitSeconds?: number,
  ) {
    super(message);
    this.name = 'AccountClientError';
  }
}

export interface AccountIdentity {
  accountId: string;
  username?: string;
  displayName?: string;
}

/**
 * A live connection to the account network for one session name.
 */
export interface AccountClientConnection {
  readonly sessionName: string;

  isAuthorized(): Promise<boolean>;

  /**
   * @returns Correlation token that must accompany the code on sign-in
   */
  requestCode(phoneNumber: string): Promise<string>;

  signInWithCode(phoneNumber: string, code: string, codeToken: string): Promise<AccountIdentity>;

  signInWithPassword(password: string): Promise<AccountIdentity>;

  /**
   * Persists the authorized session.
   * @returns Reference stored as the session handle
   */
  saveSession(): Promise<string>;

  disconnect(): Promise<void>;
}
