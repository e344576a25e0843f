/**
 * Type definitions for the login flow
 */

import { AccountClientConnection, AccountIdentity } from '../../account-client/account-client.types';

export enum ConversationStep {
  IDLE = 'idle',
  AWAITING_PHONE = 'awaiting_phone',
  AWAITING_CODE = 'awaiting_code',
  AWAITING_TWO_FACTOR = 'awaiting_2fa',
}

export interface ConversationState {
  userId: number;
  step: ConversationStep;
  lastActivityAt: Date;
}

/**
 * In-flight login; lives in memory only.
 */
export interface PendingAuthentication {
  userId: number;
  phoneNumber: string;
  phoneRecordId: number;
  connection: AccountClientConnection;
  codeToken: string;
  sessionName: string;
  startedAt: Date;
  lastActivityAt: Date;
}

export interface BeginLoginRequest {
  userId: number;
  phoneNumber: string;
  phoneRecordId: number;
}

export type CodeRequestResult =
  | { status: 'code_sent'; phoneNumber: string }
  | { status: 'already_authorized'; phoneNumber: string };

export type RetryReason = 'code_invalid' | 'code_expired';

export type FailureReason = 'password_invalid' | 'provider_error';

export type SignInOutcome =
  | { status: 'success'; phoneNumber: string; account: AccountIdentity }
  | { status: 'two_factor_required'; phoneNumber: string }
  | { status: 'retryable'; reason: RetryReason }
  | { status: 'failed'; reason: FailureReason; detail: string }
  | { status: 'no_pending_auth' };

export type MenuKeyboard = 'main';

/**
 * What the orchestrator wants sent back to the user.
 */
export interface LoginReply {
  text: string;
  step: ConversationStep;
  keyboard?: MenuKeyboard;
}

/**
 * Sends an interim notice while a slow step runs.
 */
export type ProgressCallback = (text: string) => Promise<void>;
