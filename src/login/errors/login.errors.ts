/**
 * Error taxonomy of the login flow. Messages here are for logs only;
 * users see the enumerated texts in LOGIN_MESSAGES.
 */

export enum LoginErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  PROVIDER_RATE_LIMITED = 'PROVIDER_RATE_LIMITED',
  PROVIDER_REJECTED = 'PROVIDER_REJECTED',
  NO_PENDING_AUTHENTICATION = 'NO_PENDING_AUTHENTICATION',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class LoginError extends Error {
  constructor(
    readonly code: LoginErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidPhoneFormatError extends LoginError {
  constructor(phoneNumber: string) {
    super(LoginErrorCode.VALIDATION_ERROR, `Phone number rejected: ${phoneNumber}`);
  }
}

export class ProviderRateLimitedError extends LoginError {
  constructor(readonly waitSeconds: number) {
    super(LoginErrorCode.PROVIDER_RATE_LIMITED, `Provider asked to wait ${waitSeconds}s`);
  }
}

export class ProviderError extends LoginError {
  constructor(readonly detail: string) {
    super(LoginErrorCode.INTERNAL_ERROR, detail);
  }
}
