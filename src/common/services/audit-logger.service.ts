import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export enum AuditEventType {
  LOGIN_CODE_REQUESTED = 'LOGIN_CODE_REQUESTED',
  LOGIN_CODE_REQUEST_FAILED = 'LOGIN_CODE_REQUEST_FAILED',
  LOGIN_ALREADY_AUTHORIZED = 'LOGIN_ALREADY_AUTHORIZED',
  SIGN_IN_SUCCEEDED = 'SIGN_IN_SUCCEEDED',
  SIGN_IN_FAILED = 'SIGN_IN_FAILED',
  TWO_FACTOR_REQUIRED = 'TWO_FACTOR_REQUIRED',
  RATE_LIMITED = 'RATE_LIMITED',
  FLOW_ABANDONED = 'FLOW_ABANDONED',
  FLOW_EXPIRED = 'FLOW_EXPIRED',
}

export interface AuditLogEntry {
  timestamp: Date;
  eventType: AuditEventType;
  userId?: number;
  phone?: string;
  metadata?: Record<string, unknown>;
  success: boolean;
  message?: string;
}

/**
 * Structured log of login-related events.
 * Phone numbers are masked before they reach the log.
 */
@Injectable()
export class AuditLoggerService {
  private readonly logger = new Logger(AuditLoggerService.name);
  private readonly isProduction: boolean;

  constructor(private configService: ConfigService) {
    this.isProduction = this.configService.get<string>('nodeEnv') === 'production';
  }

  log(entry: AuditLogEntry): void {
    const logData = {
      timestamp: entry.timestamp.toISOString(),
      eventType: entry.eventType,
      userId: entry.userId ?? 'N/A',
      phone: this.maskPhoneNumber(entry.phone),
      success: entry.success,
      message: entry.message,
      metadata: entry.metadata,
    };

    if (this.isProduction) {
      this.logger.log(JSON.stringify(logData));
    } else {
      this.logger.log(`[AUDIT] ${entry.eventType}`, logData);
    }

    if (this.isSecurityEvent(entry.eventType) && !entry.success) {
      this.logger.warn(`[SECURITY] ${entry.eventType} - ${entry.message}`, logData);
    }
  }

  logCodeRequested(userId: number, phone: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.LOGIN_CODE_REQUESTED,
      userId,
      phone,
      success: true,
      message: 'Login code requested',
    });
  }

  logCodeRequestFailed(userId: number, phone: string, reason: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.LOGIN_CODE_REQUEST_FAILED,
      userId,
      phone,
      success: false,
      message: reason,
    });
  }

  logAlreadyAuthorized(userId: number, phone: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.LOGIN_ALREADY_AUTHORIZED,
      userId,
      phone,
      success: true,
      message: 'Stored session is still authorized',
    });
  }

  logSignInSucceeded(userId: number, phone: string, step: 'code' | 'password'): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.SIGN_IN_SUCCEEDED,
      userId,
      phone,
      success: true,
      message: 'Account signed in',
      metadata: { step },
    });
  }

  logSignInFailed(userId: number, phone: string, step: 'code' | 'password', reason: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.SIGN_IN_FAILED,
      userId,
      phone,
      success: false,
      message: reason,
      metadata: { step },
    });
  }

  logTwoFactorRequired(userId: number, phone: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.TWO_FACTOR_REQUIRED,
      userId,
      phone,
      success: true,
      message: 'Second factor requested by provider',
    });
  }

  logRateLimited(userId: number, phone: string, waitSeconds: number): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.RATE_LIMITED,
      userId,
      phone,
      success: false,
      message: `Provider asked to wait ${waitSeconds}s`,
      metadata: { waitSeconds },
    });
  }

  logFlowClosed(userId: number, phone: string, expired: boolean): void {
    this.log({
      timestamp: new Date(),
      eventType: expired ? AuditEventType.FLOW_EXPIRED : AuditEventType.FLOW_ABANDONED,
      userId,
      phone,
      success: true,
      message: expired ? 'Pending login expired' : 'Pending login abandoned',
    });
  }

  /**
   * Keeps the last four digits only.
   */
  private maskPhoneNumber(phone?: string): string {
    if (!phone) return 'N/A';

    if (phone.length <= 4) return '****';

    const lastFour = phone.slice(-4);
    return '*'.repeat(phone.length - 4) + lastFour;
  }

  private isSecurityEvent(eventType: AuditEventType): boolean {
    const securityEvents = [
      AuditEventType.LOGIN_CODE_REQUEST_FAILED,
      AuditEventType.SIGN_IN_FAILED,
      AuditEventType.RATE_LIMITED,
    ];

    return securityEvents.includes(eventType);
  }
}
