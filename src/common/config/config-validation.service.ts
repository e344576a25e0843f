import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

/**
 * Configuration Validation Service
 *
 * Validates environment-derived configuration on startup.
 * Fails fast for critical missing configs, warns for optional ones.
 */
@Injectable()
export class ConfigValidationService {
  private readonly logger = new Logger(ConfigValidationService.name);
  private errors: string[] = [];
  private warnings: string[] = [];

  constructor(private configService: ConfigService) {}

  /**
   * Throws if any critical config is missing or invalid.
   */
  validate(): void {
    this.logger.log('Validating configuration...');
    this.errors = [];
    this.warnings = [];

    this.validateBot();
    this.validateAccountClient();
    this.validateDatabase();
    this.validateRedis();
    this.validateOptionalConfigs();

    if (this.errors.length > 0) {
      this.logger.error('❌ Configuration validation failed:');
      this.errors.forEach((error) => this.logger.error(`  - ${error}`));
      throw new Error('Configuration validation failed. Fix the above errors and restart.');
    }

    if (this.warnings.length > 0) {
      this.logger.warn('⚠️  Configuration warnings:');
      this.warnings.forEach((warning) => this.logger.warn(`  - ${warning}`));
    }

    this.logger.log('✅ Configuration validation passed');
  }

  private validateBot(): void {
    const token = this.configService.get<string>('bot.token');
    const pollTimeout = this.configService.get<number>('bot.pollTimeoutSeconds');

    if (!token) {
      this.errors.push('BOT_TOKEN is required but missing');
    }

    if (pollTimeout === undefined || pollTimeout < 0 || pollTimeout > 50) {
      this.errors.push('BOT_POLL_TIMEOUT_SECONDS must be between 0 and 50');
    }
  }

  private validateAccountClient(): void {
    const sandbox = this.configService.get<boolean>('account.sandbox');

    if (sandbox) {
      this.warnings.push('ACCOUNT_CLIENT_SANDBOX is enabled. No real accounts will be signed in.');
      return;
    }

    const apiId = this.configService.get<number>('account.apiId');
    const apiHash = this.configService.get<string>('account.apiHash');

    if (!apiId || apiId <= 0) {
      this.errors.push('TELEGRAM_API_ID is required when the sandbox is disabled');
    }

    if (!apiHash) {
      this.errors.push('TELEGRAM_API_HASH is required when the sandbox is disabled');
    }
  }

  private validateDatabase(): void {
    const host = this.configService.get<string>('database.host');
    const port = this.configService.get<number>('database.port');
    const database = this.configService.get<string>('database.database');
    const poolSize = this.configService.get<number>('database.poolSize');

    if (!host) {
      this.errors.push('DATABASE_HOST is required but missing');
    }

    if (!port || port < 1 || port > 65535) {
      this.errors.push('DATABASE_PORT must be a valid port number (1-65535)');
    }

    if (!database) {
      this.errors.push('DATABASE_NAME is required but missing');
    }

    if (poolSize && (poolSize < 1 || poolSize > 100)) {
      this.errors.push('DATABASE_POOL_SIZE must be between 1 and 100');
    }
  }

  private validateRedis(): void {
    const host = this.configService.get<string>('redis.host');
    const port = this.configService.get<number>('redis.port');

    if (!host) {
      this.errors.push('REDIS_HOST is required but missing');
    }

    if (!port || port < 1 || port > 65535) {
      this.errors.push('REDIS_PORT must be a valid port number (1-65535)');
    }

    if (!this.configService.get<string>('redis.password')) {
      this.warnings.push('REDIS_PASSWORD is not set (authentication disabled)');
    }
  }

  private validateOptionalConfigs(): void {
    const flowTtl = this.configService.get<number>('login.flowTtlSeconds');
    if (flowTtl !== undefined && (flowTtl < 60 || flowTtl > 3600)) {
      this.warnings.push('LOGIN_FLOW_TTL_SECONDS should be between 60 and 3600 seconds');
    }
  }
}
