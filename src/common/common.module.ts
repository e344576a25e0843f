import { Module } from '@nestjs/common';
import { AuditLoggerService } from './services/audit-logger.service';
import { MetricsService } from './services/metrics.service';
import { ConfigValidationService } from './config/config-validation.service';

@Module({
  providers: [AuditLoggerService, MetricsService, ConfigValidationService],
  exports: [AuditLoggerService, MetricsService, ConfigValidationService],
})
export class CommonModule {}
