import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { ConfigValidationService } from './common/config/config-validation.service';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);

  // Validate configuration before any lifecycle hook starts polling
  const configValidator = app.get(ConfigValidationService);
  configValidator.validate();

  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const port = configService.get<number>('port', 3000);
  await app.listen(port);

  logger.log(`Account login bot is running (metrics on http://localhost:${port}/metrics)`);
  logger.log(`Environment: ${configService.get<string>('nodeEnv', 'development')}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Application failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
