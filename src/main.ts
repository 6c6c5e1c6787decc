import 'reflect-metadata';
import { AppModule } from '@/app.module';
import { ConfigService } from '@config/config.service';
import { CustomLoggerService } from '@logging/logger.service';
import { NestFactory } from '@nestjs/core';

async function bootstrap(): Promise<void> {
  // Buffer early logs until the winston logger is installed
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  const customLogger = app.get(CustomLoggerService);
  app.useLogger(customLogger);

  app.setGlobalPrefix('api');

  const configService = app.get(ConfigService);
  const port = configService.getPort();
  const environment = configService.getEnvironment();

  await app.listen(port, '0.0.0.0');

  customLogger.logStartupInfo(port, environment);

  const shutdown = async (): Promise<void> => {
    customLogger.logShutdownInfo();
    await app.close();
    process.exit(0);
  };

  process.once('SIGINT', () => void shutdown());
  process.once('SIGTERM', () => void shutdown());
}

bootstrap().catch(error => {
  console.error('Failed to start application:', error);
  process.exit(1);
});
