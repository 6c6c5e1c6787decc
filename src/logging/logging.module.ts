import { CustomLoggerService } from '@logging/logger.service';
import { Global, Module } from '@nestjs/common';

/**
 * Global module exposing the winston-backed application logger
 */
@Global()
@Module({
  providers: [CustomLoggerService],
  exports: [CustomLoggerService],
})
export class LoggingModule {}
