import { ConfigService } from '@config/config.service';
import { Global, Module } from '@nestjs/common';

/**
 * Global configuration module. The environment is read when the application
 * context is created, not when this file is imported.
 */
@Global()
@Module({
  providers: [
    {
      provide: ConfigService,
      useFactory: () => new ConfigService(),
    },
  ],
  exports: [ConfigService],
})
export class ConfigModule {}
