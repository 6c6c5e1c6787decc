import { Module } from '@nestjs/common';
import { BlockchainModule } from '@blockchain/blockchain.module';
import { HealthController } from '@health/health.controller';
import { HealthService } from '@health/health.service';
import { ConfigModule } from '@config/config.module';

@Module({
  imports: [ConfigModule, BlockchainModule],
  controllers: [HealthController],
  providers: [HealthService],
  exports: [HealthService],
})
export class HealthModule {}
