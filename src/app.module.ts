import { AnalysisModule } from '@analysis/analysis.module';
import { BlockchainModule } from '@blockchain/blockchain.module';
import { AppErrorFilter } from '@common/filters/app-error.filter';
import { ConfigModule } from '@config/config.module';
import { HealthModule } from '@health/health.module';
import { LoggingModule } from '@logging/logging.module';
import { MonitoringModule } from '@monitoring/monitoring.module';
import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';

@Module({
  imports: [ConfigModule, LoggingModule, BlockchainModule, AnalysisModule, MonitoringModule, HealthModule],
  providers: [{ provide: APP_FILTER, useClass: AppErrorFilter }],
})
export class AppModule {}
