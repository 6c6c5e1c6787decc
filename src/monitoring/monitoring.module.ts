import { AnalysisModule } from '@analysis/analysis.module';
import { ConfigModule } from '@config/config.module';
import { DifficultyMonitorService } from '@monitoring/difficulty.monitor';
import { MonitoringController } from '@monitoring/monitoring.controller';
import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';

@Module({
  imports: [ScheduleModule.forRoot(), AnalysisModule, ConfigModule],
  providers: [DifficultyMonitorService],
  controllers: [MonitoringController],
  exports: [DifficultyMonitorService],
})
export class MonitoringModule {}
