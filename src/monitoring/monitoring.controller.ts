import { Controller, Get } from '@nestjs/common';
import { DifficultyMonitorService } from '@monitoring/difficulty.monitor';
import { DifficultyMonitoringInfo } from '@types';

@Controller('monitoring')
export class MonitoringController {
  constructor(private readonly difficultyMonitorService: DifficultyMonitorService) {}

  @Get('difficulty-status')
  getDifficultyStatus(): { timestamp: string; difficultyMonitoring: DifficultyMonitoringInfo } {
    return {
      timestamp: new Date().toISOString(),
      difficultyMonitoring: this.difficultyMonitorService.getDifficultyMonitoringInfo(),
    };
  }
}
