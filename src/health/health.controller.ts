import { Controller, Get } from '@nestjs/common';
import { HealthService, HealthStatus } from './health.service';

@Controller('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  /**
   * GET /api/health
   * - status: 'ok' when the node answers, 'error' otherwise
   * - uptime: seconds since application start
   * - services.node: chain and height reported by the node
   */
  @Get()
  getHealth(): Promise<HealthStatus> {
    return this.healthService.getHealth();
  }
}
