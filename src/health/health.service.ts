import { BlockchainService } from '@blockchain/blockchain.service';
import { getErrorMessage } from '@common/utils/error-handler';
import { ConfigService } from '@config/config.service';
import { Injectable, Logger } from '@nestjs/common';

export interface ServiceHealth {
  status: 'ok' | 'error';
  details?: Record<string, unknown>;
}

export interface HealthStatus {
  status: 'ok' | 'error';
  uptime: number;
  timestamp: string;
  environment: string;
  services: {
    node: ServiceHealth;
  };
}

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);
  private readonly startTime = Date.now();

  constructor(
    private readonly configService: ConfigService,
    private readonly blockchainService: BlockchainService,
  ) {}

  /**
   * Health of the application and of its connection to the node
   */
  async getHealth(): Promise<HealthStatus> {
    const node = await this.checkNode();

    return {
      status: node.status,
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      timestamp: new Date().toISOString(),
      environment: this.configService.getEnvironment(),
      services: { node },
    };
  }

  private async checkNode(): Promise<ServiceHealth> {
    try {
      const info = await this.blockchainService.getBlockchainInfo();
      return {
        status: 'ok',
        details: {
          chain: info.chain,
          blocks: info.blocks,
          initialBlockDownload: info.initialblockdownload,
        },
      };
    } catch (error) {
      const message = getErrorMessage(error);
      this.logger.warn(`Node health check failed: ${message}`);
      return { status: 'error', details: { error: message } };
    }
  }
}
