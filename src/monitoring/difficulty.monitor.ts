import { BlockAnalyzerService } from '@analysis/block-analyzer.service';
import { ErrorHandler } from '@common/utils/error-handler';
import { ConfigService, MonitoringConfig } from '@config/config.service';
import { CustomLoggerService } from '@logging/logger.service';
import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { BlockAnalysis, DifficultyMonitoringInfo } from '@types';

/**
 * Periodically analyzes the most recent blocks and keeps the latest result
 */
@Injectable()
export class DifficultyMonitorService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DifficultyMonitorService.name);
  private readonly errorHandler = new ErrorHandler(DifficultyMonitorService.name);
  private readonly intervalName = 'difficultyMonitoring';
  private readonly config: MonitoringConfig;

  private isScanning = false;
  private lastAnalysis: BlockAnalysis | null = null;
  private lastError: DifficultyMonitoringInfo['lastError'] = null;
  private completedScans = 0;
  private failedScans = 0;

  constructor(
    private readonly blockAnalyzerService: BlockAnalyzerService,
    private readonly configService: ConfigService,
    private readonly customLogger: CustomLoggerService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {
    this.config = this.configService.getMonitoringConfig();
  }

  onModuleInit(): void {
    this.logger.log(
      `Difficulty monitoring: ${this.config.enableDifficultyMonitoring ? 'enabled' : 'disabled'}, ` +
        `interval: ${this.config.scanIntervalMs}ms, blocks per scan: ${this.config.blocksToScan}`,
    );

    if (this.config.enableDifficultyMonitoring) {
      this.startMonitoring();
    }
  }

  onModuleDestroy(): void {
    this.stopMonitoring();
  }

  /**
   * Register the scan interval and run a first scan right away
   */
  startMonitoring(): void {
    if (this.schedulerRegistry.doesExist('interval', this.intervalName)) {
      this.logger.debug('Difficulty monitoring already running');
      return;
    }

    const interval = setInterval(() => void this.scan(), this.config.scanIntervalMs);
    this.schedulerRegistry.addInterval(this.intervalName, interval);
    this.logger.log(`Difficulty monitoring interval set to ${this.config.scanIntervalMs}ms`);

    void this.scan();
  }

  stopMonitoring(): void {
    if (!this.schedulerRegistry.doesExist('interval', this.intervalName)) {
      return;
    }
    this.schedulerRegistry.deleteInterval(this.intervalName);
    this.logger.log('Difficulty monitoring stopped');
  }

  /**
   * Analyze the configured number of recent blocks.
   * Resolves to null when a scan is already in flight or the scan failed;
   * failures are logged and recorded, never rethrown.
   */
  async scan(): Promise<BlockAnalysis | null> {
    if (this.isScanning) {
      this.logger.debug('Previous difficulty scan still running, skipping');
      return null;
    }

    this.isScanning = true;
    try {
      const analysis = await this.blockAnalyzerService.analyzeRecentBlocks(this.config.blocksToScan);
      this.lastAnalysis = analysis;
      this.lastError = null;
      this.completedScans++;

      this.customLogger.logMonitoringActivity(
        'Difficulty',
        `Analyzed ${analysis.count} blocks (${analysis.fromHeight ?? '-'}..${analysis.toHeight ?? '-'})`,
        {
          current: analysis.difficulty.current,
          average: analysis.difficulty.average,
          trend: analysis.difficulty.trend,
        },
      );
      return analysis;
    } catch (error) {
      const appError = this.errorHandler.handleError(error, 'Difficulty scan failed');
      this.failedScans++;
      this.lastError = { message: appError.message, timestamp: new Date().toISOString() };
      return null;
    } finally {
      this.isScanning = false;
    }
  }

  getDifficultyMonitoringInfo(): DifficultyMonitoringInfo {
    return {
      enabled: this.schedulerRegistry.doesExist('interval', this.intervalName),
      scanIntervalMs: this.config.scanIntervalMs,
      blocksToScan: this.config.blocksToScan,
      lastAnalysis: this.lastAnalysis,
      lastError: this.lastError,
      completedScans: this.completedScans,
      failedScans: this.failedScans,
    };
  }
}
