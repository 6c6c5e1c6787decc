import { BlockAnalyzerService } from '@analysis/block-analyzer.service';
import { RpcError } from '@common/utils/error-handler';
import { ConfigService } from '@config/config.service';
import { CustomLoggerService } from '@logging/logger.service';
import { DifficultyMonitorService } from '@monitoring/difficulty.monitor';
import { SchedulerRegistry } from '@nestjs/schedule';
import { Test } from '@nestjs/testing';
import { BlockAnalysis } from '@types';
import * as os from 'os';
import * as path from 'path';

const analysis: BlockAnalysis = {
  count: 3,
  fromHeight: 2,
  toHeight: 4,
  difficulty: { current: 4, average: 8 / 3, min: 2, max: 4, trend: 'decreasing', range: [2, 4] },
  miningTime: { average: 2600, slowest: 2200, fastest: 3100 },
  analyzedAt: '2024-01-01T00:00:00.000Z',
};

const flushPromises = () => new Promise(resolve => setImmediate(resolve));

describe('DifficultyMonitorService', () => {
  let analyzer: { analyzeRecentBlocks: jest.Mock };
  let customLogger: { logMonitoringActivity: jest.Mock };
  let registry: SchedulerRegistry;
  let service: DifficultyMonitorService;

  async function createService(env: Record<string, string> = {}): Promise<void> {
    const configService = new ConfigService({
      ENV_FILE: path.join(os.tmpdir(), 'difficulty-monitor-missing.env'),
      SCAN_INTERVAL: '1',
      BLOCKS_TO_SCAN: '3',
      ENABLE_DIFFICULTY_MONITORING: 'true',
      ...env,
    });

    const moduleRef = await Test.createTestingModule({
      providers: [
        DifficultyMonitorService,
        SchedulerRegistry,
        { provide: BlockAnalyzerService, useValue: analyzer },
        { provide: ConfigService, useValue: configService },
        { provide: CustomLoggerService, useValue: customLogger },
      ],
    }).compile();

    service = moduleRef.get(DifficultyMonitorService);
    registry = moduleRef.get(SchedulerRegistry);
  }

  beforeEach(async () => {
    analyzer = { analyzeRecentBlocks: jest.fn().mockResolvedValue(analysis) };
    customLogger = { logMonitoringActivity: jest.fn() };
    await createService();
  });

  afterEach(() => {
    service.stopMonitoring();
    jest.useRealTimers();
  });

  describe('scan', () => {
    it('analyzes the configured number of blocks and keeps the result', async () => {
      await expect(service.scan()).resolves.toBe(analysis);

      expect(analyzer.analyzeRecentBlocks).toHaveBeenCalledWith(3);
      expect(service.getDifficultyMonitoringInfo()).toEqual({
        enabled: false,
        scanIntervalMs: 1000,
        blocksToScan: 3,
        lastAnalysis: analysis,
        lastError: null,
        completedScans: 1,
        failedScans: 0,
      });
      expect(customLogger.logMonitoringActivity).toHaveBeenCalledWith('Difficulty', 'Analyzed 3 blocks (2..4)', {
        current: 4,
        average: 8 / 3,
        trend: 'decreasing',
      });
    });

    it('records failures without throwing', async () => {
      analyzer.analyzeRecentBlocks.mockRejectedValueOnce(new RpcError('HTTP error 401: Unauthorized'));

      await expect(service.scan()).resolves.toBeNull();

      const info = service.getDifficultyMonitoringInfo();
      expect(info.failedScans).toBe(1);
      expect(info.lastAnalysis).toBeNull();
      expect(info.lastError?.message).toBe('HTTP error 401: Unauthorized');
      expect(Date.parse(info.lastError?.timestamp ?? '')).not.toBeNaN();
    });

    it('clears the last error after a successful scan', async () => {
      analyzer.analyzeRecentBlocks.mockRejectedValueOnce(new Error('socket hang up'));

      await service.scan();
      await service.scan();

      expect(service.getDifficultyMonitoringInfo()).toMatchObject({
        lastAnalysis: analysis,
        lastError: null,
        completedScans: 1,
        failedScans: 1,
      });
    });

    it('skips a scan while another is in flight', async () => {
      let finish: (value: BlockAnalysis) => void = () => undefined;
      analyzer.analyzeRecentBlocks.mockReturnValueOnce(
        new Promise<BlockAnalysis>(resolve => {
          finish = resolve;
        }),
      );

      const first = service.scan();
      await expect(service.scan()).resolves.toBeNull();

      finish(analysis);
      await expect(first).resolves.toBe(analysis);
      expect(analyzer.analyzeRecentBlocks).toHaveBeenCalledTimes(1);
    });
  });

  describe('scheduling', () => {
    it('registers one interval and scans immediately', async () => {
      service.startMonitoring();
      service.startMonitoring();
      await flushPromises();

      expect(registry.getIntervals()).toEqual(['difficultyMonitoring']);
      expect(analyzer.analyzeRecentBlocks).toHaveBeenCalledTimes(1);
      expect(service.getDifficultyMonitoringInfo().enabled).toBe(true);
    });

    it('scans on every interval tick', async () => {
      jest.useFakeTimers();

      service.startMonitoring();
      await jest.advanceTimersByTimeAsync(3000);

      expect(analyzer.analyzeRecentBlocks).toHaveBeenCalledTimes(4);
      expect(service.getDifficultyMonitoringInfo().completedScans).toBe(4);
    });

    it('removes the interval on stop', () => {
      service.startMonitoring();
      service.stopMonitoring();

      expect(registry.doesExist('interval', 'difficultyMonitoring')).toBe(false);
      expect(service.getDifficultyMonitoringInfo().enabled).toBe(false);
    });

    it('starts on module init when enabled', async () => {
      service.onModuleInit();
      await flushPromises();

      expect(registry.doesExist('interval', 'difficultyMonitoring')).toBe(true);
      service.onModuleDestroy();
      expect(registry.doesExist('interval', 'difficultyMonitoring')).toBe(false);
    });

    it('stays idle on module init when disabled', async () => {
      await createService({ ENABLE_DIFFICULTY_MONITORING: 'false' });

      service.onModuleInit();

      expect(registry.getIntervals()).toEqual([]);
      expect(analyzer.analyzeRecentBlocks).not.toHaveBeenCalled();
    });
  });
});
