import { BlockAnalysis } from '../analysis/statistics';

/**
 * State of the scheduled difficulty monitor
 */
export interface DifficultyMonitoringInfo {
  enabled: boolean;
  scanIntervalMs: number;
  blocksToScan: number;
  lastAnalysis: BlockAnalysis | null;
  lastError: {
    message: string;
    timestamp: string;
  } | null;
  completedScans: number;
  failedScans: number;
}
