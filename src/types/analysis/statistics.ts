/**
 * Summary statistics derived from a sequence of blocks
 */

export type DifficultyTrend = 'increasing' | 'decreasing' | 'stable';

/**
 * Difficulty summary. Numeric fields are null when no block carried `bits`.
 */
export interface DifficultySummary {
  /** Difficulty of the first block in input order */
  current: number | null;
  average: number | null;
  min: number | null;
  max: number | null;
  /** Last difficulty compared to the first one */
  trend: DifficultyTrend;
  range: [number, number] | null;
}

/**
 * Mining time summary. Numeric fields are null when no block carried `time`.
 *
 * `slowest` and `fastest` are the minimum and maximum raw block timestamps,
 * not intervals between consecutive blocks.
 */
export interface MiningTimeSummary {
  average: number | null;
  slowest: number | null;
  fastest: number | null;
}

/**
 * Analysis of a window of blocks fetched from the node
 */
export interface BlockAnalysis {
  count: number;
  fromHeight: number | null;
  toHeight: number | null;
  difficulty: DifficultySummary;
  miningTime: MiningTimeSummary;
  analyzedAt: string;
}

export interface DecodedCompactTarget {
  bits: number;
  hex: string;
  target: string;
  difficulty: number;
}
