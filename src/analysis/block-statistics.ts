import { bitsToDifficulty, parseCompactBits } from '@analysis/difficulty.codec';
import { BlockRecord, DifficultySummary, DifficultyTrend, MiningTimeSummary } from '@types';

interface Extremes {
  sum: number;
  min: number;
  max: number;
}

/**
 * Summarize the difficulty of a sequence of blocks.
 *
 * Blocks without `bits` (missing or null) are skipped. `current` is the first
 * decoded difficulty, so callers pass blocks newest first when it should mean
 * the latest one. The trend compares the last difficulty to the first.
 */
export function analyzeBlockDifficulty(blocks: readonly BlockRecord[]): DifficultySummary {
  const difficulties: number[] = [];

  for (const block of blocks) {
    if (block.bits === undefined || block.bits === null) continue;
    difficulties.push(bitsToDifficulty(parseCompactBits(block.bits)));
  }

  const stats = reduceExtremes(difficulties);
  if (!stats) {
    return { current: null, average: null, min: null, max: null, trend: 'stable', range: null };
  }

  return {
    current: difficulties[0],
    average: stats.sum / difficulties.length,
    min: stats.min,
    max: stats.max,
    trend: compareEnds(difficulties),
    range: [stats.min, stats.max],
  };
}

/**
 * Summarize block timestamps.
 *
 * `slowest` is the smallest timestamp and `fastest` the largest one; neither
 * is a time between blocks.
 */
export function analyzeMiningTime(blocks: readonly BlockRecord[]): MiningTimeSummary {
  const times: number[] = [];

  for (const block of blocks) {
    if (block.time === undefined || block.time === null) continue;
    times.push(block.time);
  }

  const stats = reduceExtremes(times);
  if (!stats) {
    return { average: null, slowest: null, fastest: null };
  }

  return {
    average: stats.sum / times.length,
    slowest: stats.min,
    fastest: stats.max,
  };
}

function reduceExtremes(values: readonly number[]): Extremes | null {
  if (values.length === 0) return null;

  return values.reduce<Extremes>(
    (acc, value) => ({
      sum: acc.sum + value,
      min: Math.min(acc.min, value),
      max: Math.max(acc.max, value),
    }),
    { sum: 0, min: Infinity, max: -Infinity },
  );
}

function compareEnds(values: readonly number[]): DifficultyTrend {
  const first = values[0];
  const last = values[values.length - 1];

  if (last > first) return 'increasing';
  if (last < first) return 'decreasing';
  return 'stable';
}
