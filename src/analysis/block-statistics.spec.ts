import { analyzeBlockDifficulty, analyzeMiningTime } from '@analysis/block-statistics';
import { bitsToDifficulty } from '@analysis/difficulty.codec';
import { DivisionByZeroError, MalformedCompactTargetError } from '@common/utils/error-handler';
import { BlockRecord } from '@types';

// Bits decoding to difficulties 1, 2 and 4
const DIFFICULTY_1 = '1d00ffff';
const DIFFICULTY_2 = '1c7fff80';
const DIFFICULTY_4 = '1c3fffc0';

describe('block statistics', () => {
  describe('analyzeBlockDifficulty', () => {
    it('returns an all-absent summary for no blocks', () => {
      expect(analyzeBlockDifficulty([])).toEqual({
        current: null,
        average: null,
        min: null,
        max: null,
        trend: 'stable',
        range: null,
      });
    });

    it('reports a single block as stable with a degenerate range', () => {
      const summary = analyzeBlockDifficulty([{ bits: DIFFICULTY_2 }]);

      expect(summary.current).toBe(2);
      expect(summary.average).toBe(2);
      expect(summary.trend).toBe('stable');
      expect(summary.range).toEqual([2, 2]);
    });

    it('summarizes an increasing sequence', () => {
      const summary = analyzeBlockDifficulty([{ bits: DIFFICULTY_1 }, { bits: DIFFICULTY_2 }, { bits: DIFFICULTY_4 }]);

      expect(summary.current).toBe(1);
      expect(summary.average).toBeCloseTo(7 / 3, 12);
      expect(summary.min).toBe(1);
      expect(summary.max).toBe(4);
      expect(summary.trend).toBe('increasing');
      expect(summary.range).toEqual([1, 4]);
    });

    it('reports a decreasing sequence', () => {
      const summary = analyzeBlockDifficulty([{ bits: DIFFICULTY_4 }, { bits: DIFFICULTY_2 }, { bits: DIFFICULTY_1 }]);

      expect(summary.current).toBe(4);
      expect(summary.trend).toBe('decreasing');
    });

    it('compares only the first and last difficulty', () => {
      const summary = analyzeBlockDifficulty([{ bits: DIFFICULTY_2 }, { bits: DIFFICULTY_4 }, { bits: DIFFICULTY_2 }]);

      expect(summary.trend).toBe('stable');
      expect(summary.max).toBe(4);
    });

    it('accepts integer bits alongside hex strings', () => {
      const summary = analyzeBlockDifficulty([{ bits: 0x1c00ffff }, { bits: '0x1d00ffff' }]);

      expect(summary.current).toBe(256);
      expect(summary.min).toBe(1);
      expect(summary.trend).toBe('decreasing');
    });

    it('skips blocks with missing or null bits', () => {
      const blocks: BlockRecord[] = [{ time: 1 }, { bits: null }, { bits: DIFFICULTY_4 }, { bits: undefined }];
      const summary = analyzeBlockDifficulty(blocks);

      expect(summary.current).toBe(4);
      expect(summary.range).toEqual([4, 4]);
      expect(summary.trend).toBe('stable');
    });

    it('returns the absent summary when no block carries bits', () => {
      expect(analyzeBlockDifficulty([{ time: 1 }, { bits: null }]).current).toBeNull();
    });

    it('does not mutate its input', () => {
      const blocks: BlockRecord[] = [{ bits: DIFFICULTY_1, time: 10 }, { bits: DIFFICULTY_2, time: 20 }];
      const copy = structuredClone(blocks);

      analyzeBlockDifficulty(blocks);

      expect(blocks).toEqual(copy);
    });

    it('uses the codec for every block', () => {
      const bits = ['17023c7e', '1703a30c'];
      const summary = analyzeBlockDifficulty(bits.map(value => ({ bits: value })));

      expect(summary.current).toBe(bitsToDifficulty(0x17023c7e));
      expect(summary.average).toBe((bitsToDifficulty(0x17023c7e) + bitsToDifficulty(0x1703a30c)) / 2);
    });

    it('propagates malformed bits', () => {
      expect(() => analyzeBlockDifficulty([{ bits: 'not-bits' }])).toThrow(MalformedCompactTargetError);
    });

    it('propagates a zero target', () => {
      expect(() => analyzeBlockDifficulty([{ bits: DIFFICULTY_1 }, { bits: '1d000000' }])).toThrow(DivisionByZeroError);
    });
  });

  describe('analyzeMiningTime', () => {
    it('returns an all-absent summary for no blocks', () => {
      expect(analyzeMiningTime([])).toEqual({ average: null, slowest: null, fastest: null });
    });

    it('reports the minimum timestamp as slowest and the maximum as fastest', () => {
      const summary = analyzeMiningTime([{ time: 1000 }, { time: 1600 }, { time: 1200 }]);

      expect(summary.average).toBeCloseTo(1266.67, 2);
      expect(summary.slowest).toBe(1000);
      expect(summary.fastest).toBe(1600);
    });

    it('skips blocks with missing or null time', () => {
      const summary = analyzeMiningTime([{ bits: DIFFICULTY_1 }, { time: null }, { time: 1700000000 }]);

      expect(summary).toEqual({ average: 1700000000, slowest: 1700000000, fastest: 1700000000 });
    });
  });
});
