import {
  bitsToDifficulty,
  bitsToTarget,
  decodeCompactTarget,
  parseCompactBits,
  targetToHex,
} from '@analysis/difficulty.codec';
import { MAX_TARGET } from '@common/constants/difficulty';
import { DivisionByZeroError, MalformedCompactTargetError } from '@common/utils/error-handler';

describe('difficulty codec', () => {
  describe('parseCompactBits', () => {
    it('accepts hex strings with or without a 0x prefix', () => {
      expect(parseCompactBits('1d00ffff')).toBe(0x1d00ffff);
      expect(parseCompactBits('0x1d00ffff')).toBe(0x1d00ffff);
      expect(parseCompactBits('17023C7E')).toBe(0x17023c7e);
      expect(parseCompactBits('ff')).toBe(0xff);
    });

    it('accepts unsigned 32-bit integers', () => {
      expect(parseCompactBits(486604799)).toBe(0x1d00ffff);
      expect(parseCompactBits(0)).toBe(0);
      expect(parseCompactBits(0xffffffff)).toBe(0xffffffff);
    });

    it.each(['', 'xyz', '123456789', '0x', '1d00 ffff'])('rejects the string %p', raw => {
      expect(() => parseCompactBits(raw)).toThrow(MalformedCompactTargetError);
    });

    it.each([-1, 2 ** 32, 1.5, NaN])('rejects the number %p', raw => {
      expect(() => parseCompactBits(raw)).toThrow(MalformedCompactTargetError);
    });
  });

  describe('bitsToTarget', () => {
    it('expands the difficulty-1 target', () => {
      expect(bitsToTarget(0x1d00ffff)).toBe(0xffffn << 208n);
      expect(bitsToTarget(0x1d00ffff)).toBe(MAX_TARGET);
    });

    it('expands a mainnet target', () => {
      expect(bitsToTarget(0x17023c7e)).toBe(0x023c7en << 160n);
    });

    it('equals mantissa * 2^(8 * (exponent - 3)) for every exponent from 3 to 255', () => {
      const mantissa = 0x123456;
      for (let exponent = 3; exponent <= 0xff; exponent++) {
        const bits = exponent * 2 ** 24 + mantissa;
        expect(bitsToTarget(bits)).toBe(BigInt(mantissa) * 2n ** BigInt(8 * (exponent - 3)));
      }
    });

    it('supports shifts past 2000 bits', () => {
      const target = bitsToTarget(0xff000001);
      expect(target).toBe(1n << 2016n);
      expect(target.toString(2)).toHaveLength(2017);
    });

    it('ignores the historical sign bit', () => {
      expect(bitsToTarget(0x04923456)).toBe(0x923456n << 8n);
    });

    it('truncates the mantissa when the exponent is below 3', () => {
      expect(bitsToTarget(0x0200ffff)).toBe(0xffn);
      expect(bitsToTarget(0x01123456)).toBe(0x12n);
      expect(bitsToTarget(0x00123456)).toBe(0n);
    });

    it('rejects values outside the unsigned 32-bit range', () => {
      expect(() => bitsToTarget(-1)).toThrow(MalformedCompactTargetError);
      expect(() => bitsToTarget(2 ** 32)).toThrow(MalformedCompactTargetError);
      expect(() => bitsToTarget(0.5)).toThrow(MalformedCompactTargetError);
    });
  });

  describe('bitsToDifficulty', () => {
    it('returns exactly 1 for the maximum target', () => {
      expect(bitsToDifficulty(0x1d00ffff)).toBe(1);
    });

    it('returns exact powers of two for halved targets', () => {
      expect(bitsToDifficulty(0x1c7fff80)).toBe(2);
      expect(bitsToDifficulty(0x1c3fffc0)).toBe(4);
      expect(bitsToDifficulty(0x1c00ffff)).toBe(256);
      expect(bitsToDifficulty(0x1b00ffff)).toBe(65536);
    });

    it('matches the difficulty a node reports for a mainnet target', () => {
      expect(bitsToDifficulty(0x17023c7e)).toBe(125864590119494.27);
    });

    it('decreases as the mantissa grows for a fixed exponent', () => {
      const difficulties = [0x1b000001, 0x1b0000ff, 0x1b00ffff, 0x1b7fffff].map(bitsToDifficulty);
      for (let i = 1; i < difficulties.length; i++) {
        expect(difficulties[i]).toBeLessThan(difficulties[i - 1]);
      }
    });

    it('divides by the truncated target when the exponent is below 3', () => {
      expect(bitsToDifficulty(0x0200ffff)).toBe(257 * 2 ** 208);
    });

    it('underflows to zero for targets far above the maximum', () => {
      expect(bitsToDifficulty(0xff000001)).toBe(0);
    });

    it.each([0x03000000, 0x1d000000, 0x00123456, 0])('raises DivisionByZeroError for bits %p', bits => {
      expect(() => bitsToDifficulty(bits)).toThrow(DivisionByZeroError);
    });
  });

  describe('targetToHex', () => {
    it('pads to the 64 digits a node prints', () => {
      expect(targetToHex(bitsToTarget(0x17023c7e))).toBe(
        '000000000000000000023c7e0000000000000000000000000000000000000000',
      );
      expect(targetToHex(0n)).toBe('0'.repeat(64));
    });
  });

  describe('decodeCompactTarget', () => {
    it('bundles the normalized bits, target and difficulty', () => {
      expect(decodeCompactTarget('0x1d00ffff')).toEqual({
        bits: 0x1d00ffff,
        hex: '1d00ffff',
        target: '00000000ffff'.padEnd(64, '0'),
        difficulty: 1,
      });
    });

    it('keeps leading zeros in the compact hex form', () => {
      expect(decodeCompactTarget(0x0200ffff).hex).toBe('0200ffff');
    });
  });
});
