import {
  COMPACT_EXPONENT_SHIFT,
  COMPACT_MANTISSA_MASK,
  MAX_COMPACT_BITS,
  MAX_TARGET,
  TARGET_HEX_LENGTH,
} from '@common/constants/difficulty';
import { DivisionByZeroError, MalformedCompactTargetError } from '@common/utils/error-handler';
import { DecodedCompactTarget, RawCompactBits } from '@types';

const COMPACT_HEX_PATTERN = /^(0x)?[0-9a-f]{1,8}$/i;

// Above this many bits a divisor is shifted down before converting to a double
const SAFE_DIVISOR_BITS = 64;
const MAX_SCALE_STEP = 1000;

/**
 * Normalize a compact target as returned by a node (hex string or integer)
 * to an unsigned 32-bit integer.
 */
export function parseCompactBits(raw: RawCompactBits): number {
  if (typeof raw === 'string') {
    const value = raw.trim();
    if (!COMPACT_HEX_PATTERN.test(value)) {
      throw new MalformedCompactTargetError(`Compact target "${raw}" is not a 32-bit hex value`, raw);
    }
    return parseInt(value.replace(/^0x/i, ''), 16);
  }

  assertCompactBits(raw);
  return raw;
}

/**
 * Expand a compact target to its full integer value.
 *
 * target = mantissa * 2^(8 * (exponent - 3)). Exponents below 3 shift the
 * mantissa right instead, discarding the bits that fall off (floor division),
 * so 0x0200ffff decodes to 0xff and 0x00123456 to 0.
 */
export function bitsToTarget(bits: number): bigint {
  assertCompactBits(bits);

  const exponent = bits >>> COMPACT_EXPONENT_SHIFT;
  const mantissa = BigInt(bits & COMPACT_MANTISSA_MASK);

  if (exponent >= 3) {
    return mantissa << BigInt(8 * (exponent - 3));
  }
  return mantissa >> BigInt(8 * (3 - exponent));
}

/**
 * Difficulty of a compact target relative to the difficulty-1 target.
 * @throws DivisionByZeroError when the target decodes to zero
 */
export function bitsToDifficulty(bits: number): number {
  const target = bitsToTarget(bits);
  if (target === 0n) {
    throw new DivisionByZeroError(`Compact target 0x${toCompactHex(bits)} decodes to a zero target`, bits);
  }
  return divideToFloat(MAX_TARGET, target);
}

/**
 * Zero-padded hex form of a target, as the node prints it
 */
export function targetToHex(target: bigint): string {
  return target.toString(16).padStart(TARGET_HEX_LENGTH, '0');
}

export function decodeCompactTarget(raw: RawCompactBits): DecodedCompactTarget {
  const bits = parseCompactBits(raw);
  return {
    bits,
    hex: toCompactHex(bits),
    target: targetToHex(bitsToTarget(bits)),
    difficulty: bitsToDifficulty(bits),
  };
}

function toCompactHex(bits: number): string {
  return bits.toString(16).padStart(8, '0');
}

function assertCompactBits(bits: number): void {
  if (!Number.isSafeInteger(bits) || bits < 0 || bits > MAX_COMPACT_BITS) {
    throw new MalformedCompactTargetError(`Compact target ${bits} is not an unsigned 32-bit integer`, bits);
  }
}

/**
 * numerator / denominator as a double. Targets can reach 2^2040, past the
 * largest finite double, so the divisor is brought below 2^64 first and the
 * quotient scaled back by the same power of two.
 */
function divideToFloat(numerator: bigint, denominator: bigint): number {
  const excess = Math.max(0, denominator.toString(2).length - SAFE_DIVISOR_BITS);
  let quotient = Number(numerator) / Number(denominator >> BigInt(excess));

  for (let remaining = excess; remaining > 0; remaining -= MAX_SCALE_STEP) {
    quotient /= 2 ** Math.min(remaining, MAX_SCALE_STEP);
  }
  return quotient;
}
