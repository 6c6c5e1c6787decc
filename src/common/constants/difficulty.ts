// Compact target ("bits") layout
export const COMPACT_EXPONENT_SHIFT = 24;
export const COMPACT_MANTISSA_MASK = 0x00ffffff;
export const MAX_COMPACT_BITS = 0xffffffff;

// Mantissa and exponent of the difficulty-1 target (bits 0x1d00ffff)
export const DIFFICULTY_ONE_MANTISSA = 0xffffn;
export const DIFFICULTY_ONE_EXPONENT = 0x1dn;

/** Difficulty-1 target: 0xFFFF * 256^(0x1D - 3) */
export const MAX_TARGET = DIFFICULTY_ONE_MANTISSA << (8n * (DIFFICULTY_ONE_EXPONENT - 3n));

// Width of the node's hex-encoded target field
export const TARGET_HEX_LENGTH = 64;
