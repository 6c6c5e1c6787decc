/**
 * Block types as returned by a Bitcoin Core node
 */

/**
 * Compact target as the node returns it: hex string ("1d00ffff") or integer
 */
export type RawCompactBits = string | number;

/**
 * Any block or header record. Only `bits` and `time` are read by the analysis;
 * every other field passes through untouched.
 */
export interface BlockRecord {
  readonly bits?: RawCompactBits | null;
  readonly time?: number | null;
  readonly [field: string]: unknown;
}

/**
 * `getblockheader` result (verbose)
 */
export interface BlockHeader extends BlockRecord {
  hash: string;
  confirmations: number;
  height: number;
  version: number;
  versionHex: string;
  merkleroot: string;
  time: number;
  mediantime: number;
  nonce: number;
  bits: string;
  target?: string;
  difficulty: number;
  chainwork: string;
  nTx: number;
  previousblockhash?: string;
  nextblockhash?: string;
}

/**
 * `getblock` result at verbosity 1
 */
export interface BlockInfo extends BlockHeader {
  strippedsize: number;
  size: number;
  weight: number;
  tx: string[];
}
