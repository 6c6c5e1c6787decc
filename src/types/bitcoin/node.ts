/**
 * Node-level RPC results
 */

export interface MiningInfo {
  blocks: number;
  bits?: string;
  difficulty: number;
  target?: string;
  networkhashps: number;
  pooledtx: number;
  chain: string;
  warnings: string | string[];
  [field: string]: unknown;
}

export interface BlockchainInfo {
  chain: string;
  blocks: number;
  headers: number;
  bestblockhash: string;
  bits?: string;
  target?: string;
  difficulty: number;
  time?: number;
  mediantime: number;
  verificationprogress: number;
  initialblockdownload: boolean;
  chainwork: string;
  size_on_disk: number;
  pruned: boolean;
  warnings: string | string[];
  [field: string]: unknown;
}

/**
 * `getblocktemplate` request object
 */
export interface BlockTemplateRequest {
  rules: string[];
  mode?: 'template' | 'proposal';
  capabilities?: string[];
  [field: string]: unknown;
}

export interface BlockTemplateTransaction {
  data: string;
  txid: string;
  hash: string;
  depends: number[];
  fee: number;
  sigops: number;
  weight: number;
}

export interface BlockTemplate {
  version: number;
  rules: string[];
  previousblockhash: string;
  transactions: BlockTemplateTransaction[];
  coinbasevalue: number;
  target: string;
  mintime: number;
  curtime: number;
  bits: string;
  height: number;
  [field: string]: unknown;
}
