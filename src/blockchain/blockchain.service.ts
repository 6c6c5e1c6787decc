import { BITCOIN } from '@common/constants/config';
import { RPC_CLIENT, RpcClient } from '@common/interfaces/rpc.interface';
import { RpcError } from '@common/utils/error-handler';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { BlockHeader, BlockInfo, BlockTemplate, BlockTemplateRequest, BlockchainInfo, MiningInfo } from '@types';

const METHODS = BITCOIN.RPC.METHODS;

/**
 * `getblock` verbosity: 0 hex, 1 JSON with txids, 2 JSON with decoded transactions
 */
export type BlockVerbosity = 0 | 1 | 2;

/**
 * Node-facing service: one method per Bitcoin Core RPC call, no logic beyond
 * shaping parameters and checking the few results the analysis relies on.
 */
@Injectable()
export class BlockchainService {
  private readonly logger = new Logger(BlockchainService.name);

  constructor(@Inject(RPC_CLIENT) private readonly rpcClient: RpcClient) {}

  /**
   * Height of the most-work fully-validated chain
   */
  async getBlockCount(): Promise<number> {
    const result = await this.rpcClient.call<unknown>(METHODS.GET_BLOCK_COUNT);

    const count = typeof result === 'string' && result.trim() !== '' ? Number(result) : result;
    if (typeof count === 'number' && Number.isInteger(count) && count >= 0) {
      return count;
    }
    throw new RpcError(`Unexpected result for ${METHODS.GET_BLOCK_COUNT}: ${JSON.stringify(result)}`, undefined, METHODS.GET_BLOCK_COUNT);
  }

  /**
   * Hash of the tip block
   */
  async getBestBlockHash(): Promise<string> {
    return this.rpcClient.call<string>(METHODS.GET_BEST_BLOCK_HASH);
  }

  async getBlockHash(height: number): Promise<string> {
    return this.rpcClient.call<string>(METHODS.GET_BLOCK_HASH, [height]);
  }

  async getBlock(blockHash: string): Promise<BlockInfo>;
  async getBlock(blockHash: string, verbosity: 0): Promise<string>;
  async getBlock(blockHash: string, verbosity: BlockVerbosity): Promise<BlockInfo | string>;
  async getBlock(blockHash: string, verbosity: BlockVerbosity = 1): Promise<BlockInfo | string> {
    this.logger.debug(`Fetching block ${blockHash} (verbosity ${verbosity})`);
    return this.rpcClient.call<BlockInfo | string>(METHODS.GET_BLOCK, [blockHash, verbosity]);
  }

  async getBlockHeader(blockHash: string): Promise<BlockHeader> {
    return this.rpcClient.call<BlockHeader>(METHODS.GET_BLOCK_HEADER, [blockHash, true]);
  }

  /**
   * Proof-of-work difficulty as a multiple of the minimum difficulty
   */
  async getDifficulty(): Promise<number> {
    return this.rpcClient.call<number>(METHODS.GET_DIFFICULTY);
  }

  async getMiningInfo(): Promise<MiningInfo> {
    return this.rpcClient.call<MiningInfo>(METHODS.GET_MINING_INFO);
  }

  async getBlockchainInfo(): Promise<BlockchainInfo> {
    return this.rpcClient.call<BlockchainInfo>(METHODS.GET_BLOCKCHAIN_INFO);
  }

  /**
   * Estimated network hashes per second
   * @param nblocks Blocks to average over (-1 for since the last difficulty change)
   * @param height Height to estimate at (-1 for the tip)
   */
  async getNetworkHashPs(nblocks = 120, height = -1): Promise<number> {
    return this.rpcClient.call<number>(METHODS.GET_NETWORK_HASH_PS, [nblocks, height]);
  }

  async getBlockTemplate(request: BlockTemplateRequest = { rules: ['segwit'] }): Promise<BlockTemplate> {
    return this.rpcClient.call<BlockTemplate>(METHODS.GET_BLOCK_TEMPLATE, [request]);
  }
}
