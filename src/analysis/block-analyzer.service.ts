import { analyzeBlockDifficulty, analyzeMiningTime } from '@analysis/block-statistics';
import { BlockchainService } from '@blockchain/blockchain.service';
import { BITCOIN } from '@common/constants/config';
import { ErrorHandler } from '@common/utils/error-handler';
import { Injectable, Logger } from '@nestjs/common';
import { BlockAnalysis, BlockInfo, BlockRecord, DifficultySummary, MiningTimeSummary } from '@types';

/**
 * Fetches blocks from the node and summarizes their difficulty and timestamps
 */
@Injectable()
export class BlockAnalyzerService {
  private readonly logger = new Logger(BlockAnalyzerService.name);
  private readonly errorHandler = new ErrorHandler(BlockAnalyzerService.name);

  constructor(private readonly blockchainService: BlockchainService) {}

  /**
   * Full record of a single block
   */
  async getBlockDetails(blockHash: string): Promise<BlockInfo> {
    if (!/^[0-9a-f]{64}$/i.test(blockHash)) {
      throw this.errorHandler.handleValidationError('Block hash must be 64 hex characters', 'hash', blockHash);
    }
    return this.blockchainService.getBlock(blockHash);
  }

  /**
   * The most recent blocks, newest first. Stops early at the genesis block.
   * Fetched in batches of FETCH_BATCH_SIZE concurrent calls.
   */
  async getRecentBlocks(count: number = BITCOIN.BLOCKS.DEFAULT_RECENT_BLOCKS): Promise<BlockInfo[]> {
    this.assertBlockCount(count);

    const tip = await this.blockchainService.getBlockCount();
    const heights = Array.from({ length: Math.min(count, tip + 1) }, (_, i) => tip - i);

    const batchSize = BITCOIN.BLOCKS.FETCH_BATCH_SIZE;
    const blocks: BlockInfo[] = [];

    for (let i = 0; i < heights.length; i += batchSize) {
      const batch = heights.slice(i, i + batchSize);
      const hashes = await Promise.all(batch.map(height => this.blockchainService.getBlockHash(height)));
      blocks.push(...(await Promise.all(hashes.map(hash => this.blockchainService.getBlock(hash)))));
    }

    this.logger.debug(
      `Fetched ${blocks.length} blocks from height ${tip} down in ${Math.ceil(heights.length / batchSize)} batches`,
    );
    return blocks;
  }

  /**
   * Fetch the most recent blocks and summarize them
   */
  async analyzeRecentBlocks(count: number = BITCOIN.BLOCKS.DEFAULT_RECENT_BLOCKS): Promise<BlockAnalysis> {
    const blocks = await this.getRecentBlocks(count);

    return {
      count: blocks.length,
      fromHeight: blocks.length > 0 ? blocks[blocks.length - 1].height : null,
      toHeight: blocks.length > 0 ? blocks[0].height : null,
      difficulty: this.analyzeBlockDifficulty(blocks),
      miningTime: this.analyzeMiningTime(blocks),
      analyzedAt: new Date().toISOString(),
    };
  }

  analyzeBlockDifficulty(blocks: readonly BlockRecord[]): DifficultySummary {
    return analyzeBlockDifficulty(blocks);
  }

  analyzeMiningTime(blocks: readonly BlockRecord[]): MiningTimeSummary {
    return analyzeMiningTime(blocks);
  }

  private assertBlockCount(count: number): void {
    const max = BITCOIN.BLOCKS.MAX_ANALYSIS_BLOCKS;
    if (!Number.isInteger(count) || count < 1 || count > max) {
      throw this.errorHandler.handleValidationError(`Block count must be an integer between 1 and ${max}`, 'count', count);
    }
  }
}
