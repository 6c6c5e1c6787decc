import { BlockAnalyzerService } from '@analysis/block-analyzer.service';
import { decodeCompactTarget } from '@analysis/difficulty.codec';
import { BITCOIN } from '@common/constants/config';
import { Controller, DefaultValuePipe, Get, Param, ParseIntPipe, Query } from '@nestjs/common';
import { BlockAnalysis, BlockInfo, DecodedCompactTarget } from '@types';

@Controller('analysis')
export class AnalysisController {
  constructor(private readonly blockAnalyzerService: BlockAnalyzerService) {}

  /**
   * GET /api/analysis/blocks?count=N
   * Difficulty and mining time summary of the N most recent blocks
   */
  @Get('blocks')
  analyzeRecentBlocks(
    @Query('count', new DefaultValuePipe(BITCOIN.BLOCKS.DEFAULT_RECENT_BLOCKS), ParseIntPipe) count: number,
  ): Promise<BlockAnalysis> {
    return this.blockAnalyzerService.analyzeRecentBlocks(count);
  }

  @Get('blocks/:hash')
  getBlockDetails(@Param('hash') hash: string): Promise<BlockInfo> {
    return this.blockAnalyzerService.getBlockDetails(hash);
  }

  /**
   * GET /api/analysis/bits/:bits
   * Decode a compact target, e.g. /api/analysis/bits/1d00ffff
   */
  @Get('bits/:bits')
  decodeBits(@Param('bits') bits: string): DecodedCompactTarget {
    return decodeCompactTarget(bits);
  }
}
