import { AnalysisController } from '@analysis/analysis.controller';
import { BlockAnalyzerService } from '@analysis/block-analyzer.service';
import { BlockchainModule } from '@blockchain/blockchain.module';
import { Module } from '@nestjs/common';

@Module({
  imports: [BlockchainModule],
  providers: [BlockAnalyzerService],
  controllers: [AnalysisController],
  exports: [BlockAnalyzerService],
})
export class AnalysisModule {}
