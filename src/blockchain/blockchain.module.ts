import { Module } from '@nestjs/common';
import { BlockchainService } from '@blockchain/blockchain.service';
import { RPC_CLIENT } from '@common/interfaces/rpc.interface';
import { JsonRpcClient } from '@common/utils/json-rpc-client';
import { ConfigModule } from '@config/config.module';
import { ConfigService } from '@config/config.service';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: RPC_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => new JsonRpcClient(configService.getRpcConfig()),
    },
    BlockchainService,
  ],
  exports: [BlockchainService],
})
export class BlockchainModule {}
