import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DcaService } from './dca.service';
import { DCA_CONFIG, createDcaConfig } from './dca.config';
import { BinanceModule } from '../binance/binance.module';
import { OrderHistoryModule } from '../history/order-history.module';
import { DiscordModule } from '../discord/discord.module';
import { ExchangeClient } from '../exchange/exchange.client';
import { ClockService } from '../common/utils/clock.service';

@Module({
  imports: [BinanceModule, OrderHistoryModule, DiscordModule],
  providers: [
    ClockService,
    {
      provide: DCA_CONFIG,
      useFactory: createDcaConfig,
      inject: [ConfigService, ExchangeClient],
    },
    DcaService,
  ],
  exports: [DcaService],
})
export class DcaModule {}
