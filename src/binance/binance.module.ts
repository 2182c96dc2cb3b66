import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BinanceService } from './binance.service';
import { BINANCE_REST_API, createBinanceRestApi } from './binance.rest';
import { ExchangeClient } from '../exchange/exchange.client';

@Module({
  providers: [
    {
      provide: BINANCE_REST_API,
      useFactory: createBinanceRestApi,
      inject: [ConfigService],
    },
    BinanceService,
    { provide: ExchangeClient, useExisting: BinanceService },
  ],
  exports: [ExchangeClient],
})
export class BinanceModule {}
