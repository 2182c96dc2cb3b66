import { ConfigService } from '@nestjs/config';
import { PairDto } from '../common/dto/pair.dto';
import { ExchangeClient } from '../exchange/exchange.client';
import { RawDcaSettings, parseDcaSettings } from '../config/dca.settings';

export const DCA_CONFIG = Symbol('DCA_CONFIG');

export interface DcaConfig {
  readonly pair: PairDto;
  readonly quoteAmount: number;
  readonly recurrenceDays: number; // minimum days between two accepted orders
  readonly takerFeeRate: number;
}

export async function createDcaConfig(
  configService: ConfigService,
  exchange: ExchangeClient,
): Promise<DcaConfig> {
  const settings = parseDcaSettings(configService.get<RawDcaSettings>('dca'));
  const info = await exchange.getPair(settings.pair);

  return Object.freeze({
    pair: new PairDto(
      info.name,
      info.altName,
      info.base,
      info.quote,
      info.lotDecimals,
      info.quoteDecimals,
      info.orderMin,
    ),
    quoteAmount: settings.amount,
    recurrenceDays: settings.delayDays,
    takerFeeRate: settings.takerFeeRate,
  });
}
