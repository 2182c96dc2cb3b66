import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { Spot, SPOT_REST_API_TESTNET_URL, SpotRestAPI } from '@binance/spot';

export const BINANCE_REST_API = Symbol('BINANCE_REST_API');

export interface RestResponse<T> {
  data(): Promise<T>;
}

export interface RawOrder {
  symbol?: string;
  orderId?: number | bigint;
  status?: string;
  time?: number | bigint;
  updateTime?: number | bigint;
}

export interface RawBalance {
  asset?: string;
  free?: string;
  locked?: string;
}

export interface RawTickerPrice {
  symbol?: string;
  price?: string;
}

export interface RawBookTicker {
  symbol?: string;
  askPrice?: string;
}

export interface RawSymbolFilter {
  filterType?: string;
  stepSize?: string;
  minQty?: string;
  tickSize?: string;
}

export interface RawSymbolInfo {
  symbol?: string;
  baseAsset?: string;
  quoteAsset?: string;
  filters?: RawSymbolFilter[];
}

export interface RawNewOrder {
  symbol?: string;
  orderId?: number | bigint;
  status?: string;
}

/**
 * The slice of the Binance spot REST API the bot uses. The SDK's
 * `restAPI` satisfies it; specs hand in in-memory responses.
 */
export interface BinanceRestApi {
  time(): Promise<RestResponse<{ serverTime?: number | bigint }>>;
  getAccount(): Promise<RestResponse<{ balances?: RawBalance[] }>>;
  tickerPrice(): Promise<RestResponse<RawTickerPrice | RawTickerPrice[]>>;
  getOpenOrders(): Promise<RestResponse<RawOrder[]>>;
  allOrders(params: {
    symbol: string;
    startTime?: number;
    endTime?: number;
  }): Promise<RestResponse<RawOrder[]>>;
  tickerBookTicker(params: {
    symbol: string;
  }): Promise<RestResponse<RawBookTicker | RawBookTicker[]>>;
  newOrder(params: {
    symbol: string;
    side: SpotRestAPI.NewOrderSideEnum;
    type: SpotRestAPI.NewOrderTypeEnum;
    timeInForce: SpotRestAPI.NewOrderTimeInForceEnum;
    quantity: number;
    price: number;
  }): Promise<RestResponse<RawNewOrder>>;
  exchangeInfo(params: {
    symbol: string;
  }): Promise<RestResponse<{ symbols?: RawSymbolInfo[] }>>;
}

export function createBinanceRestApi(
  configService: ConfigService,
): BinanceRestApi {
  const logger = new Logger('BinanceRestApi');
  const apiKey = configService.get<string>('binance.apiKey');
  const apiSecret = configService.get<string>('binance.apiSecret');
  const testnet = configService.get<boolean>('binance.testnet');

  if (!apiKey || !apiSecret) {
    throw new Error(
      'BINANCE_API_KEY and BINANCE_API_SECRET must be set as environment variables',
    );
  }

  const configurationRestAPI = {
    apiKey,
    apiSecret,
    ...(testnet && {
      basePath: SPOT_REST_API_TESTNET_URL,
    }),
  };

  const client = new Spot({ configurationRestAPI });

  logger.log(`Binance client initialized (testnet: ${testnet ? 'YES' : 'NO'})`);
  return client.restAPI;
}
