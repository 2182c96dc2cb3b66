import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { SpotRestAPI } from '@binance/spot';
import { ExchangeClient } from '../exchange/exchange.client';
import {
  BalanceMap,
  ClosedOrdersQuery,
  ExchangeOrderRecord,
  LimitBuyRequest,
  OrderReceipt,
  OrderRecords,
  PairInfo,
  TradeBalance,
  orderKey,
} from '../common/types/exchange.types';
import { decimalsOfStep } from '../common/utils/decimals';
import { BINANCE_REST_API, BinanceRestApi, RawOrder } from './binance.rest';

// Statuses Binance reports for orders that can still fill.
const OPEN_STATUSES = new Set(['NEW', 'PARTIALLY_FILLED', 'PENDING_NEW']);

// allOrders rejects a startTime..endTime range longer than 24 hours.
const ALL_ORDERS_SLICE_MS = 24 * 60 * 60 * 1000;

function asList<T>(data: T | T[]): T[] {
  // Ticker endpoints return an object for one symbol and an array otherwise
  return Array.isArray(data) ? data : [data];
}

export function toOrderRecord(order: RawOrder): ExchangeOrderRecord {
  const status = order.status ?? 'UNKNOWN';
  return {
    id: String(order.orderId ?? ''),
    pair: order.symbol ?? '',
    status,
    openedAt: new Date(Number(order.time ?? 0)),
    closedAt: OPEN_STATUSES.has(status)
      ? null
      : new Date(Number(order.updateTime ?? 0)),
  };
}

/** Consecutive `[startTime, endTime]` ranges of at most 24 hours. */
export function allOrdersSlices(
  start: Date,
  end: Date,
): Array<{ startTime: number; endTime: number }> {
  const slices: Array<{ startTime: number; endTime: number }> = [];
  for (
    let from = start.getTime();
    from <= end.getTime();
    from += ALL_ORDERS_SLICE_MS
  ) {
    slices.push({
      startTime: from,
      endTime: Math.min(from + ALL_ORDERS_SLICE_MS - 1, end.getTime()),
    });
  }
  return slices;
}

@Injectable()
export class BinanceService extends ExchangeClient implements OnModuleDestroy {
  private readonly logger = new Logger(BinanceService.name);

  constructor(
    @Inject(BINANCE_REST_API) private readonly restAPI: BinanceRestApi,
  ) {
    super();
  }

  async getServerTime(): Promise<Date> {
    const response = await this.restAPI.time();
    const data = await response.data();

    if (data.serverTime === undefined) {
      throw new Error('Binance time response has no serverTime');
    }
    return new Date(Number(data.serverTime));
  }

  async getTradeBalance(currency: string): Promise<TradeBalance> {
    const accountResponse = await this.restAPI.getAccount();
    const account = await accountResponse.data();

    const tickerResponse = await this.restAPI.tickerPrice();
    const prices = new Map<string, number>();
    for (const ticker of asList(await tickerResponse.data())) {
      const price = Number(ticker.price);
      if (ticker.symbol && Number.isFinite(price)) {
        prices.set(ticker.symbol, price);
      }
    }

    let equivalentBalance = 0;
    for (const balance of account.balances ?? []) {
      const asset = balance.asset ?? '';
      const amount = Number(balance.free ?? 0) + Number(balance.locked ?? 0);
      if (!asset || amount === 0) continue;

      if (asset === currency) {
        equivalentBalance += amount;
        continue;
      }
      const direct = prices.get(`${asset}${currency}`);
      const inverse = prices.get(`${currency}${asset}`);
      if (direct !== undefined) {
        equivalentBalance += amount * direct;
      } else if (inverse !== undefined && inverse > 0) {
        equivalentBalance += amount / inverse;
      } else {
        this.logger.debug(`No ${currency} price for ${asset}, not valued`);
      }
    }

    return { currency, equivalentBalance };
  }

  async getBalance(): Promise<BalanceMap> {
    const response = await this.restAPI.getAccount();
    const account = await response.data();

    const balances: Record<string, number> = {};
    for (const balance of account.balances ?? []) {
      if (balance.asset) {
        balances[balance.asset] = Number(balance.free ?? 0);
      }
    }
    return balances;
  }

  async getOpenOrders(): Promise<OrderRecords> {
    const response = await this.restAPI.getOpenOrders();
    const orders = await response.data();

    const records: Record<string, ExchangeOrderRecord> = {};
    for (const order of orders) {
      const record = toOrderRecord(order);
      records[orderKey(record)] = record;
    }
    return records;
  }

  async getClosedOrders(query: ClosedOrdersQuery): Promise<OrderRecords> {
    const records: Record<string, ExchangeOrderRecord> = {};
    const start = query.start.getTime();

    for (const symbol of query.pairs) {
      // startTime/endTime are compared with the time an order was opened
      for (const slice of allOrdersSlices(query.start, query.end)) {
        const response = await this.restAPI.allOrders({ symbol, ...slice });
        const orders = await response.data();

        for (const order of orders) {
          const record = toOrderRecord(order);
          if (record.closedAt === null || record.openedAt.getTime() < start) {
            continue;
          }
          records[orderKey(record)] = record;
        }
      }
    }
    return records;
  }

  async getAskPrice(pair: string): Promise<number> {
    try {
      const response = await this.restAPI.tickerBookTicker({ symbol: pair });
      const [ticker] = asList(await response.data());
      const askPrice = Number(ticker?.askPrice);

      if (!Number.isFinite(askPrice) || askPrice <= 0) {
        throw new Error(`No ask price returned for ${pair}`);
      }
      return askPrice;
    } catch (error) {
      this.logger.error(`Error getting ask price for ${pair}`, error);
      throw error;
    }
  }

  async submitLimitBuy(request: LimitBuyRequest): Promise<OrderReceipt> {
    this.logger.log(
      `Placing limit buy order: ${request.pair}, qty: ${request.volume}, price: ${request.price}`,
    );

    try {
      const response = await this.restAPI.newOrder({
        symbol: request.pair,
        side: SpotRestAPI.NewOrderSideEnum.BUY,
        type: SpotRestAPI.NewOrderTypeEnum.LIMIT,
        timeInForce: SpotRestAPI.NewOrderTimeInForceEnum.GTC,
        quantity: request.volume,
        price: request.price,
      });
      const order = await response.data();

      return {
        orderId: String(order.orderId ?? ''),
        description: `buy ${request.volume} ${request.pair} @ limit ${request.price}`,
      };
    } catch (error) {
      this.logger.error(`Error placing buy order for ${request.pair}`, error);
      throw error;
    }
  }

  async getPair(name: string): Promise<PairInfo> {
    const response = await this.restAPI.exchangeInfo({ symbol: name });
    const exchangeInfo = await response.data();

    const symbolInfo = exchangeInfo.symbols?.find((s) => s.symbol === name);
    if (!symbolInfo || !symbolInfo.baseAsset || !symbolInfo.quoteAsset) {
      throw new Error(`Symbol ${name} not found`);
    }

    const lotSizeFilter = symbolInfo.filters?.find(
      (f) => f.filterType === 'LOT_SIZE',
    );
    const priceFilter = symbolInfo.filters?.find(
      (f) => f.filterType === 'PRICE_FILTER',
    );
    if (!lotSizeFilter?.stepSize || !priceFilter?.tickSize) {
      throw new Error(`Symbol ${name} has no LOT_SIZE or PRICE_FILTER filter`);
    }

    const minQty = Number(lotSizeFilter.minQty ?? 0);

    return {
      name,
      altName: `${symbolInfo.baseAsset}/${symbolInfo.quoteAsset}`,
      base: symbolInfo.baseAsset,
      quote: symbolInfo.quoteAsset,
      lotDecimals: decimalsOfStep(lotSizeFilter.stepSize),
      quoteDecimals: decimalsOfStep(priceFilter.tickSize),
      orderMin: minQty > 0 ? minQty : Number(lotSizeFilter.stepSize),
    };
  }

  onModuleDestroy() {
    this.logger.log('Binance service shutting down');
  }
}
