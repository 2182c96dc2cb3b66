import {
  BalanceMap,
  ClosedOrdersQuery,
  LimitBuyRequest,
  OrderReceipt,
  OrderRecords,
  PairInfo,
  TradeBalance,
} from '../common/types/exchange.types';

/**
 * Authenticated exchange access used by the DCA engine. Bound in Nest to a
 * concrete venue client; the abstract class doubles as the injection token.
 */
export abstract class ExchangeClient {
  abstract getServerTime(): Promise<Date>;

  abstract getTradeBalance(currency: string): Promise<TradeBalance>;

  abstract getBalance(): Promise<BalanceMap>;

  abstract getOpenOrders(): Promise<OrderRecords>;

  abstract getClosedOrders(query: ClosedOrdersQuery): Promise<OrderRecords>;

  abstract getAskPrice(pair: string): Promise<number>;

  abstract submitLimitBuy(request: LimitBuyRequest): Promise<OrderReceipt>;

  abstract getPair(name: string): Promise<PairInfo>;
}
