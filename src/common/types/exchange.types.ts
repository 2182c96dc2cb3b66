// Exchange-neutral shapes the DCA engine reads and writes.

/** Free balance per currency code. Currencies without a balance may be absent. */
export type BalanceMap = Readonly<Partial<Record<string, number>>>;

export interface TradeBalance {
  currency: string;
  equivalentBalance: number; // whole account valued in `currency`
}

export interface ExchangeOrderRecord {
  id: string;
  pair: string;
  status: string;
  openedAt: Date;
  closedAt: Date | null;
}

/**
 * Orders keyed by pair and exchange order id. Venues that number orders per
 * instrument may reuse an id across pairs.
 */
export type OrderRecords = Readonly<Record<string, ExchangeOrderRecord>>;

export function orderKey(order: ExchangeOrderRecord): string {
  return `${order.pair}:${order.id}`;
}

/** Closed orders are selected by the time they were opened. */
export type CloseTimeFilter = 'open';

export interface ClosedOrdersQuery {
  start: Date;
  end: Date;
  closeTime: CloseTimeFilter;
  pairs: readonly string[]; // exchange symbols, for venues that list orders per instrument
}

export interface LimitBuyRequest {
  pair: string;
  volume: number;
  price: number;
}

export interface OrderReceipt {
  orderId: string;
  description: string;
}

export interface PairInfo {
  name: string;
  altName: string;
  base: string;
  quote: string;
  lotDecimals: number;
  quoteDecimals: number;
  orderMin: number;
}
