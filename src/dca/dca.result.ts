import { OrderDto } from '../common/dto/order.dto';
import { AnyDcaError } from '../common/errors/dca.errors';

export type DcaResult =
  | { ok: true; status: 'placed'; order: OrderDto }
  | { ok: true; status: 'skipped'; existingOrders: number }
  | { ok: false; error: AnyDcaError };

export function describeResult(result: DcaResult): string {
  if (!result.ok) {
    return `DCA aborted (${result.error.kind}): ${result.error.message}`;
  }
  switch (result.status) {
    case 'placed':
      return `DCA order ${result.order.exchangeOrderId ?? '?'} placed: ${result.order.volume} ${result.order.pair} at ${result.order.limitPrice}`;
    case 'skipped':
      return `Already DCA: ${result.existingOrders} order(s) in the current window`;
  }
}
