import Decimal from 'decimal.js';
import { PairDto } from './pair.dto';
import { roundHalfUp, truncate } from '../utils/decimals';

export const BUY_LIMIT = 'buy limit';

export interface BuyLimitOrderParams {
  timestamp: Date;
  pair: PairDto;
  amount: number; // quote currency to spend
  askPrice: number;
  takerFeeRate: number; // fraction, 0.001 == 0.1%
}

export class OrderDto {
  readonly timestamp: Date;
  readonly pair: string;
  readonly type: typeof BUY_LIMIT;
  readonly amount: number;
  readonly askPrice: number;
  readonly volume: number;
  readonly limitPrice: number;
  readonly fee: number; // expected, the exchange charges the real one
  readonly totalPrice: number; // quote spent excluding fee
  readonly exchangeOrderId: string | null;
  readonly exchangeDescription: string | null;

  private constructor(
    timestamp: Date,
    pair: string,
    amount: number,
    askPrice: number,
    volume: number,
    limitPrice: number,
    fee: number,
    totalPrice: number,
    exchangeOrderId: string | null = null,
    exchangeDescription: string | null = null,
  ) {
    this.timestamp = timestamp;
    this.pair = pair;
    this.type = BUY_LIMIT;
    this.amount = amount;
    this.askPrice = askPrice;
    this.volume = volume;
    this.limitPrice = limitPrice;
    this.fee = fee;
    this.totalPrice = totalPrice;
    this.exchangeOrderId = exchangeOrderId;
    this.exchangeDescription = exchangeDescription;
    Object.freeze(this);
  }

  static buyLimit(params: BuyLimitOrderParams): OrderDto {
    const { pair, amount, askPrice } = params;
    if (!(askPrice > 0)) {
      throw new Error(`Invalid ask price for ${pair.name}: ${askPrice}`);
    }

    const volume = truncate(new Decimal(amount).div(askPrice), pair.lotDecimals);
    const limitPrice = roundHalfUp(askPrice, pair.quoteDecimals);
    const totalPrice = volume.times(limitPrice);
    const fee = totalPrice.times(params.takerFeeRate);

    return new OrderDto(
      params.timestamp,
      pair.name,
      amount,
      askPrice,
      volume.toNumber(),
      limitPrice.toNumber(),
      fee.toNumber(),
      totalPrice.toNumber(),
    );
  }

  get submitted(): boolean {
    return this.exchangeOrderId !== null;
  }

  withExchangeReceipt(orderId: string, description: string): OrderDto {
    return new OrderDto(
      this.timestamp,
      this.pair,
      this.amount,
      this.askPrice,
      this.volume,
      this.limitPrice,
      this.fee,
      this.totalPrice,
      orderId,
      description,
    );
  }
}
