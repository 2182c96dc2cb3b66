import { Inject, Injectable, Logger } from '@nestjs/common';
import { ExchangeClient } from '../exchange/exchange.client';
import { OrderHistoryService } from '../history/order-history.service';
import { DiscordService } from '../discord/discord.service';
import { ClockService } from '../common/utils/clock.service';
import { OrderDto } from '../common/dto/order.dto';
import { PairDto } from '../common/dto/pair.dto';
import {
  ExchangeOrderRecord,
  OrderReceipt,
  OrderRecords,
} from '../common/types/exchange.types';
import {
  ClockSkewError,
  InsufficientFundsError,
  OrderTooSmallError,
  SubmissionError,
  isDcaError,
} from '../common/errors/dca.errors';
import { windowStart } from '../common/utils/time';
import { DCA_CONFIG, DcaConfig } from './dca.config';
import { DcaResult } from './dca.result';

export const CLOCK_TOLERANCE_MS = 1000;

/**
 * One dollar-cost averaging pass: buys `quoteAmount` of the pair with a
 * limit order unless an order for it already exists in the current window.
 *
 * The engine keeps no state between runs. The exchange order ledger is the
 * only record of what was already bought, so two runs overlapping closely
 * enough may both see zero orders.
 */
@Injectable()
export class DcaService {
  private readonly logger = new Logger(DcaService.name);

  constructor(
    @Inject(DCA_CONFIG) private readonly config: DcaConfig,
    private readonly exchange: ExchangeClient,
    private readonly orderHistory: OrderHistoryService,
    private readonly discordService: DiscordService,
    private readonly clock: ClockService,
  ) {
    this.logger.log(
      `Current configuration: DCA pair ${config.pair.name}, DCA amount ${config.quoteAmount} ${config.pair.quote}, every ${config.recurrenceDays} day(s).`,
    );
  }

  async handleDcaLogic(): Promise<DcaResult> {
    try {
      const now = await this.getSystemTime();
      await this.checkAccountBalance();

      const existingOrders = await this.countPairWindowOrders(now);
      if (existingOrders > 0) {
        this.logger.log(
          `Already DCA: ${existingOrders} ${this.config.pair.name} order(s) in the current window.`,
        );
        return { ok: true, status: 'skipped', existingOrders };
      }
      this.logger.log("Didn't DCA already in the current window.");

      const askPrice = await this.exchange.getAskPrice(this.config.pair.name);
      this.logger.log(`Current ${this.config.pair.name} ask price: ${askPrice}.`);

      const order = OrderDto.buyLimit({
        timestamp: now,
        pair: this.config.pair,
        amount: this.config.quoteAmount,
        askPrice,
        takerFeeRate: this.config.takerFeeRate,
      });
      this.validateOrderSize(order);

      const placed = await this.sendBuyLimitOrder(order);
      this.orderHistory.append(placed);
      await this.discordService.sendOrderNotification(placed, this.config.pair);

      return { ok: true, status: 'placed', order: placed };
    } catch (error) {
      if (isDcaError(error)) {
        this.logger.error(error.message);
        return { ok: false, error };
      }
      throw error;
    }
  }

  /**
   * Compares system and exchange time and returns the system time as the
   * decision timestamp.
   */
  async getSystemTime(): Promise<Date> {
    const exchangeTime = await this.exchange.getServerTime();
    const systemTime = this.clock.now();
    this.logger.log(
      `It's ${exchangeTime.toISOString()} on the exchange, ${systemTime.toISOString()} on system.`,
    );

    const drift = Math.abs(systemTime.getTime() - exchangeTime.getTime());
    if (drift > CLOCK_TOLERANCE_MS) {
      throw new ClockSkewError(exchangeTime, systemTime, CLOCK_TOLERANCE_MS);
    }
    return systemTime;
  }

  async checkAccountBalance(): Promise<void> {
    const { pair, quoteAmount } = this.config;

    const tradeBalance = await this.exchange.getTradeBalance(pair.quote);
    this.logger.log(
      `Current trade balance: ${tradeBalance.equivalentBalance} ${tradeBalance.currency}.`,
    );

    const balance = await this.exchange.getBalance();
    const baseBalance = balance[pair.base] ?? 0;
    const quoteBalance = balance[pair.quote] ?? 0;
    this.logger.log(
      `Pair balances: ${quoteBalance} ${pair.quote}, ${baseBalance} ${pair.base}.`,
    );

    if (quoteBalance < quoteAmount) {
      throw new InsufficientFundsError(pair.quote, quoteAmount, quoteBalance);
    }
  }

  /** Open orders plus orders opened since the window start, for the pair. */
  async countPairWindowOrders(now: Date): Promise<number> {
    const { pair, recurrenceDays } = this.config;

    const openOrders = await this.exchange.getOpenOrders();
    const windowOpenOrders = DcaService.extractPairOrders(openOrders, pair);

    const start = windowStart(now, recurrenceDays);
    const closedOrders = await this.exchange.getClosedOrders({
      start,
      end: now,
      closeTime: 'open',
      pairs: [pair.name],
    });
    const windowClosedOrders = DcaService.extractPairOrders(closedOrders, pair);

    this.logger.debug(
      `${windowOpenOrders.length} open and ${windowClosedOrders.length} closed ${pair.name} order(s) since ${start.toISOString()}`,
    );
    return windowOpenOrders.length + windowClosedOrders.length;
  }

  static extractPairOrders(
    orders: OrderRecords,
    pair: PairDto,
  ): ExchangeOrderRecord[] {
    return Object.values(orders).filter((order) => pair.matches(order.pair));
  }

  validateOrderSize(order: OrderDto): void {
    const { pair } = this.config;
    if (order.volume < pair.orderMin) {
      throw new OrderTooSmallError(pair.name, order.volume, pair.orderMin);
    }
  }

  private async sendBuyLimitOrder(order: OrderDto): Promise<OrderDto> {
    const { pair } = this.config;
    this.logger.log(
      `Create a ${order.amount} ${pair.quote} buy limit order of ${order.volume} ${pair.base} at ${order.limitPrice} ${pair.quote}.`,
    );
    this.logger.log(
      `Fee expected: ${order.fee} ${pair.quote} (${this.config.takerFeeRate * 100}% taker fee).`,
    );
    this.logger.log(
      `Total price expected: ${order.volume} ${pair.base} for ${order.totalPrice} ${pair.quote}.`,
    );

    let receipt: OrderReceipt;
    try {
      receipt = await this.exchange.submitLimitBuy({
        pair: order.pair,
        volume: order.volume,
        price: order.limitPrice,
      });
    } catch (error) {
      throw new SubmissionError(order.pair, error);
    }

    this.logger.log('Order successfully created.');
    this.logger.log(`Order ID: ${receipt.orderId}`);
    this.logger.log(`Description: ${receipt.description}`);
    return order.withExchangeReceipt(receipt.orderId, receipt.description);
  }
}
