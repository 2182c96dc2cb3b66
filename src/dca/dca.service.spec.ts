import { Test } from '@nestjs/testing';
import { DcaService } from './dca.service';
import { DCA_CONFIG, DcaConfig } from './dca.config';
import { ExchangeClient } from '../exchange/exchange.client';
import { OrderHistoryService } from '../history/order-history.service';
import { DiscordService } from '../discord/discord.service';
import { ClockService } from '../common/utils/clock.service';
import { PairDto } from '../common/dto/pair.dto';
import { OrderDto } from '../common/dto/order.dto';
import {
  ClockSkewError,
  InsufficientFundsError,
  OrderTooSmallError,
  SubmissionError,
} from '../common/errors/dca.errors';
import {
  FakeExchangeClient,
  orderRecord,
} from '../testing/fake-exchange.client';

const NOW = new Date('2024-03-15T12:00:00.400Z');

const btcUsdt = new PairDto('BTCUSDT', 'BTC/USDT', 'BTC', 'USDT', 8, 2, 0.0001);

describe('DcaService', () => {
  let exchange: FakeExchangeClient;
  let history: { append: jest.Mock<void, [OrderDto]> };
  let discord: {
    sendOrderNotification: jest.Mock<Promise<void>, [OrderDto, PairDto]>;
  };

  async function createService(
    overrides: Partial<DcaConfig> = {},
  ): Promise<DcaService> {
    const config: DcaConfig = {
      pair: btcUsdt,
      quoteAmount: 50,
      recurrenceDays: 1,
      takerFeeRate: 0.0026,
      ...overrides,
    };

    const moduleRef = await Test.createTestingModule({
      providers: [
        DcaService,
        { provide: DCA_CONFIG, useValue: config },
        { provide: ExchangeClient, useValue: exchange },
        { provide: OrderHistoryService, useValue: history },
        { provide: DiscordService, useValue: discord },
        { provide: ClockService, useValue: { now: () => NOW } },
      ],
    }).compile();

    return moduleRef.get(DcaService);
  }

  beforeEach(() => {
    exchange = new FakeExchangeClient();
    exchange.serverTime = new Date('2024-03-15T12:00:00.000Z');
    exchange.balances = { USDT: 100, BTC: 0.5 };
    exchange.askPrice = 20000;
    history = { append: jest.fn<void, [OrderDto]>() };
    discord = {
      sendOrderNotification: jest
        .fn<Promise<void>, [OrderDto, PairDto]>()
        .mockResolvedValue(undefined),
    };
  });

  describe('handleDcaLogic', () => {
    it('places, records and announces an order when nothing was bought in the window', async () => {
      const service = await createService();

      const result = await service.handleDcaLogic();

      expect(exchange.submitted).toEqual([
        { pair: 'BTCUSDT', volume: 0.0025, price: 20000 },
      ]);
      expect(result.ok).toBe(true);
      if (!result.ok || result.status !== 'placed') {
        throw new Error(`unexpected result ${JSON.stringify(result)}`);
      }
      expect(result.order.volume).toBe(0.0025);
      expect(result.order.limitPrice).toBe(20000);
      expect(result.order.totalPrice).toBe(50);
      expect(result.order.fee).toBe(0.13);
      expect(result.order.timestamp).toBe(NOW);
      expect(result.order.exchangeOrderId).toBe('28457');
      expect(result.order.exchangeDescription).toBe(
        'buy 0.0025 BTCUSDT @ limit 20000',
      );
      expect(history.append).toHaveBeenCalledTimes(1);
      expect(history.append).toHaveBeenCalledWith(result.order);
      expect(discord.sendOrderNotification).toHaveBeenCalledWith(
        result.order,
        btcUsdt,
      );
    });

    it('runs the checks in order: clock, balance, orders, price, submission', async () => {
      const service = await createService();

      await service.handleDcaLogic();

      expect(exchange.calls).toEqual([
        'getServerTime',
        'getTradeBalance',
        'getBalance',
        'getOpenOrders',
        'getClosedOrders',
        'getAskPrice:BTCUSDT',
        'submitLimitBuy',
      ]);
    });

    it('does nothing when a matching open order exists', async () => {
      exchange.openOrders = { '1': orderRecord('1', 'BTCUSDT') };
      const service = await createService();

      const result = await service.handleDcaLogic();

      expect(result).toEqual({ ok: true, status: 'skipped', existingOrders: 1 });
      expect(exchange.calls).not.toContain('getAskPrice:BTCUSDT');
      expect(exchange.submitted).toEqual([]);
      expect(history.append).not.toHaveBeenCalled();
      expect(discord.sendOrderNotification).not.toHaveBeenCalled();
    });

    it('matches closed orders reported under the alternate pair name', async () => {
      exchange.closedOrders = {
        '2': orderRecord('2', 'BTC/USDT', {
          status: 'FILLED',
          closedAt: new Date('2024-03-15T08:00:05.000Z'),
        }),
      };
      const service = await createService();

      const result = await service.handleDcaLogic();

      expect(result).toEqual({ ok: true, status: 'skipped', existingOrders: 1 });
      expect(history.append).not.toHaveBeenCalled();
    });

    it('ignores orders for other pairs', async () => {
      exchange.openOrders = { '3': orderRecord('3', 'ETHUSDT') };
      exchange.closedOrders = { '4': orderRecord('4', 'ETH/USDT') };
      const service = await createService();

      const result = await service.handleDcaLogic();

      expect(result.ok && result.status).toBe('placed');
      expect(exchange.submitted).toHaveLength(1);
    });

    it('aborts on clock drift before touching balances', async () => {
      exchange.serverTime = new Date('2024-03-15T11:59:58.000Z');
      const service = await createService();

      const result = await service.handleDcaLogic();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ClockSkewError);
      expect(result.error.kind).toBe('clock-skew');
      expect(exchange.calls).toEqual(['getServerTime']);
    });

    it('aborts on insufficient funds before counting orders', async () => {
      exchange.balances = { USDT: 10 };
      const service = await createService();

      const result = await service.handleDcaLogic();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(InsufficientFundsError);
      expect(result.error).toMatchObject({
        currency: 'USDT',
        required: 50,
        available: 10,
      });
      expect(exchange.calls).toEqual([
        'getServerTime',
        'getTradeBalance',
        'getBalance',
      ]);
      expect(history.append).not.toHaveBeenCalled();
    });

    it('rejects orders below the pair minimum without submitting them', async () => {
      exchange.askPrice = 50000;
      const service = await createService({
        pair: new PairDto('BTCUSDT', 'BTC/USDT', 'BTC', 'USDT', 2, 2, 0.01),
        quoteAmount: 1,
      });

      const result = await service.handleDcaLogic();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(OrderTooSmallError);
      expect(result.error).toMatchObject({ volume: 0, minimum: 0.01 });
      expect(exchange.calls).not.toContain('submitLimitBuy');
      expect(history.append).not.toHaveBeenCalled();
    });

    it('reports a rejected submission and persists nothing', async () => {
      exchange.submitError = new Error('EOrder:Insufficient funds');
      const service = await createService();

      const result = await service.handleDcaLogic();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(SubmissionError);
      expect(result.error.message).toBe(
        'Failed to submit buy limit order for BTCUSDT: EOrder:Insufficient funds',
      );
      expect(history.append).not.toHaveBeenCalled();
      expect(discord.sendOrderNotification).not.toHaveBeenCalled();
    });

    it('lets unexpected exchange failures propagate', async () => {
      jest
        .spyOn(exchange, 'getOpenOrders')
        .mockRejectedValue(new Error('socket hang up'));
      const service = await createService();

      await expect(service.handleDcaLogic()).rejects.toThrow('socket hang up');
      expect(exchange.submitted).toEqual([]);
    });
  });

  describe('getSystemTime', () => {
    it('accepts a drift of exactly one second', async () => {
      exchange.serverTime = new Date('2024-03-15T11:59:59.400Z');
      const service = await createService();

      await expect(service.getSystemTime()).resolves.toBe(NOW);
    });

    it('rejects a system clock running ahead of the exchange', async () => {
      exchange.serverTime = new Date('2024-03-15T11:59:59.399Z');
      const service = await createService();

      await expect(service.getSystemTime()).rejects.toMatchObject({
        kind: 'clock-skew',
        driftMs: 1001,
      });
    });

    it('rejects a system clock running behind the exchange', async () => {
      exchange.serverTime = new Date('2024-03-15T12:00:01.500Z');
      const service = await createService();

      await expect(service.getSystemTime()).rejects.toMatchObject({
        kind: 'clock-skew',
        driftMs: 1100,
      });
    });
  });

  describe('checkAccountBalance', () => {
    it('passes when the quote balance equals the amount', async () => {
      exchange.balances = { USDT: 50 };
      const service = await createService();

      await expect(service.checkAccountBalance()).resolves.toBeUndefined();
    });

    it('treats a missing quote balance as zero', async () => {
      exchange.balances = { BTC: 1 };
      const service = await createService();

      await expect(service.checkAccountBalance()).rejects.toMatchObject({
        kind: 'insufficient-funds',
        available: 0,
      });
    });
  });

  describe('countPairWindowOrders', () => {
    it('adds matching open and closed orders', async () => {
      exchange.openOrders = {
        '1': orderRecord('1', 'BTCUSDT'),
        '2': orderRecord('2', 'ETHUSDT'),
      };
      exchange.closedOrders = {
        '3': orderRecord('3', 'BTCUSDT', { status: 'FILLED' }),
        '4': orderRecord('4', 'BTC/USDT', { status: 'CANCELED' }),
        '5': orderRecord('5', 'ETHBTC', { status: 'FILLED' }),
      };
      const service = await createService();

      await expect(service.countPairWindowOrders(NOW)).resolves.toBe(3);
    });

    it('asks for closed orders opened since midnight UTC for a daily recurrence', async () => {
      const service = await createService();

      await service.countPairWindowOrders(NOW);

      expect(exchange.closedOrderQueries).toEqual([
        {
          start: new Date('2024-03-15T00:00:00.000Z'),
          end: NOW,
          closeTime: 'open',
          pairs: ['BTCUSDT'],
        },
      ]);
    });

    it('extends the window back by recurrence days minus one', async () => {
      const service = await createService({ recurrenceDays: 7 });

      await service.countPairWindowOrders(NOW);

      expect(exchange.closedOrderQueries[0]?.start).toEqual(
        new Date('2024-03-09T00:00:00.000Z'),
      );
    });
  });

  describe('validateOrderSize', () => {
    it('accepts a volume equal to the pair minimum', async () => {
      const service = await createService({ quoteAmount: 2 });
      const order = OrderDto.buyLimit({
        timestamp: NOW,
        pair: btcUsdt,
        amount: 2,
        askPrice: 20000,
        takerFeeRate: 0.0026,
      });

      expect(order.volume).toBe(0.0001);
      expect(() => service.validateOrderSize(order)).not.toThrow();
    });
  });
});
