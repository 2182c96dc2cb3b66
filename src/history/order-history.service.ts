import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import { OrderDto } from '../common/dto/order.dto';

export const ORDER_HISTORY_HEADER = [
  'date',
  'pair',
  'type',
  'amount',
  'ask_price',
  'limit_price',
  'volume',
  'fee',
  'total_price',
  'order_id',
  'description',
].join(',');

function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsvLine(order: OrderDto): string {
  return [
    order.timestamp.toISOString(),
    order.pair,
    order.type,
    order.amount,
    order.askPrice,
    order.limitPrice,
    order.volume,
    order.fee,
    order.totalPrice,
    order.exchangeOrderId ?? '',
    order.exchangeDescription ?? '',
  ]
    .map(csvField)
    .join(',');
}

/** Append-only CSV record of every order the bot placed. */
@Injectable()
export class OrderHistoryService {
  private readonly logger = new Logger(OrderHistoryService.name);
  private readonly ordersFile: string;

  constructor(private configService: ConfigService) {
    this.ordersFile =
      this.configService.get<string>('dca.ordersFile') || 'orders.csv';
  }

  get filePath(): string {
    return path.resolve(process.cwd(), this.ordersFile);
  }

  append(order: OrderDto): void {
    if (!order.submitted) {
      throw new Error('Only submitted orders can be recorded');
    }

    const filePath = this.filePath;
    const lines = fs.existsSync(filePath)
      ? `${toCsvLine(order)}\n`
      : `${ORDER_HISTORY_HEADER}\n${toCsvLine(order)}\n`;

    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.appendFileSync(filePath, lines);
      this.logger.log(`Order ${order.exchangeOrderId} saved to ${filePath}`);
    } catch (error) {
      this.logger.error(
        `Error saving order ${order.exchangeOrderId} to ${filePath}`,
        error,
      );
      throw error;
    }
  }
}
