import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EmbedBuilder, WebhookClient } from 'discord.js';
import { OrderDto } from '../common/dto/order.dto';
import { PairDto } from '../common/dto/pair.dto';

@Injectable()
export class DiscordService implements OnModuleDestroy {
  private readonly logger = new Logger(DiscordService.name);
  private readonly webhook: WebhookClient | null;

  constructor(private readonly configService: ConfigService) {
    const url = this.configService.get<string>('discord.webhookUrl');
    this.webhook = url ? new WebhookClient({ url }) : null;

    this.logger.log(
      `Discord notifications ${this.webhook ? 'enabled' : 'disabled (DISCORD_WEBHOOK_URL not set)'}`,
    );
  }

  buildOrderEmbed(order: OrderDto, pair: PairDto): EmbedBuilder {
    return new EmbedBuilder()
      .setColor(0x00ff00) // Green for buy
      .setTitle('✅ DCA BUY LIMIT ORDER PLACED')
      .addFields(
        { name: 'Pair', value: order.pair, inline: true },
        {
          name: 'Order ID',
          value: order.exchangeOrderId ?? 'n/a',
          inline: true,
        },
        {
          name: 'Volume',
          value: `${order.volume} ${pair.base}`,
          inline: true,
        },
        {
          name: 'Limit Price',
          value: `${order.limitPrice} ${pair.quote}`,
          inline: true,
        },
        {
          name: 'Total Price',
          value: `${order.totalPrice} ${pair.quote}`,
          inline: true,
        },
        {
          name: 'Expected Fee',
          value: `${order.fee} ${pair.quote}`,
          inline: true,
        },
        {
          name: 'Description',
          value: order.exchangeDescription ?? 'n/a',
          inline: false,
        },
      )
      .setTimestamp(order.timestamp);
  }

  async sendOrderNotification(order: OrderDto, pair: PairDto): Promise<void> {
    if (!this.webhook) {
      this.logger.warn('No Discord webhook set. Skipping notification.');
      return;
    }

    try {
      await this.webhook.send({ embeds: [this.buildOrderEmbed(order, pair)] });
      this.logger.log('Sent order notification to Discord');
    } catch (error) {
      this.logger.error('Error sending order notification', error);
    }
  }

  onModuleDestroy() {
    this.webhook?.destroy();
  }
}
