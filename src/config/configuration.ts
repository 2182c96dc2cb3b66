export default () => ({
  binance: {
    apiKey: process.env.BINANCE_API_KEY,
    apiSecret: process.env.BINANCE_API_SECRET,
    testnet: process.env.USE_BINANCE_TESTNET === 'true',
  },
  discord: {
    webhookUrl: process.env.DISCORD_WEBHOOK_URL,
  },
  dca: {
    pair: process.env.DCA_PAIR,
    amount: process.env.DCA_AMOUNT,
    delayDays: process.env.DCA_DELAY_DAYS || '1',
    takerFeeRate: process.env.DCA_TAKER_FEE_RATE || '0.001',
    ordersFile: process.env.DCA_ORDERS_FILE || 'orders.csv',
  },
});
