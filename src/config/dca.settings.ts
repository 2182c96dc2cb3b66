export interface RawDcaSettings {
  pair?: string;
  amount?: string;
  delayDays?: string;
  takerFeeRate?: string;
}

export interface DcaSettings {
  pair: string;
  amount: number;
  delayDays: number;
  takerFeeRate: number;
}

function parseNumber(name: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isFinite(parsed)) {
    throw new Error(`${name} must be a number, got "${value ?? ''}"`);
  }
  return parsed;
}

export function parseDcaSettings(raw: RawDcaSettings | undefined): DcaSettings {
  const pair = raw?.pair?.trim();
  if (!pair) {
    throw new Error('DCA_PAIR environment variable is required');
  }

  const amount = parseNumber('DCA_AMOUNT', raw?.amount);
  if (amount <= 0) {
    throw new Error(`DCA_AMOUNT must be positive, got ${amount}`);
  }

  const delayDays = parseNumber('DCA_DELAY_DAYS', raw?.delayDays ?? '1');
  if (!Number.isInteger(delayDays) || delayDays < 1) {
    throw new Error(
      `DCA_DELAY_DAYS must be a whole number of days >= 1, got ${delayDays}`,
    );
  }

  const takerFeeRate = parseNumber(
    'DCA_TAKER_FEE_RATE',
    raw?.takerFeeRate ?? '0.001',
  );
  if (takerFeeRate < 0 || takerFeeRate >= 1) {
    throw new Error(
      `DCA_TAKER_FEE_RATE must be a fraction in [0, 1), got ${takerFeeRate}`,
    );
  }

  return { pair, amount, delayDays, takerFeeRate };
}
