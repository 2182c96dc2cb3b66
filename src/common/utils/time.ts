const DAY_MS = 24 * 60 * 60 * 1000;

export function startOfUtcDay(date: Date): Date {
  return new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()),
  );
}

/**
 * First instant of the averaging window: midnight UTC of the current day,
 * moved back by `recurrenceDays - 1` days. With one day it is "today only".
 */
export function windowStart(now: Date, recurrenceDays: number): Date {
  return new Date(startOfUtcDay(now).getTime() - (recurrenceDays - 1) * DAY_MS);
}
