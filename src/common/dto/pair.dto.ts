export class PairDto {
  readonly name: string; // canonical exchange symbol, e.g. BTCUSDT
  readonly altName: string; // alternate identifier the exchange may report orders under
  readonly base: string;
  readonly quote: string;
  readonly lotDecimals: number; // volume precision
  readonly quoteDecimals: number; // price precision
  readonly orderMin: number; // minimum tradable volume

  constructor(
    name: string,
    altName: string,
    base: string,
    quote: string,
    lotDecimals: number,
    quoteDecimals: number,
    orderMin: number,
  ) {
    if (!Number.isInteger(lotDecimals) || lotDecimals < 0) {
      throw new Error(`Invalid lot decimals for ${name}: ${lotDecimals}`);
    }
    if (!Number.isInteger(quoteDecimals) || quoteDecimals < 0) {
      throw new Error(`Invalid quote decimals for ${name}: ${quoteDecimals}`);
    }
    if (!(orderMin > 0)) {
      throw new Error(`Invalid minimum order volume for ${name}: ${orderMin}`);
    }

    this.name = name;
    this.altName = altName;
    this.base = base;
    this.quote = quote;
    this.lotDecimals = lotDecimals;
    this.quoteDecimals = quoteDecimals;
    this.orderMin = orderMin;
    Object.freeze(this);
  }

  get identifiers(): ReadonlySet<string> {
    return new Set([this.name, this.altName]);
  }

  /**
   * Orders may be reported under either the canonical or the alternate
   * identifier depending on where they were placed.
   */
  matches(identifier: string): boolean {
    return this.identifiers.has(identifier);
  }
}
