/**
 * Failures raised while collecting market data for a day.
 *
 * The kinds are handled differently by callers: a missing price for the
 * lookahead day is tolerated, a missing conversion rate never is.
 */
export enum PriceErrorKind {
  PRICE_NOT_FOUND = 'PRICE_NOT_FOUND',
  CONVERSION_RATE_UNAVAILABLE = 'CONVERSION_RATE_UNAVAILABLE'
}

export class PriceError extends Error {
  public readonly kind: PriceErrorKind;
  public readonly date: string;

  constructor(kind: PriceErrorKind, date: string, message?: string) {
    super(message ?? `${kind} for ${date}`);
    this.name = 'PriceError';
    this.kind = kind;
    this.date = date;
  }

  public static priceNotFound(date: string): PriceError {
    return new PriceError(PriceErrorKind.PRICE_NOT_FOUND, date, `No market prices for ${date}`);
  }

  public static conversionRateUnavailable(date: string, currency: string): PriceError {
    return new PriceError(
      PriceErrorKind.CONVERSION_RATE_UNAVAILABLE,
      date,
      `No ${currency} conversion rate for ${date}`
    );
  }
}

export function isPriceNotFound(error: unknown): error is PriceError {
  return error instanceof PriceError && error.kind === PriceErrorKind.PRICE_NOT_FOUND;
}

export function isConversionRateUnavailable(error: unknown): error is PriceError {
  return error instanceof PriceError && error.kind === PriceErrorKind.CONVERSION_RATE_UNAVAILABLE;
}
