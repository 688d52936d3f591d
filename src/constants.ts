import _ from 'lodash';

/**
 * All Application Constants for the Spot Price Calculator
 */
export class Constants {
  /**
   * Server Configuration
   */
  public static SERVER = {
    get PORT(): number {
      return numberFromEnv(process.env.PORT, 3000);
    },

    get NODE_ENV(): string {
      return process.env.NODE_ENV || 'development';
    }
  };

  /**
   * API Security Configuration
   */
  public static API = {
    get KEY(): string {
      return process.env.API_KEY || '';
    }
  };

  /**
   * Logging Configuration
   */
  public static LOGGING = {
    get LOG_DIR(): string {
      return process.env.LOG_DIR || 'logs';
    },

    get APP_NAME(): string {
      return process.env.APP_NAME || 'spot-price-calculator';
    },

    get LOG_LEVEL(): string {
      return process.env.LOG_LEVEL?.toUpperCase() || 'INFO';
    },

    get MAX_AGE_DAYS(): number {
      return numberFromEnv(process.env.LOG_MAX_AGE_DAYS, 5);
    }
  };

  /**
   * Day-ahead market and exchange rate sources
   */
  public static MARKET = {
    /**
     * Timezone of the market day, used to decide what "today" and the current slot are
     */
    get TIMEZONE(): string {
      return process.env.MARKET_TIMEZONE || 'Europe/Prague';
    },

    /**
     * Currency the spot prices are quoted in, looked up in the daily exchange rate list
     */
    get CURRENCY(): string {
      return process.env.MARKET_CURRENCY || 'EUR';
    },

    get PRICE_URL(): string {
      return (
        process.env.MARKET_PRICE_URL || 'https://www.ote-cr.cz/cs/kratkodobe-trhy/elektrina/denni-trh/@@chart-data'
      );
    },

    get RATE_URL(): string {
      return (
        process.env.MARKET_RATE_URL ||
        'https://www.cnb.cz/cs/financni-trhy/devizovy-trh/kurzy-devizoveho-trhu/kurzy-devizoveho-trhu/denni_kurz.txt'
      );
    },

    get RETRY_COUNT(): number {
      return Math.max(1, numberFromEnv(process.env.MARKET_RETRY_COUNT, 3));
    },

    get RETRY_DELAY(): number {
      return numberFromEnv(process.env.MARKET_RETRY_DELAY, 1000);
    }
  };

  /**
   * Price cache Configuration
   */
  public static CACHE = {
    get TYPE(): string {
      return process.env.CACHE_TYPE || 'file';
    },

    get DIR(): string {
      return process.env.CACHE_DIR || 'cache';
    },

    get MAX_AGE_DAYS(): number {
      return numberFromEnv(process.env.CACHE_MAX_AGE_DAYS, 30);
    }
  };

  /**
   * Default distribution tariff (D57d) and supplier fees, all in CZK without VAT
   */
  public static TARIFF = {
    get VAT(): number {
      return numberFromEnv(process.env.TARIFF_VAT, 1.21);
    },

    get MONTHLY_FEES(): number {
      return numberFromEnv(process.env.TARIFF_MONTHLY_FEES, 610.84);
    },

    get DAILY_FEES(): number {
      return numberFromEnv(process.env.TARIFF_DAILY_FEES, 4.18);
    },

    get KWH_FEES_LOW(): number {
      return numberFromEnv(process.env.TARIFF_KWH_FEES_LOW, 1.35022);
    },

    get KWH_FEES_HIGH(): number {
      return numberFromEnv(process.env.TARIFF_KWH_FEES_HIGH, 1.86567);
    },

    get SELL_FEES(): number {
      return numberFromEnv(process.env.TARIFF_SELL_FEES, 0.45);
    },

    get LOW_TARIFF_HOURS(): string {
      return process.env.TARIFF_LOW_TARIFF_HOURS || '0,1,2,3,4,5,6,7,9,10,11,13,14,16,17,18,20,21,22,23';
    }
  };

  /**
   * Ranking defaults for the day price endpoint
   */
  public static RANKING = {
    get CHEAPEST_COUNT(): number {
      return numberFromEnv(process.env.RANKING_CHEAPEST_COUNT, 8);
    },

    get MOST_EXPENSIVE_COUNT(): number {
      return numberFromEnv(process.env.RANKING_MOST_EXPENSIVE_COUNT, 8);
    },

    get AVERAGE_WINDOW(): number {
      return numberFromEnv(process.env.RANKING_AVERAGE_WINDOW, 4);
    },

    get AVERAGE_THRESHOLD(): number {
      return numberFromEnv(process.env.RANKING_AVERAGE_THRESHOLD, 1.25);
    }
  };

  /**
   * Battery Configuration
   */
  public static BATTERY = {
    /**
     * Price spread (CZK/kWh) above the cheapest charging price from which discharging pays off
     */
    get KWH_PRICE(): number {
      return numberFromEnv(process.env.BATTERY_KWH_PRICE, 2.5);
    }
  };
}

/**
 * Reads a numeric variable; unset, blank and non-numeric values fall back
 */
function numberFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = _.toNumber(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}
