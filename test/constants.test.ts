import { Constants } from '../src/constants';

describe('Constants', () => {
  const names = ['TARIFF_SELL_FEES', 'TARIFF_KWH_FEES_LOW', 'BATTERY_KWH_PRICE', 'MARKET_RETRY_COUNT'];
  const original = new Map(names.map(name => [name, process.env[name]]));

  afterEach(() => {
    for (const [name, value] of original) {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
  });

  test('keeps a configured zero', () => {
    process.env.TARIFF_SELL_FEES = '0';
    process.env.TARIFF_KWH_FEES_LOW = '0';
    process.env.BATTERY_KWH_PRICE = '0';

    expect(Constants.TARIFF.SELL_FEES).toBe(0);
    expect(Constants.TARIFF.KWH_FEES_LOW).toBe(0);
    expect(Constants.BATTERY.KWH_PRICE).toBe(0);
  });

  test('falls back to the default when unset, blank or not a number', () => {
    delete process.env.TARIFF_SELL_FEES;
    process.env.TARIFF_KWH_FEES_LOW = ' ';
    process.env.BATTERY_KWH_PRICE = 'abc';

    expect(Constants.TARIFF.SELL_FEES).toBe(0.45);
    expect(Constants.TARIFF.KWH_FEES_LOW).toBe(1.35022);
    expect(Constants.BATTERY.KWH_PRICE).toBe(2.5);
  });

  test('reads decimal values', () => {
    process.env.TARIFF_SELL_FEES = '0.3';
    expect(Constants.TARIFF.SELL_FEES).toBe(0.3);
  });

  test('always makes at least one market request', () => {
    process.env.MARKET_RETRY_COUNT = '0';
    expect(Constants.MARKET.RETRY_COUNT).toBe(1);
  });
});
