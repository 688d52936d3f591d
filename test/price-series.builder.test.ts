import { toQuarterSlot } from '../src/common/utils/time-slot.util';
import { RawPricePoint } from '../src/market/models/market.model';
import { PriceSetInput, TariffOptions } from '../src/pricing/models/pricing.model';
import { derivePriceSet, sortAscending } from '../src/pricing/price-series.builder';

const TARIFF: TariffOptions = {
  kwhFeesLow: 0.1,
  kwhFeesHigh: 0.2,
  sellFees: 0.45,
  vat: 1.21,
  lowTariffHours: [0]
};

function hourly(values: number[]): RawPricePoint[] {
  return values.map((value, hour) => ({ slot: hour, value }));
}

function input(overrides: Partial<PriceSetInput> = {}): PriceSetInput {
  return {
    date: '2026-10-19',
    evaluationDate: '2026-10-19',
    evaluationSlot: '0:00',
    tariff: TARIFF,
    rawPrices: hourly(new Array<number>(24).fill(1)),
    conversionRate: 25,
    ...overrides
  };
}

describe('derivePriceSet', () => {
  test('applies the low tariff fee to low tariff hours and the high fee elsewhere', () => {
    const set = derivePriceSet(input());

    expect(set.spot.entries[0].value).toBeCloseTo(0.025, 10);
    expect(set.total.entries[0].value).toBeCloseTo(0.15125, 10);
    expect(set.total.entries[1].value).toBeCloseTo(0.27225, 10);
    expect(set.sell.entries[0].value).toBeCloseTo(-0.425, 10);
  });

  test('keeps every view aligned with the raw slots', () => {
    const set = derivePriceSet(input({ rawPrices: hourly([40, 10, 30, 20]) }));
    const slots = [0, 1, 2, 3];

    expect(set.spot.entries.map(entry => entry.slot)).toEqual(slots);
    expect(set.total.entries.map(entry => entry.slot)).toEqual(slots);
    expect(set.sell.entries.map(entry => entry.slot)).toEqual(slots);
    expect(set.totalSorted.entries.map(entry => entry.slot)).toEqual([1, 3, 2, 0]);
  });

  test('returns the same result for the same input', () => {
    const prices = input({ date: '2026-10-20', rawPrices: hourly([80, 20, 55.5, 13]) });
    expect(derivePriceSet(prices)).toEqual(derivePriceSet(prices));
  });

  test('sets the current price only for today', () => {
    const rawPrices = hourly([100, 200, 300]);

    const today = derivePriceSet(input({ rawPrices, evaluationSlot: '1:30' }));
    expect(today.isToday).toBe(true);
    expect(today.evaluationSlot).toBe(1);
    expect(today.spot.now).toBeCloseTo(5, 10);
    expect(today.total.now).toBeCloseTo((5 + 0.2) * 1.21, 10);
    expect(today.sell.now).toBeCloseTo(4.55, 10);
    expect(today.totalSorted.now).toBeCloseTo((5 + 0.2) * 1.21, 10);

    const tomorrow = derivePriceSet(input({ rawPrices, date: '2026-10-20', evaluationSlot: '1:30' }));
    expect(tomorrow.isToday).toBe(false);
    expect(tomorrow.spot.now).toBeNull();
    expect(tomorrow.total.now).toBeNull();
    expect(tomorrow.sell.now).toBeNull();
    expect(tomorrow.totalSorted.now).toBeNull();
  });

  test('leaves the current price empty when the slot is missing from the data', () => {
    const set = derivePriceSet(input({ rawPrices: hourly([100, 200]), evaluationSlot: '22:00' }));
    expect(set.total.now).toBeNull();
  });

  test('works on quarter-hour data', () => {
    const rawPrices: RawPricePoint[] = [80, 20, 30, 40, 10, 60, 70, 50].map((value, index) => ({
      slot: toQuarterSlot(Math.floor(index / 4), (index % 4) * 15),
      value
    }));

    const set = derivePriceSet(
      input({ rawPrices, evaluationSlot: '1:15', tariff: { ...TARIFF, lowTariffHours: [1] } })
    );

    expect(set.evaluationSlot).toBe('1:15');
    expect(set.spot.now).toBeCloseTo(1.5, 10);
    // hour 0 is high tariff, hour 1 low
    expect(set.total.entries[3].value).toBeCloseTo((1 + 0.2) * 1.21, 10);
    expect(set.total.entries[4].value).toBeCloseTo((0.25 + 0.1) * 1.21, 10);
    expect(set.totalSorted.entries.map(entry => entry.slot)).toEqual([
      '1:00',
      '0:15',
      '0:30',
      '0:45',
      '1:45',
      '1:15',
      '1:30',
      '0:00'
    ]);
  });
});

describe('sortAscending', () => {
  test('keeps equal prices in slot order', () => {
    const sorted = sortAscending([
      { slot: 0, value: 2 },
      { slot: 1, value: 1 },
      { slot: 2, value: 2 },
      { slot: 3, value: 1 }
    ]);

    expect(sorted.map(entry => entry.slot)).toEqual([1, 3, 0, 2]);
  });

  test('does not modify its input', () => {
    const entries = [
      { slot: 0, value: 3 },
      { slot: 1, value: 1 }
    ];
    sortAscending(entries);
    expect(entries.map(entry => entry.slot)).toEqual([0, 1]);
  });
});
